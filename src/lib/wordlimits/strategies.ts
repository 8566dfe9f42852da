import { decodeAttemptLayout, getPageSlots } from "@/lib/wordlimits/layout";
import type { WordLimitRepository } from "@/lib/wordlimits/repository";
import type { QuestionAttemptRow, QuizWordLimitSource } from "@/lib/wordlimits/types";

export type QuizWordLimitQuery = {
  quizId: number;
  page: number;
  attemptId: number | null;
  userId: string;
};

export interface QuizWordLimitStrategy {
  readonly source: QuizWordLimitSource;
  listWordLimits(repository: WordLimitRepository, query: QuizWordLimitQuery): Promise<number[]>;
}

function isConfiguredLimit(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function indexBySlot(questionAttempts: QuestionAttemptRow[]) {
  const bySlot = new Map<number, QuestionAttemptRow>();
  questionAttempts.forEach((questionAttempt) => {
    if (questionAttempt.slot) {
      bySlot.set(questionAttempt.slot, questionAttempt);
    }
  });
  return bySlot;
}

// attempt layout page -> question attempts -> essay options
export const attemptLayoutStrategy: QuizWordLimitStrategy = {
  source: "attempt_layout",
  async listWordLimits(repository, query) {
    if (query.attemptId === null) {
      return [];
    }

    const attempt = await repository.findQuizAttempt(query.attemptId, query.userId);
    if (!attempt || !attempt.uniqueid) {
      return [];
    }

    const pageSlots = getPageSlots(decodeAttemptLayout(attempt.layout), query.page);
    if (pageSlots.length === 0) {
      return [];
    }

    const questionAttempts = indexBySlot(
      await repository.listQuestionAttempts(attempt.uniqueid, pageSlots),
    );
    const questionIds = Array.from(
      new Set(
        pageSlots
          .map((slot) => questionAttempts.get(slot)?.questionid)
          .filter((questionId): questionId is number => typeof questionId === "number"),
      ),
    );

    const essayOptions = await repository.listEssayOptions(questionIds);
    const limitByQuestion = new Map(
      essayOptions.map((options) => [options.questionid, options.maxwordlimit] as const),
    );

    const limits: number[] = [];
    pageSlots.forEach((slot) => {
      const questionId = questionAttempts.get(slot)?.questionid;
      if (typeof questionId !== "number") {
        return;
      }
      const limit = limitByQuestion.get(questionId);
      if (isConfiguredLimit(limit)) {
        limits.push(limit);
      }
    });
    return limits;
  },
};

// Older schema: quiz_slots still carries the question id.
export const quizSlotsStrategy: QuizWordLimitStrategy = {
  source: "quiz_slots",
  async listWordLimits(repository, query) {
    const rows = await repository.listSlotWordLimits(query.quizId, query.page);
    return [...rows]
      .sort((a, b) => a.slot - b.slot)
      .map((row) => row.maxwordlimit)
      .filter(isConfiguredLimit);
  },
};

const STRATEGIES: Record<QuizWordLimitSource, QuizWordLimitStrategy> = {
  attempt_layout: attemptLayoutStrategy,
  quiz_slots: quizSlotsStrategy,
};

export function getQuizWordLimitStrategy(source: QuizWordLimitSource) {
  return STRATEGIES[source];
}
