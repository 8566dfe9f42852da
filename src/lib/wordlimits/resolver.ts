import { resolveQuizWordLimitSource } from "@/lib/wordlimits/config";
import {
  isAssignmentSubmissionContext,
  isQuizAttemptContext,
  parsePageNumber,
  parseRecordId,
} from "@/lib/wordlimits/context";
import type { WordLimitRepository } from "@/lib/wordlimits/repository";
import { getQuizWordLimitStrategy, type QuizWordLimitStrategy } from "@/lib/wordlimits/strategies";
import type { PageContext, WordLimitPayload, WordLimitResult } from "@/lib/wordlimits/types";

export const WORDLIMIT_ENABLED_KEY = "wordlimitenabled";
export const WORDLIMIT_VALUE_KEY = "wordlimit";
const ENABLED_VALUE = "1";

export type WordLimitResolverDeps = {
  repository: WordLimitRepository;
  quizStrategy?: QuizWordLimitStrategy;
};

export function parseWordLimitValue(raw: string | null | undefined) {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return null;
  }
  const value = Number(raw.trim());
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

async function resolveAssignmentWordLimit(repository: WordLimitRepository, assignmentId: number) {
  const enabled = await repository.getAssignmentConfigValue(assignmentId, WORDLIMIT_ENABLED_KEY);
  if (enabled !== ENABLED_VALUE) {
    return null;
  }

  const raw = await repository.getAssignmentConfigValue(assignmentId, WORDLIMIT_VALUE_KEY);
  const limit = parseWordLimitValue(raw);
  if (limit === null) {
    console.warn("Ignoring unusable assignment word limit", { assignmentId, value: raw });
  }
  return limit;
}

export async function resolveWordLimits(
  context: PageContext,
  deps: WordLimitResolverDeps,
): Promise<WordLimitResult> {
  if (isAssignmentSubmissionContext(context)) {
    const limit = await resolveAssignmentWordLimit(deps.repository, context.instanceId);
    return { kind: "single", limit };
  }

  if (isQuizAttemptContext(context)) {
    const strategy =
      deps.quizStrategy ?? getQuizWordLimitStrategy(resolveQuizWordLimitSource());
    const limits = await strategy.listWordLimits(deps.repository, {
      quizId: context.instanceId,
      page: parsePageNumber(context.params.page),
      attemptId: parseRecordId(context.params.attempt),
      userId: context.userId,
    });
    return { kind: "multiple", limits };
  }

  return { kind: "not_applicable" };
}

export function toWordLimitPayload(result: WordLimitResult): WordLimitPayload {
  if (result.kind === "single") {
    return [result.limit];
  }
  if (result.kind === "multiple") {
    return result.limits;
  }
  return 0;
}
