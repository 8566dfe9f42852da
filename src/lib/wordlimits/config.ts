import type { QuizWordLimitSource } from "@/lib/wordlimits/types";

const DEFAULT_QUIZ_SOURCE: QuizWordLimitSource = "attempt_layout";

function normalizeQuizSource(value: string | undefined): QuizWordLimitSource | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "attempt_layout" || normalized === "quiz_slots") {
    return normalized;
  }
  return null;
}

export function resolveQuizWordLimitSource(env: NodeJS.ProcessEnv = process.env) {
  const raw = env.WORDLIMIT_QUIZ_SOURCE;
  const source = normalizeQuizSource(raw);
  if (!source) {
    if (raw) {
      console.warn("Unknown WORDLIMIT_QUIZ_SOURCE, using default", {
        value: raw,
        fallback: DEFAULT_QUIZ_SOURCE,
      });
    }
    return DEFAULT_QUIZ_SOURCE;
  }
  return source;
}
