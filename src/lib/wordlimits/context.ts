import type { PageRequest } from "@/lib/wordlimits/types";

export const ASSIGNMENT_VIEW_PATH = "/mod/assign/view.php";
export const ASSIGNMENT_EDIT_ACTION = "editsubmission";
export const QUIZ_ATTEMPT_PATH = "/mod/quiz/attempt.php";
export const QUIZ_ATTEMPT_PAGE_TYPE = "mod-quiz-attempt";

export function isAssignmentSubmissionContext(context: PageRequest) {
  return (
    context.path.includes(ASSIGNMENT_VIEW_PATH) &&
    context.params.action === ASSIGNMENT_EDIT_ACTION
  );
}

export function isQuizAttemptContext(context: PageRequest) {
  return context.path.includes(QUIZ_ATTEMPT_PATH) && context.pageType === QUIZ_ATTEMPT_PAGE_TYPE;
}

export function isWordLimitedPage(context: PageRequest) {
  return isAssignmentSubmissionContext(context) || isQuizAttemptContext(context);
}

// Leading-integer coercion: "2" and "2x" are page 2, anything else is page 0.
export function parsePageNumber(raw: string | undefined) {
  if (!raw || !raw.trim()) {
    return 0;
  }
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function parseRecordId(raw: string | undefined | null) {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return null;
  }
  const parsed = Number(raw.trim());
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
}
