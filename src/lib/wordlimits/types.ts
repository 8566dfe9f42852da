export type PageParams = Readonly<Record<string, string | undefined>>;

// Path, page type and query parameters of the page the widget runs on.
export type PageRequest = Readonly<{
  path: string;
  pageType: string;
  params: PageParams;
}>;

// instanceId is the assignment or quiz behind the page's course module.
export type PageContext = PageRequest &
  Readonly<{
    instanceId: number;
    userId: string;
  }>;

export type QuizWordLimitSource = "attempt_layout" | "quiz_slots";

export type AssignmentPluginConfigRow = {
  assignment: number;
  name: string;
  value: string | null;
};

export type QuizAttemptRow = {
  id: number;
  quiz: number;
  userid: string;
  uniqueid: number | null;
  layout: string | null;
};

export type QuestionAttemptRow = {
  slot: number | null;
  questionid: number | null;
  questionusageid: number;
};

export type EssayOptionsRow = {
  questionid: number;
  maxwordlimit: number | null;
};

export type SlotWordLimitRow = {
  slot: number;
  maxwordlimit: number | null;
};

export type CourseModuleRow = {
  id: number;
  instance: number;
};

export type WordLimitResult =
  | { kind: "not_applicable" }
  | { kind: "single"; limit: number | null }
  | { kind: "multiple"; limits: number[] };

// 0 off-target, one entry for the submission editor, one per essay on quiz pages.
export type WordLimitPayload = 0 | [number | null] | number[];
