import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationMissingError } from "@/lib/wordlimits/errors";
import type { WordLimitRepository } from "@/lib/wordlimits/repository";
import {
  parseWordLimitValue,
  resolveWordLimits,
  toWordLimitPayload,
} from "@/lib/wordlimits/resolver";
import type { PageContext } from "@/lib/wordlimits/types";

function makeRepository(overrides: Partial<WordLimitRepository> = {}) {
  return {
    getCourseModuleInstance: vi.fn(async () => null),
    getAssignmentConfigValue: vi.fn(async () => null),
    findQuizAttempt: vi.fn(async () => null),
    listQuestionAttempts: vi.fn(async () => []),
    listEssayOptions: vi.fn(async () => []),
    listSlotWordLimits: vi.fn(async () => []),
    ...overrides,
  } satisfies WordLimitRepository;
}

function configValues(values: Record<string, string>) {
  return vi.fn(async (assignmentId: number, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new ConfigurationMissingError({
        table: "assign_plugin_config",
        ownerId: assignmentId,
        key: name,
      });
    }
    return value;
  });
}

const assignmentContext: PageContext = {
  path: "/mod/assign/view.php",
  pageType: "mod-assign-view",
  params: { id: "12", action: "editsubmission" },
  instanceId: 5,
  userId: "user-1",
};

function quizContext(params: Record<string, string>): PageContext {
  return {
    path: "/mod/quiz/attempt.php",
    pageType: "mod-quiz-attempt",
    params,
    instanceId: 9,
    userId: "user-1",
  };
}

afterEach(() => {
  delete process.env.WORDLIMIT_QUIZ_SOURCE;
  vi.restoreAllMocks();
});

describe("resolveWordLimits for assignment submissions", () => {
  it("returns an absent limit when the word limit is disabled", async () => {
    const getAssignmentConfigValue = configValues({ wordlimitenabled: "0", wordlimit: "250" });
    const repository = makeRepository({ getAssignmentConfigValue });

    const result = await resolveWordLimits(assignmentContext, { repository });

    expect(result).toEqual({ kind: "single", limit: null });
    expect(toWordLimitPayload(result)).toEqual([null]);
    expect(getAssignmentConfigValue).toHaveBeenCalledTimes(1);
    expect(getAssignmentConfigValue).toHaveBeenCalledWith(5, "wordlimitenabled");
  });

  it("returns the configured limit when enabled", async () => {
    const repository = makeRepository({
      getAssignmentConfigValue: configValues({ wordlimitenabled: "1", wordlimit: "250" }),
    });

    const result = await resolveWordLimits(assignmentContext, { repository });

    expect(toWordLimitPayload(result)).toEqual([250]);
  });

  it("propagates a missing enabled flag", async () => {
    const repository = makeRepository({ getAssignmentConfigValue: configValues({}) });

    await expect(resolveWordLimits(assignmentContext, { repository })).rejects.toBeInstanceOf(
      ConfigurationMissingError,
    );
  });

  it("propagates a missing limit once enabled", async () => {
    const repository = makeRepository({
      getAssignmentConfigValue: configValues({ wordlimitenabled: "1" }),
    });

    await expect(resolveWordLimits(assignmentContext, { repository })).rejects.toThrow(
      "Missing wordlimit in assign_plugin_config for 5.",
    );
  });

  it("treats a non-numeric limit as absent", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const repository = makeRepository({
      getAssignmentConfigValue: configValues({ wordlimitenabled: "1", wordlimit: "lots" }),
    });

    const result = await resolveWordLimits(assignmentContext, { repository });

    expect(result).toEqual({ kind: "single", limit: null });
    expect(warn).toHaveBeenCalledWith("Ignoring unusable assignment word limit", {
      assignmentId: 5,
      value: "lots",
    });
  });
});

describe("resolveWordLimits for quiz attempts", () => {
  it("omits slots without essay configuration", async () => {
    const repository = makeRepository({
      findQuizAttempt: vi.fn(async () => ({
        id: 31,
        quiz: 9,
        userid: "user-1",
        uniqueid: 77,
        layout: "3,1,0,2,0",
      })),
      listQuestionAttempts: vi.fn(async () => [
        { slot: 1, questionid: 11, questionusageid: 77 },
        { slot: 3, questionid: 13, questionusageid: 77 },
      ]),
      listEssayOptions: vi.fn(async () => [{ questionid: 13, maxwordlimit: 100 }]),
    });

    const result = await resolveWordLimits(quizContext({ attempt: "31" }), { repository });

    expect(result).toEqual({ kind: "multiple", limits: [100] });
    expect(repository.findQuizAttempt).toHaveBeenCalledWith(31, "user-1");
    expect(repository.listQuestionAttempts).toHaveBeenCalledWith(77, [1, 3]);
    expect(repository.listEssayOptions).toHaveBeenCalledWith([11, 13]);
  });

  it("orders limits by slot number rather than layout order", async () => {
    const repository = makeRepository({
      findQuizAttempt: vi.fn(async () => ({
        id: 31,
        quiz: 9,
        userid: "user-1",
        uniqueid: 77,
        layout: "1,0,4,2,0",
      })),
      listQuestionAttempts: vi.fn(async () => [
        { slot: 4, questionid: 40, questionusageid: 77 },
        { slot: 2, questionid: 20, questionusageid: 77 },
      ]),
      listEssayOptions: vi.fn(async () => [
        { questionid: 40, maxwordlimit: 300 },
        { questionid: 20, maxwordlimit: 150 },
      ]),
    });

    const result = await resolveWordLimits(quizContext({ attempt: "31", page: "1" }), {
      repository,
    });

    expect(toWordLimitPayload(result)).toEqual([150, 300]);
    expect(repository.listQuestionAttempts).toHaveBeenCalledWith(77, [2, 4]);
  });

  it("returns no limits when the attempt is not found", async () => {
    const repository = makeRepository();

    const result = await resolveWordLimits(quizContext({ attempt: "31" }), { repository });

    expect(toWordLimitPayload(result)).toEqual([]);
    expect(repository.listQuestionAttempts).not.toHaveBeenCalled();
  });

  it("returns no limits without an attempt id", async () => {
    const repository = makeRepository();

    const result = await resolveWordLimits(quizContext({}), { repository });

    expect(result).toEqual({ kind: "multiple", limits: [] });
    expect(repository.findQuizAttempt).not.toHaveBeenCalled();
  });

  it("uses the quiz slot join when configured", async () => {
    process.env.WORDLIMIT_QUIZ_SOURCE = "quiz_slots";
    const repository = makeRepository({
      listSlotWordLimits: vi.fn(async () => [
        { slot: 6, maxwordlimit: 80 },
        { slot: 2, maxwordlimit: null },
        { slot: 5, maxwordlimit: 40 },
      ]),
    });

    const result = await resolveWordLimits(quizContext({ attempt: "31", page: "2" }), {
      repository,
    });

    expect(result).toEqual({ kind: "multiple", limits: [40, 80] });
    expect(repository.listSlotWordLimits).toHaveBeenCalledWith(9, 2);
    expect(repository.findQuizAttempt).not.toHaveBeenCalled();
  });
});

describe("resolveWordLimits on other pages", () => {
  it("returns the not-applicable sentinel", async () => {
    const repository = makeRepository();
    const context: PageContext = {
      path: "/course/view.php",
      pageType: "course-view-topics",
      params: { id: "3" },
      instanceId: 3,
      userId: "user-1",
    };

    const result = await resolveWordLimits(context, { repository });

    expect(result).toEqual({ kind: "not_applicable" });
    expect(toWordLimitPayload(result)).toBe(0);
    expect(repository.getAssignmentConfigValue).not.toHaveBeenCalled();
  });
});

describe("parseWordLimitValue", () => {
  it("accepts positive integers", () => {
    expect(parseWordLimitValue("250")).toBe(250);
    expect(parseWordLimitValue(" 40 ")).toBe(40);
  });

  it("rejects empty, zero and non-numeric values", () => {
    expect(parseWordLimitValue(null)).toBeNull();
    expect(parseWordLimitValue("")).toBeNull();
    expect(parseWordLimitValue("0")).toBeNull();
    expect(parseWordLimitValue("12.5")).toBeNull();
  });
});
