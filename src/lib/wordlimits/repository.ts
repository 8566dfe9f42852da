import "server-only";

import type { SupabaseClient } from "@supabase/supabase-js";
import { ConfigurationMissingError } from "@/lib/wordlimits/errors";
import type {
  AssignmentPluginConfigRow,
  CourseModuleRow,
  EssayOptionsRow,
  QuestionAttemptRow,
  QuizAttemptRow,
  SlotWordLimitRow,
} from "@/lib/wordlimits/types";

const ASSIGNMENT_CONFIG_TABLE = "assign_plugin_config";

export interface WordLimitRepository {
  getCourseModuleInstance(courseModuleId: number): Promise<number | null>;
  getAssignmentConfigValue(assignmentId: number, name: string): Promise<string | null>;
  findQuizAttempt(attemptId: number, userId: string): Promise<QuizAttemptRow | null>;
  listQuestionAttempts(questionUsageId: number, slots: number[]): Promise<QuestionAttemptRow[]>;
  listEssayOptions(questionIds: number[]): Promise<EssayOptionsRow[]>;
  listSlotWordLimits(quizId: number, page: number): Promise<SlotWordLimitRow[]>;
}

type SlotJoinRow = {
  slot: number;
  qtype_essay_options: { maxwordlimit: number | null } | { maxwordlimit: number | null }[] | null;
};

export function createSupabaseWordLimitRepository(supabase: SupabaseClient): WordLimitRepository {
  return {
    async getCourseModuleInstance(courseModuleId) {
      const { data, error } = await supabase
        .from("course_modules")
        .select("id,instance")
        .eq("id", courseModuleId)
        .maybeSingle<CourseModuleRow>();

      if (error) {
        throw new Error(error.message);
      }
      return data?.instance ?? null;
    },

    async getAssignmentConfigValue(assignmentId, name) {
      const { data, error } = await supabase
        .from(ASSIGNMENT_CONFIG_TABLE)
        .select("assignment,name,value")
        .eq("assignment", assignmentId)
        .eq("name", name)
        .maybeSingle<AssignmentPluginConfigRow>();

      if (error) {
        throw new Error(error.message);
      }
      if (!data) {
        throw new ConfigurationMissingError({
          table: ASSIGNMENT_CONFIG_TABLE,
          ownerId: assignmentId,
          key: name,
        });
      }
      return data.value;
    },

    async findQuizAttempt(attemptId, userId) {
      const { data, error } = await supabase
        .from("quiz_attempts")
        .select("id,quiz,userid,uniqueid,layout")
        .eq("id", attemptId)
        .eq("userid", userId)
        .maybeSingle<QuizAttemptRow>();

      if (error) {
        throw new Error(error.message);
      }
      return data ?? null;
    },

    async listQuestionAttempts(questionUsageId, slots) {
      if (slots.length === 0) {
        return [];
      }

      const { data, error } = await supabase
        .from("question_attempts")
        .select("slot,questionid,questionusageid")
        .eq("questionusageid", questionUsageId)
        .in("slot", slots)
        .returns<QuestionAttemptRow[]>();

      if (error) {
        throw new Error(error.message);
      }
      return data ?? [];
    },

    async listEssayOptions(questionIds) {
      if (questionIds.length === 0) {
        return [];
      }

      const { data, error } = await supabase
        .from("qtype_essay_options")
        .select("questionid,maxwordlimit")
        .in("questionid", questionIds)
        .returns<EssayOptionsRow[]>();

      if (error) {
        throw new Error(error.message);
      }
      return data ?? [];
    },

    async listSlotWordLimits(quizId, page) {
      // quiz_slots.page is 1-based.
      const { data, error } = await supabase
        .from("quiz_slots")
        .select("slot,qtype_essay_options!inner(maxwordlimit)")
        .eq("quizid", quizId)
        .eq("page", page + 1)
        .order("slot", { ascending: true })
        .returns<SlotJoinRow[]>();

      if (error) {
        throw new Error(error.message);
      }

      return (data ?? []).map((row) => {
        const options = Array.isArray(row.qtype_essay_options)
          ? row.qtype_essay_options[0]
          : row.qtype_essay_options;
        return {
          slot: row.slot,
          maxwordlimit: options?.maxwordlimit ?? null,
        };
      });
    },
  };
}
