import { parseRecordId } from "@/lib/wordlimits/context";
import type { PageRequest } from "@/lib/wordlimits/types";

export type ParsedPageRequest = PageRequest & {
  courseModuleId: number | null;
};

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

// The course module comes from the page url (cmid on quiz pages, id on module views).
export function parsePageRequest(searchParams: URLSearchParams): ParsedPageRequest {
  const rawUrl = searchParams.get("url");
  if (!isNonEmptyString(rawUrl)) {
    throw new Error("Page url is required.");
  }

  let pageUrl: URL;
  try {
    pageUrl = new URL(rawUrl.trim());
  } catch {
    throw new Error("Page url is invalid.");
  }

  const params: Record<string, string> = {};
  pageUrl.searchParams.forEach((value, key) => {
    params[key] = value;
  });

  return {
    path: pageUrl.pathname,
    pageType: searchParams.get("pagetype")?.trim() ?? "",
    params,
    courseModuleId: parseRecordId(params.cmid ?? params.id),
  };
}
