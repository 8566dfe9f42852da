import { NextResponse } from "next/server";
import { createServerSupabaseClient } from "@/lib/supabase/server";
import { isWordLimitedPage } from "@/lib/wordlimits/context";
import { isConfigurationMissingError } from "@/lib/wordlimits/errors";
import { createSupabaseWordLimitRepository } from "@/lib/wordlimits/repository";
import { resolveWordLimits, toWordLimitPayload } from "@/lib/wordlimits/resolver";
import { parsePageRequest, type ParsedPageRequest } from "@/lib/wordlimits/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: Request) {
  const supabase = await createServerSupabaseClient();
  const {
    data: { user },
  } = await supabase.auth.getUser();

  if (!user) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  let request: ParsedPageRequest;
  try {
    request = parsePageRequest(new URL(req.url).searchParams);
  } catch (error) {
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Invalid request." },
      { status: 400 },
    );
  }

  if (!isWordLimitedPage(request)) {
    return NextResponse.json({ wordlimits: toWordLimitPayload({ kind: "not_applicable" }) });
  }

  if (request.courseModuleId === null) {
    return NextResponse.json({ error: "Course module id is required." }, { status: 400 });
  }

  const repository = createSupabaseWordLimitRepository(supabase);

  try {
    // Instance is resolved here, never taken from the client.
    const instanceId = await repository.getCourseModuleInstance(request.courseModuleId);
    if (instanceId === null) {
      return NextResponse.json({ error: "Course module not found." }, { status: 404 });
    }

    const result = await resolveWordLimits(
      {
        path: request.path,
        pageType: request.pageType,
        params: request.params,
        instanceId,
        userId: user.id,
      },
      { repository },
    );
    return NextResponse.json({ wordlimits: toWordLimitPayload(result) });
  } catch (error) {
    const message = error instanceof Error ? error.message : "Failed to load word limits.";
    console.error("Failed to resolve word limits", {
      path: request.path,
      courseModuleId: request.courseModuleId,
      configurationMissing: isConfigurationMissingError(error),
      error: message,
    });
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
