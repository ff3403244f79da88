import { NextResponse } from "next/server";

import { loadAtsConfig } from "@/lib/config";
import { fail, isPlainObject, isStringArray, type ParseResult } from "@/lib/json";
import { resolveJobKeywords, type JobKeywordSource } from "@/lib/keywords";
import { logWarning } from "@/lib/log";

const { config, warnings } = loadAtsConfig();
for (const warning of warnings) logWarning("[ats] config:", warning);

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

function parseJobKeywordSource(json: unknown): ParseResult<JobKeywordSource> {
  if (!isPlainObject(json)) return fail("body", "root must be an object");
  const { requiredSkills, description } = json;

  if (requiredSkills !== undefined && requiredSkills !== null && !isStringArray(requiredSkills)) {
    return fail("body", "requiredSkills must be string[]");
  }
  if (description !== undefined && description !== null && typeof description !== "string") {
    return fail("body", "description must be a string");
  }

  return {
    ok: true,
    value: {
      requiredSkills: isStringArray(requiredSkills) ? requiredSkills : null,
      description: typeof description === "string" ? description : null,
    },
  };
}

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return jsonError("Invalid JSON body");
  }

  const job = parseJobKeywordSource(body);
  if (!job.ok) return jsonError(job.error);

  return NextResponse.json(resolveJobKeywords(job.value, config.maxDerivedKeywords));
}
