import { NextResponse } from "next/server";

import { createDefaultAtsEngine } from "@/lib/ats";
import { fail, isStringArray, type ParseResult } from "@/lib/json";
import { parseStructuredResume, type ResumeSource } from "@/lib/resume";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const engine = createDefaultAtsEngine();

const EXACTLY_ONE_RESUME =
  "Please provide exactly one resume option: choose a saved resume OR upload a file (not both or neither).";

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

function readKeywords(form: FormData): ParseResult<string[]> {
  const values = form.getAll("keywords").filter((v): v is string => typeof v === "string");

  // A single field may carry the whole list as a JSON array; "[Go]" is not JSON and stays a keyword.
  const only = values.length === 1 ? values[0].trim() : "";
  if (!only.startsWith("[") || !only.endsWith("]")) return { ok: true, value: values };

  let parsed: unknown;
  try {
    parsed = JSON.parse(only);
  } catch {
    return { ok: true, value: values };
  }
  if (!isStringArray(parsed)) return fail("keywords", "must be a JSON array of strings");
  return { ok: true, value: parsed };
}

function readResume(form: FormData): ParseResult<ResumeSource> {
  const file = form.get("resume");
  const data = form.get("resumeData");

  // Browsers submit an empty file part when nothing was chosen.
  const upload = file === null || typeof file === "string" || file.size === 0 ? null : file;
  const resumeData = typeof data === "string" && data.trim().length > 0 ? data : null;

  if (upload && resumeData === null) {
    return { ok: true, value: { kind: "upload", fileName: upload.name, data: upload } };
  }

  if (resumeData !== null && !upload) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(resumeData);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return fail("resumeData", `invalid JSON: ${message}`);
    }
    const resume = parseStructuredResume(parsed, "resumeData");
    if (!resume.ok) return resume;
    return { ok: true, value: { kind: "structured", resume: resume.value } };
  }

  return { ok: false, error: EXACTLY_ONE_RESUME };
}

export async function POST(request: Request) {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return jsonError("Expected a multipart/form-data body");
  }

  const keywords = readKeywords(form);
  if (!keywords.ok) return jsonError(keywords.error);

  const resume = readResume(form);
  if (!resume.ok) return jsonError(resume.error);

  const description = form.get("description");
  const report = await engine.evaluate({
    job: {
      requiredSkills: keywords.value,
      description: typeof description === "string" ? description : null,
    },
    resume: resume.value,
  });

  return NextResponse.json(report);
}
