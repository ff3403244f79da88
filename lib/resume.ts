import { fail, isPlainObject, type ParseResult } from "@/lib/json";

export type PersonalInfo = {
  fullName?: string;
  headline?: string;
  location?: string;
};

export type EducationEntry = {
  school?: string;
  degree?: string;
  details?: string;
  duration?: string;
};

export type ExperienceEntry = {
  title?: string;
  company?: string;
  description?: string;
  duration?: string;
};

export type ProjectEntry = {
  title?: string;
  tech?: string;
  description?: string;
  duration?: string;
};

export type StructuredResume = {
  personal?: PersonalInfo;
  summary?: string;
  education?: EducationEntry[];
  experience?: ExperienceEntry[];
  projects?: ProjectEntry[];
  skills?: string[];
  achievements?: string;
};

export type ResumeSource =
  | { kind: "structured"; resume: StructuredResume }
  | { kind: "upload"; fileName: string; data: Uint8Array | Blob };

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function entries<T>(value: unknown, read: (raw: Record<string, unknown>) => T): T[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isPlainObject).map(read);
}

const readEducation = (raw: Record<string, unknown>): EducationEntry => ({
  school: str(raw.school),
  degree: str(raw.degree),
  details: str(raw.details),
  duration: str(raw.duration),
});

const readExperience = (raw: Record<string, unknown>): ExperienceEntry => ({
  title: str(raw.title),
  company: str(raw.company),
  description: str(raw.description),
  duration: str(raw.duration),
});

const readProject = (raw: Record<string, unknown>): ProjectEntry => ({
  title: str(raw.title),
  tech: str(raw.tech),
  description: str(raw.description),
  duration: str(raw.duration),
});

const EDUCATION_KEYS = ["school", "degree", "details", "duration"] as const;
const EXPERIENCE_KEYS = ["title", "company", "description", "duration"] as const;
const PROJECT_KEYS = ["title", "tech", "description", "duration"] as const;

/**
 * Reads a structured resume from untrusted JSON. Only the root shape is enforced;
 * fields of the wrong type read as empty strings. `personal.full_name` is the
 * stored spelling, `personal.fullName` is accepted too.
 */
export function parseStructuredResume(json: unknown, sourceLabel = "resume"): ParseResult<StructuredResume> {
  if (!isPlainObject(json)) return fail(sourceLabel, "root must be an object");

  const personal = isPlainObject(json.personal) ? json.personal : {};
  const skills = Array.isArray(json.skills) ? json.skills.filter((s): s is string => typeof s === "string") : [];

  return {
    ok: true,
    value: {
      personal: {
        fullName: str(personal.full_name) || str(personal.fullName),
        headline: str(personal.headline),
        location: str(personal.location),
      },
      summary: str(json.summary),
      education: entries(json.education, readEducation),
      experience: entries(json.experience, readExperience),
      projects: entries(json.projects, readProject),
      skills,
      achievements: str(json.achievements),
    },
  };
}

function joinFields<T extends object>(entry: T, keys: readonly (keyof T)[]): string {
  return keys.map((k) => str(entry[k])).join(" ");
}

export function structuredResumeToText(resume: StructuredResume): string {
  const parts: string[] = [];
  const personal = resume.personal ?? {};

  parts.push(personal.fullName ?? "", personal.headline ?? "", personal.location ?? "", resume.summary ?? "");
  for (const e of resume.education ?? []) parts.push(joinFields(e, EDUCATION_KEYS));
  for (const ex of resume.experience ?? []) parts.push(joinFields(ex, EXPERIENCE_KEYS));
  for (const p of resume.projects ?? []) parts.push(joinFields(p, PROJECT_KEYS));
  parts.push((resume.skills ?? []).join(" "));
  parts.push(resume.achievements ?? "");

  return parts.filter((p) => p.length > 0).join("\n");
}
