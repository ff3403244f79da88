import "server-only";

import mammoth from "mammoth";

import { toLines } from "@/lib/text";

/** Non-empty paragraphs of a .docx file in document order, one per line. */
export async function extractDocxFileText(filePath: string): Promise<string> {
  const result = await mammoth.extractRawText({ path: filePath });
  return toLines(result.value ?? "").join("\n");
}
