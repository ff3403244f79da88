import "server-only";

import { promises as fs } from "node:fs";

import { PDFParse } from "pdf-parse";

import { normalizeText } from "@/lib/text";

async function extractPdfText(buffer: Uint8Array): Promise<string> {
  const parser = new PDFParse({ data: buffer });
  try {
    const textResult = await parser.getText();
    return typeof textResult.text === "string" ? textResult.text : "";
  } finally {
    await parser.destroy();
  }
}

export async function extractPdfFileText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  return normalizeText(await extractPdfText(new Uint8Array(buffer)));
}
