import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { extractPdfFileText } from "@/lib/pdf";
import { tokenize } from "@/lib/text";

/** Smallest well-formed single-page PDF showing `line` in Helvetica. */
function buildPdf(line: string): Buffer {
  const content = `BT /F1 18 Tf 72 720 Td (${line}) Tj ET`;
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>",
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];

  let out = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(out.length);
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefAt = out.length;
  out += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) out += `${String(offset).padStart(10, "0")} 00000 n \n`;
  out += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return Buffer.from(out, "latin1");
}

let dir = "";

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "pdf-test-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("extractPdfFileText", () => {
  it("reads the text layer of a PDF", async () => {
    const filePath = path.join(dir, "cv.pdf");
    await fs.writeFile(filePath, buildPdf("Python developer with AWS"));

    const tokens = tokenize(await extractPdfFileText(filePath));
    expect(tokens).toContain("python");
    expect(tokens).toContain("developer");
    expect(tokens).toContain("aws");
  });

  it("rejects bytes that are not a PDF", async () => {
    const filePath = path.join(dir, "broken.pdf");
    await fs.writeFile(filePath, "this is not a pdf");

    await expect(extractPdfFileText(filePath)).rejects.toThrow();
  });
});
