import "server-only";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

export const TMP_PREFIX = "ats-upload-";

/**
 * Writes `bytes` to a fresh private temp directory and runs `fn` against the file.
 * The directory is removed on every exit path, including when `fn` throws.
 */
export async function withTempCopy<T>(
  bytes: Uint8Array,
  suffix: string,
  fn: (filePath: string) => Promise<T>,
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), TMP_PREFIX));
  try {
    const filePath = path.join(dir, `upload${suffix}`);
    await fs.writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function readUploadBytes(data: Uint8Array | Blob): Promise<Uint8Array> {
  if (data instanceof Uint8Array) return data;
  // Blob reads are non-destructive: the caller can still persist the original upload.
  return new Uint8Array(await data.arrayBuffer());
}
