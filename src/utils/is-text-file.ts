import { open, stat } from "fs/promises";

const SNIFF_BYTES = 8192;

/**
 * Heuristic text check: a non-empty regular file with no NUL byte in the
 * first 8 KiB. Directories and other special files are never text.
 */
export async function isTextFile(path: string): Promise<boolean> {
  if (!(await stat(path)).isFile()) return false;

  const handle = await open(path, "r");
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    if (bytesRead === 0) return false;
    return !buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}
