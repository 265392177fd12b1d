import { stat } from "fs/promises";

// A path component is missing or is not a directory
const MISSING = new Set(["ENOENT", "ENOTDIR"]);

/**
 * True when path names a regular file; a directory or a missing path is not one
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && MISSING.has(String(error.code))) {
      return false;
    }
    throw error;
  }
}
