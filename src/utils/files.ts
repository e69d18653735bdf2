import { promises as fs } from "node:fs";
import path from "node:path";

function isFileMissing(error: unknown): boolean {
  return hasErrorCode(error, ["ENOENT"]);
}

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isFileMissing(error)) {
      return null;
    }
    throw error;
  }
}

/** Writes through a temp file and renames it over the target. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const absolutePath = path.resolve(filePath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  const tempPath = `${absolutePath}.tmp`;
  await fs.writeFile(tempPath, content, "utf-8");
  await replaceFileSafely(tempPath, absolutePath, content);
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows can keep the target locked; fall back to an in-place write.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  return hasErrorCode(error, ["EPERM", "EEXIST", "EBUSY"]);
}

function hasErrorCode(error: unknown, codes: string[]): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  const code = error.code;
  return typeof code === "string" && codes.includes(code);
}
