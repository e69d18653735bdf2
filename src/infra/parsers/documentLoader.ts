import { promises as fs } from "node:fs";
import path from "node:path";
import { normalizeText } from "../../utils/text.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".txt"]);

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new Error(
      `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }

  const content = await fs.readFile(filePath, "utf-8");
  return normalizeText(content);
}

/** Supported documents under `rootDir`, recursively, in sorted path order. */
export async function listDocumentFiles(rootDir: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [path.resolve(rootDir)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) {
      break;
    }
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && isSupportedDocumentExtension(fullPath)) {
        found.push(fullPath);
      }
    }
  }

  return found.sort();
}
