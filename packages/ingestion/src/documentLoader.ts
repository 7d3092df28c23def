import { promises as fs } from "node:fs";
import path from "node:path";
import { createLogger, toError, type SourceDocument } from "@kb/core";
import { DEFAULT_IGNORE_DIRS, DEFAULT_IGNORE_FILES, SUPPORTED_EXTENSIONS } from "./ignore.js";

const log = createLogger("ingestion");

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const ent of entries) {
    if (ent.isDirectory()) {
      if (DEFAULT_IGNORE_DIRS.has(ent.name)) continue;
      await walk(path.join(dir, ent.name), out);
    } else if (ent.isFile()) {
      if (DEFAULT_IGNORE_FILES.has(ent.name)) continue;
      out.push(path.join(dir, ent.name));
    }
  }
}

/**
 * Reads every plain-text document (.md, .txt) under `rootPath`, in sorted
 * path order. Binary formats are left to an external extractor. A file that
 * cannot be read is logged and skipped.
 */
export async function loadDocuments(params: { rootPath: string }): Promise<SourceDocument[]> {
  const rootPath = path.resolve(params.rootPath);
  const files: string[] = [];
  await walk(rootPath, files);
  files.sort();

  const docs: SourceDocument[] = [];
  for (const absPath of files) {
    const ext = path.extname(absPath).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.has(ext)) continue;

    const relPath = path.relative(rootPath, absPath).replaceAll("\\", "/");
    let content: string;
    try {
      content = await fs.readFile(absPath, "utf8");
    } catch (err) {
      log.error({ err: toError(err), path: relPath }, "Failed to read document, skipping");
      continue;
    }

    docs.push({
      path: relPath,
      content,
      attributes: {
        filename: path.basename(absPath),
        filePath: relPath,
        fileType: ext.slice(1),
      },
    });
  }

  return docs;
}
