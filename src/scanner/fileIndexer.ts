import fs from "node:fs/promises";
import path from "node:path";
import type { SourceFile } from "../types.js";
import { relPosix } from "../utils/path.js";

export interface CollectSourceFilesOptions {
  rootDir: string;
  extensions: string[];
  maxDepth: number;
  maxFiles: number;
}

const EXCLUDED_DIRS = new Set([
  "node_modules",
  "__pycache__",
  "venv",
  "dist",
  "build",
  "coverage",
  "site-packages",
]);

export async function collectSourceFiles(options: CollectSourceFilesOptions): Promise<SourceFile[]> {
  const entries: SourceFile[] = [];
  const wanted = new Set(options.extensions.map((ext) => ext.toLowerCase()));

  async function walk(dir: string, depth: number): Promise<void> {
    if (entries.length >= options.maxFiles || depth > options.maxDepth) {
      return;
    }

    const children = await fs.readdir(dir, { withFileTypes: true });
    for (const child of children) {
      if (entries.length >= options.maxFiles) {
        break;
      }

      if (child.isDirectory()) {
        if (child.name.startsWith(".") || EXCLUDED_DIRS.has(child.name)) {
          continue;
        }
        await walk(path.join(dir, child.name), depth + 1);
        continue;
      }

      const ext = path.extname(child.name).toLowerCase();
      if (!wanted.has(ext)) {
        continue;
      }

      const absPath = path.join(dir, child.name);
      const stat = await fs.stat(absPath);
      if (!stat.isFile()) {
        continue;
      }

      entries.push({
        absPath,
        relPath: relPosix(options.rootDir, absPath),
      });
    }
  }

  await walk(options.rootDir, 0);
  entries.sort((a, b) => a.relPath.localeCompare(b.relPath));
  return entries;
}
