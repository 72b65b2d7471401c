import fs from "node:fs/promises";
import path from "node:path";
import type { AnalysisKind } from "../types.js";
import { assetPath } from "../utils/path.js";

export const MISSING_DEMO_RESPONSE = "Demo response";

const cache = new Map<string, string>();

export function demoResponsePath(kind: AnalysisKind, demoDir = assetPath("assets", "demo")): string {
  return path.join(demoDir, `${kind}.md`);
}

/** Bundled sample answer for `kind`, printed when no model is reachable. */
export async function loadDemoResponse(kind: AnalysisKind, demoDir?: string): Promise<string> {
  const file = demoResponsePath(kind, demoDir);
  const cached = cache.get(file);
  if (cached !== undefined) {
    return cached;
  }

  const text = await fs.readFile(file, "utf8").catch(() => "");
  const response = text.trim() ? `\n${text.trimEnd()}\n` : MISSING_DEMO_RESPONSE;
  cache.set(file, response);
  return response;
}
