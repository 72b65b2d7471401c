import path from "node:path";
import type { SourceLanguage } from "../types.js";

const EXT_TO_LANGUAGE: Record<string, SourceLanguage> = {
  ".py": { name: "Python", fence: "python" },
  ".ts": { name: "TypeScript", fence: "typescript" },
  ".tsx": { name: "TypeScript", fence: "tsx" },
  ".js": { name: "JavaScript", fence: "javascript" },
  ".jsx": { name: "JavaScript", fence: "jsx" },
  ".mjs": { name: "JavaScript", fence: "javascript" },
  ".cjs": { name: "JavaScript", fence: "javascript" },
  ".go": { name: "Go", fence: "go" },
  ".rs": { name: "Rust", fence: "rust" },
  ".java": { name: "Java", fence: "java" },
  ".kt": { name: "Kotlin", fence: "kotlin" },
  ".rb": { name: "Ruby", fence: "ruby" },
  ".php": { name: "PHP", fence: "php" },
  ".swift": { name: "Swift", fence: "swift" },
  ".c": { name: "C", fence: "c" },
  ".h": { name: "C", fence: "c" },
  ".cc": { name: "C++", fence: "cpp" },
  ".cpp": { name: "C++", fence: "cpp" },
  ".hpp": { name: "C++", fence: "cpp" },
  ".cs": { name: "C#", fence: "csharp" },
  ".sh": { name: "Shell", fence: "bash" },
  ".sql": { name: "SQL", fence: "sql" },
};

const UNKNOWN_LANGUAGE: SourceLanguage = { name: "source", fence: "" };

export function languageForPath(filePath: string): SourceLanguage {
  return EXT_TO_LANGUAGE[path.extname(filePath).toLowerCase()] || UNKNOWN_LANGUAGE;
}

export function languageForExtensions(extensions: string[]): string {
  const names = new Set(extensions.map((ext) => languageForPath(`file${ext}`).name));
  return names.size === 1 ? Array.from(names)[0] : "source";
}

/** Accepts `py,.ts, JS` style lists; returns lowercase dotted extensions. */
export function parseExtensionList(value: string | undefined, fallback: string[] = [".py"]): string[] {
  if (!value) return fallback;
  const set = new Set<string>();
  for (const part of value.split(",")) {
    const trimmed = part.trim().toLowerCase();
    if (!trimmed) continue;
    set.add(trimmed.startsWith(".") ? trimmed : `.${trimmed}`);
  }
  return set.size > 0 ? Array.from(set) : fallback;
}
