import type { PrFileAnalysis } from "../types.js";

export interface CommentInput {
  analyses: PrFileAnalysis[];
  prTitle: string;
  hasCritical: boolean;
  hasHigh: boolean;
  languageName: string;
  repository: string;
  timestamp: string;
}

const DETAIL_SECTIONS: Array<{ key: keyof Pick<PrFileAnalysis, "security" | "quality" | "migration" | "refactoring">; summary: string }> = [
  { key: "security", summary: "🔒 Security Analysis" },
  { key: "quality", summary: "📊 Code Quality" },
  { key: "migration", summary: "📋 Migration Assessment" },
  { key: "refactoring", summary: "🔧 Refactoring Suggestions" },
];

export function statusHeadline(hasCritical: boolean, hasHigh: boolean): string {
  if (hasCritical) return "🚨 AI Code Review - CRITICAL ISSUES FOUND";
  if (hasHigh) return "⚠️ AI Code Review - HIGH SEVERITY ISSUES FOUND";
  return "✅ AI Code Review - No Critical Issues";
}

export function noChangedFilesComment(languageName: string): string {
  return `## ✅ AI Code Review\n\nNo ${languageName} files were changed in this PR. Skipping analysis.`;
}

export function formatAnalysisComment(input: CommentInput): string {
  const parts: string[] = [
    `## ${statusHeadline(input.hasCritical, input.hasHigh)}`,
    "",
    `> **PR:** ${input.prTitle}  `,
    `> **Scanned:** ${input.analyses.length} ${input.languageName} file(s)  `,
    `> **Time:** ${input.timestamp}`,
    "",
    "---",
    "",
  ];

  for (const analysis of input.analyses) {
    parts.push(`### 📄 \`${analysis.filename}\``, "");
    for (const section of DETAIL_SECTIONS) {
      const text = analysis[section.key];
      // security-only runs leave the other sections empty
      if (!text) continue;
      parts.push("<details>", `<summary>${section.summary}</summary>`, "", text.trim(), "", "</details>", "");
    }
    parts.push("---", "");
  }

  parts.push(mergeRecommendation(input.hasCritical, input.hasHigh));
  parts.push("", "---", `<sub>🤖 Generated by LegacyLens | https://github.com/${input.repository}</sub>`, "");
  return parts.join("\n");
}

function mergeRecommendation(hasCritical: boolean, hasHigh: boolean): string {
  if (hasCritical) {
    return [
      "## ⛔ Merge Recommendation",
      "",
      "**Critical security issues were found.** Please address these before merging:",
      "",
      "- [ ] Review and fix all 🔴 CRITICAL findings",
      "- [ ] Review and fix all 🟠 HIGH findings",
      "- [ ] Re-run the security scan",
      "",
      "<details>",
      "<summary>🤔 Need help fixing these issues?</summary>",
      "",
      "Generate a refactored version locally:",
      "```bash",
      "legacylens --file <your-file> --refactor",
      "```",
      "",
      "</details>",
    ].join("\n");
  }

  if (hasHigh) {
    return [
      "## ⚠️ Merge Recommendation",
      "",
      "**High severity issues were found.** Consider addressing these before merging:",
      "",
      "- [ ] Review all 🟠 HIGH findings",
      "- [ ] Decide if fixes are needed before merge or can be addressed later",
      "",
      "**Proceed with caution.**",
    ].join("\n");
  }

  return [
    "## ✅ Merge Recommendation",
    "",
    "No critical or high severity issues found. **Safe to proceed with merge** after standard code review.",
  ].join("\n");
}
