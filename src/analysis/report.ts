import type { AnalysisKind } from "../types.js";

export const REPORT_RULE = "=".repeat(70);

export const FULL_REPORT_SECTIONS: Array<{ kind: AnalysisKind; title: string }> = [
  { kind: "security", title: "SECURITY VULNERABILITIES" },
  { kind: "quality", title: "CODE QUALITY ISSUES" },
  { kind: "migrate", title: "MIGRATION RECOMMENDATIONS" },
];

export function renderFullReport(input: {
  filename: string;
  generatedAt: string;
  sections: Array<{ title: string; text: string }>;
}): string {
  const lines = [
    `\n${REPORT_RULE}`,
    `FULL ANALYSIS REPORT: ${input.filename}`,
    `Generated: ${input.generatedAt}`,
    `${REPORT_RULE}\n`,
  ];

  input.sections.forEach((section, index) => {
    lines.push(`\n${REPORT_RULE}`);
    lines.push(`SECTION ${index + 1}: ${section.title}`);
    lines.push(REPORT_RULE);
    lines.push(section.text);
  });

  return lines.join("\n");
}

export function joinFileReports(reports: string[]): string {
  return reports.join("\n\n");
}
