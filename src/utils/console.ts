import type { LlmConfig } from "../types.js";
import { getUiRuntime, setAnimationOverride } from "../ui/runtime.js";
import { PANEL_WIDTH } from "../ui/renderer.js";

export const TOOL_VERSION = "0.1.0";

export const USAGE_EXAMPLES = [
  "legacylens --file samples/order_service.py --security",
  "legacylens --file samples/order_service.py --refactor",
  "legacylens --file samples/order_service.py --full",
  "legacylens --dir samples/ --full --output report.md",
  "legacylens review-pr --pr 42 --repo owner/repo --fail-on-critical",
];

export function setConsoleAnimation(enabled: boolean): void {
  setAnimationOverride(enabled);
}

export function printBanner(): void {
  const ui = getUiRuntime();
  ui.renderer.panel(
    `LegacyLens v${TOOL_VERSION}`,
    [
      "AI-assisted review of legacy code",
      "security · quality · refactoring · migration",
    ],
    { width: PANEL_WIDTH },
  );
}

export function printUsageExamples(): void {
  const ui = getUiRuntime();
  ui.renderer.line(ui.theme.colors.warn("Usage examples:"));
  ui.renderer.bulletList(USAGE_EXAMPLES, 2);
  ui.renderer.line();
}

export function printLlmStatus(config: LlmConfig, live: boolean, forcedDemo = false): void {
  const ui = getUiRuntime();
  if (live) {
    ui.renderer.ok(`Connected to ${config.provider} (${config.model})`);
    return;
  }
  if (forcedDemo) {
    ui.renderer.warn("Running in DEMO mode with sample outputs (--demo).");
    return;
  }
  ui.renderer.warn(
    `No API key found for ${config.provider}. Running in DEMO mode with sample outputs.`,
  );
}

export function printRunPlanPanel(input: {
  target: string;
  mode: string;
  llm: LlmConfig;
  live: boolean;
  output?: string;
}): void {
  const ui = getUiRuntime();
  ui.renderer.panel(
    "Run Plan",
    [
      `Target: ${input.target}`,
      `Analysis: ${input.mode}`,
      `LLM: ${input.live ? `${input.llm.provider} / ${input.llm.model}` : "demo (sample responses)"}`,
      `Output: ${input.output || "stdout"}`,
    ],
    { width: PANEL_WIDTH },
  );
}
