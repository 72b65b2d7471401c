import type { DoctorReport } from "../types.js";
import { envValue } from "../config/env.js";
import { hasUsableCredentials } from "../llm/provider.js";
import { resolveEffectiveLlmConfig } from "../llm/resolve.js";
import { getUiRuntime } from "../ui/runtime.js";
import { nowIso } from "../utils/time.js";

export async function buildDoctorReport(): Promise<DoctorReport> {
  const llm = await resolveEffectiveLlmConfig({});
  const live = hasUsableCredentials(llm);
  return {
    timestamp: nowIso(),
    llmEnv: {
      provider: llm.provider,
      baseUrl: llm.baseUrl,
      model: llm.model,
      hasApiKey: Boolean(llm.apiKey),
    },
    hasGithubToken: Boolean(envValue("GITHUB_TOKEN")),
    mode: live ? "live" : "demo",
  };
}

export async function doctorCommand(): Promise<void> {
  printDoctorReport(await buildDoctorReport());
}

function printDoctorReport(report: DoctorReport): void {
  const { renderer } = getUiRuntime();
  renderer.section(`LegacyLens Doctor - ${report.timestamp}`);
  renderer.asciiTable(
    ["Check", "Value"],
    [
      ["Provider", report.llmEnv.provider],
      ["Base URL", report.llmEnv.baseUrl],
      ["Model", report.llmEnv.model],
      ["API key configured", report.llmEnv.hasApiKey ? "yes" : "no"],
      ["GITHUB_TOKEN set", report.hasGithubToken ? "yes" : "no"],
      ["Mode", report.mode],
    ],
  );
}
