import type { AnalysisKind, AnalysisResult, Logger, PromptSet, SourceLanguage } from "../types.js";
import type { LlmProvider } from "../llm/provider.js";
import { NullLogger } from "../utils/logger.js";
import { formatLocalTimestamp } from "../utils/time.js";
import { loadDemoResponse } from "./demoResponses.js";
import { ANALYSIS_LABELS, renderPrompt } from "./prompts.js";
import { FULL_REPORT_SECTIONS, renderFullReport } from "./report.js";

export type StageWrapper = <T>(stage: string, fn: () => Promise<T>) => Promise<T>;

export interface CodeAnalyzerOptions {
  /** Without a provider every call answers from the bundled demo responses. */
  provider?: LlmProvider;
  promptSet?: PromptSet;
  /** When false a failed model call rejects instead of returning the sample answer. */
  fallbackOnError?: boolean;
  maxChars: number;
  logger?: Logger;
  withStage?: StageWrapper;
  onWarning?: (message: string) => void;
  demoDir?: string;
  now?: () => Date;
}

export interface FullAnalysis {
  report: string;
  results: AnalysisResult[];
}

const directStage: StageWrapper = (_stage, fn) => fn();

export class CodeAnalyzer {
  private readonly provider?: LlmProvider;
  private readonly promptSet: PromptSet;
  private readonly fallbackOnError: boolean;
  private readonly maxChars: number;
  private readonly logger: Logger;
  private readonly withStage: StageWrapper;
  private readonly onWarning?: (message: string) => void;
  private readonly demoDir?: string;
  private readonly now: () => Date;

  constructor(options: CodeAnalyzerOptions) {
    this.provider = options.provider;
    this.promptSet = options.promptSet || "cli";
    this.fallbackOnError = options.fallbackOnError ?? true;
    this.maxChars = options.maxChars;
    this.logger = options.logger || new NullLogger();
    this.withStage = options.withStage || directStage;
    this.onWarning = options.onWarning;
    this.demoDir = options.demoDir;
    this.now = options.now || (() => new Date());
  }

  get mode(): "live" | "demo" {
    return this.provider ? "live" : "demo";
  }

  async run(kind: AnalysisKind, code: string, language: SourceLanguage): Promise<AnalysisResult> {
    const label = ANALYSIS_LABELS[kind];
    // Printed once the stage (and its spinner) has finished.
    const pending: string[] = [];
    try {
      return await this.withStage(label, () => this.runStage(kind, label, code, language, pending));
    } finally {
      for (const warning of pending) {
        this.warn(warning);
      }
    }
  }

  private async runStage(
    kind: AnalysisKind,
    label: string,
    code: string,
    language: SourceLanguage,
    pending: string[],
  ): Promise<AnalysisResult> {
    const startedAt = await this.logger.stageStart(kind, {
      mode: this.mode,
      promptSet: this.promptSet,
      language: language.name,
      chars: code.length,
    });

    const clipped = code.length > this.maxChars;
    const warnings: string[] = [];
    if (clipped) {
      warnings.push(`Source clipped from ${code.length} to ${this.maxChars} chars before prompting.`);
    }
    pending.push(...warnings);
    const prompt = renderPrompt(this.promptSet, kind, clipped ? code.slice(0, this.maxChars) : code, language);

    if (!this.provider) {
      const text = await loadDemoResponse(kind, this.demoDir);
      await this.logger.stageEnd(kind, startedAt, { promptChars: prompt.length, responseChars: text.length }, warnings);
      return { kind, text, source: "demo", clipped };
    }

    try {
      const text = await this.provider.complete([{ role: "user", content: prompt }]);
      await this.logger.stageEnd(kind, startedAt, { promptChars: prompt.length, responseChars: text.length }, warnings);
      return { kind, text, source: "llm", clipped };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.logger.stageError(kind, startedAt, error);
      if (!this.fallbackOnError) {
        throw error;
      }
      pending.push(`${label} fell back to the sample response: ${message}`);
      const text = await loadDemoResponse(kind, this.demoDir);
      return { kind, text, source: "fallback", clipped, error: message };
    }
  }

  async fullAnalysis(code: string, filename: string, language: SourceLanguage): Promise<FullAnalysis> {
    const results: AnalysisResult[] = [];
    for (const section of FULL_REPORT_SECTIONS) {
      results.push(await this.run(section.kind, code, language));
    }

    const report = renderFullReport({
      filename,
      generatedAt: formatLocalTimestamp(this.now()),
      sections: FULL_REPORT_SECTIONS.map((section, index) => ({
        title: section.title,
        text: results[index].text,
      })),
    });

    return { report, results };
  }

  private warn(message: string): void {
    this.onWarning?.(message);
  }
}
