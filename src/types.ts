export type LlmProviderType = "openai" | "gemini" | "anthropic" | "ollama" | "openai-compatible";

export type AnalysisKind = "security" | "quality" | "refactor" | "migrate";

export type AnalysisMode = AnalysisKind | "full";

export type PromptSet = "cli" | "pr";

export type ResponseSource = "llm" | "demo" | "fallback";

export interface LlmConfig {
  provider: LlmProviderType;
  model: string;
  baseUrl: string;
  apiKey?: string;
  maxTokens: number;
}

export interface AnalyzeOptions {
  file?: string;
  dir?: string;
  mode: AnalysisMode;
  output?: string;
  extensions: string[];
  maxChars: number;
  logFile?: string;
  demo: boolean;
  animation: boolean;
  llmProvider?: string;
  llmModel?: string;
  llmApiKey?: string;
}

export interface SourceLanguage {
  name: string;
  fence: string;
}

export interface SourceFile {
  absPath: string;
  relPath: string;
}

export interface AnalysisResult {
  kind: AnalysisKind;
  text: string;
  source: ResponseSource;
  clipped: boolean;
  error?: string;
}

export interface SeverityFlags {
  critical: boolean;
  high: boolean;
}

export interface FileReport {
  file: string;
  lines: number;
  output: string;
  severity: SeverityFlags;
}

export interface ChangedFile {
  filename: string;
  status: string;
}

export interface PullRequestInfo {
  number: number;
  title: string;
  headSha: string;
}

export interface CommentResult {
  success: boolean;
  commentUrl?: string;
  error?: string;
}

export interface PrFileAnalysis {
  filename: string;
  security: string;
  quality: string;
  migration: string;
  refactoring: string;
  hasCriticalIssues: boolean;
  hasHighIssues: boolean;
}

export interface PrReviewOutcome {
  success: boolean;
  filesAnalyzed: number;
  hasCritical: boolean;
  hasHigh: boolean;
  prTitle?: string;
  commentUrl?: string;
  message?: string;
  error?: string;
}

export interface StageLogEntry {
  ts: string;
  stage: string;
  event: "start" | "end" | "error";
  durationMs?: number;
  inputSummary?: Record<string, unknown>;
  counts?: Record<string, number>;
  warnings?: string[];
  error?: string;
}

export interface Logger {
  log(entry: StageLogEntry): Promise<void>;
  stageStart(stage: string, inputSummary?: Record<string, unknown>): Promise<number>;
  stageEnd(
    stage: string,
    startedAt: number,
    counts?: Record<string, number>,
    warnings?: string[],
  ): Promise<void>;
  stageError(stage: string, startedAt: number, error: unknown): Promise<void>;
}

export interface DoctorReport {
  timestamp: string;
  llmEnv: {
    provider: LlmProviderType;
    baseUrl: string;
    model: string;
    hasApiKey: boolean;
  };
  hasGithubToken: boolean;
  mode: "live" | "demo";
}
