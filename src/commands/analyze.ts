import fs from "node:fs/promises";
import path from "node:path";
import type { AnalysisKind, AnalysisMode, AnalyzeOptions, FileReport } from "../types.js";
import { CodeAnalyzer } from "../analysis/analyzer.js";
import { joinFileReports } from "../analysis/report.js";
import { detectSeverity, mergeSeverity } from "../analysis/severity.js";
import { createLlmProvider, hasUsableCredentials, type FetchLike } from "../llm/provider.js";
import { resolveEffectiveLlmConfig } from "../llm/resolve.js";
import { collectSourceFiles } from "../scanner/fileIndexer.js";
import { languageForPath, parseExtensionList } from "../scanner/language.js";
import { getUiRuntime } from "../ui/runtime.js";
import {
  printBanner,
  printLlmStatus,
  printRunPlanPanel,
  printUsageExamples,
  setConsoleAnimation,
} from "../utils/console.js";
import { countLines, isDirectory, isFile, writeTextFile } from "../utils/fs.js";
import { createRunLogger } from "../utils/logger.js";
import { assetPath } from "../utils/path.js";

export interface AnalyzeCliOptions {
  file?: string;
  dir?: string;
  security?: boolean;
  quality?: boolean;
  refactor?: boolean;
  migrate?: boolean;
  full?: boolean;
  output?: string;
  ext?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  maxChars?: string;
  logFile?: string;
  demo?: boolean;
  animation?: boolean;
}

export interface AnalyzeDeps {
  cwd?: string;
  fetchImpl?: FetchLike;
  samplePath?: string;
}

export interface AnalyzeOutcome {
  output: string;
  mode: AnalysisMode;
  live: boolean;
  reports: FileReport[];
  savedTo?: string;
}

const MODE_PRECEDENCE: AnalysisKind[] = ["security", "quality", "refactor", "migrate"];

export function selectAnalysisMode(cli: Pick<AnalyzeCliOptions, AnalysisKind | "full">): AnalysisMode {
  for (const kind of MODE_PRECEDENCE) {
    if (cli[kind]) return kind;
  }
  return cli.full ? "full" : "security";
}

export function normalizeAnalyzeOptions(cli: AnalyzeCliOptions): AnalyzeOptions {
  return {
    file: cli.file,
    dir: cli.dir,
    // --dir always produces full reports.
    mode: cli.dir && !cli.file ? "full" : selectAnalysisMode(cli),
    output: cli.output,
    extensions: parseExtensionList(cli.ext),
    maxChars: clampNum(cli.maxChars, 60_000, 1_000, 400_000),
    logFile: cli.logFile,
    demo: cli.demo ?? false,
    animation: cli.animation ?? true,
    llmProvider: cli.provider,
    llmModel: cli.model,
    llmApiKey: cli.apiKey,
  };
}

export async function analyzeCommand(cli: AnalyzeCliOptions, deps: AnalyzeDeps = {}): Promise<AnalyzeOutcome> {
  if (cli.animation === false) {
    setConsoleAnimation(false);
  }
  const cwd = deps.cwd || process.cwd();
  const ui = getUiRuntime();
  ui.pacer.resetRun();
  printBanner();

  let effective = cli;
  if (!cli.file && !cli.dir) {
    printUsageExamples();
    const sample = deps.samplePath || assetPath("samples", "order_service.py");
    if (!(await isFile(sample))) {
      return { output: "", mode: "full", live: false, reports: [] };
    }
    ui.renderer.line(ui.theme.colors.primary("Running demo with sample file..."));
    effective = { ...cli, file: sample, full: true };
  }

  const options = normalizeAnalyzeOptions(effective);
  const llm = await resolveEffectiveLlmConfig({
    provider: options.llmProvider,
    model: options.llmModel,
    apiKey: options.llmApiKey,
  });
  const live = !options.demo && hasUsableCredentials(llm);

  printRunPlanPanel({
    target: options.file || options.dir || "",
    mode: options.mode,
    llm,
    live,
    output: options.output,
  });
  printLlmStatus(llm, live, options.demo);

  const logger = await createRunLogger(options.logFile ? path.resolve(cwd, options.logFile) : undefined);
  const analyzer = new CodeAnalyzer({
    provider: live ? createLlmProvider(llm, deps.fetchImpl) : undefined,
    promptSet: "cli",
    maxChars: options.maxChars,
    logger,
    withStage: (stage, fn) => ui.stageRunner.withStage(stage, fn),
    onWarning: (message) => ui.renderer.warn(message),
  });

  const reports = options.file
    ? [await analyzeSingleFile(analyzer, path.resolve(cwd, options.file), options.file, options.mode)]
    : await analyzeDirectory(analyzer, path.resolve(cwd, options.dir || "."), options);

  const output = options.file ? reports[0].output : joinFileReports(reports.map((report) => report.output));
  ui.renderer.block(output);

  if (!options.file && reports.length > 0) {
    printDirectorySummary(reports);
  }

  let savedTo: string | undefined;
  if (options.output) {
    savedTo = path.resolve(cwd, options.output);
    await writeTextFile(savedTo, output);
    ui.renderer.line();
    ui.renderer.ok(`Report saved to: ${options.output}`);
  }

  return { output, mode: options.mode, live, reports, savedTo };
}

async function analyzeSingleFile(
  analyzer: CodeAnalyzer,
  absPath: string,
  displayPath: string,
  mode: AnalysisMode,
): Promise<FileReport> {
  if (!(await isFile(absPath))) {
    throw new Error(`File not found: ${displayPath}`);
  }

  const ui = getUiRuntime();
  const code = await fs.readFile(absPath, "utf8");
  const filename = path.basename(absPath);
  const language = languageForPath(absPath);
  const lines = countLines(code);

  ui.renderer.line();
  ui.renderer.line(ui.theme.colors.primary(`Analyzing: ${filename}`));
  ui.renderer.line(`Lines of code: ${lines}`);

  if (mode === "full") {
    const full = await analyzer.fullAnalysis(code, filename, language);
    const security = full.results.find((result) => result.kind === "security");
    return {
      file: displayPath,
      lines,
      output: full.report,
      severity: detectSeverity(security?.text || ""),
    };
  }

  const result = await analyzer.run(mode, code, language);
  return {
    file: displayPath,
    lines,
    output: result.text,
    severity: mode === "security" ? detectSeverity(result.text) : { critical: false, high: false },
  };
}

async function analyzeDirectory(
  analyzer: CodeAnalyzer,
  rootDir: string,
  options: AnalyzeOptions,
): Promise<FileReport[]> {
  if (!(await isDirectory(rootDir))) {
    throw new Error(`Directory not found: ${options.dir}`);
  }

  const files = await collectSourceFiles({
    rootDir,
    extensions: options.extensions,
    maxDepth: 12,
    maxFiles: 500,
  });

  if (files.length === 0) {
    getUiRuntime().renderer.warn(`No ${options.extensions.join(", ")} files found under ${options.dir}`);
    return [];
  }

  const reports: FileReport[] = [];
  for (const file of files) {
    reports.push(await analyzeSingleFile(analyzer, file.absPath, file.relPath, "full"));
  }
  return reports;
}

function printDirectorySummary(reports: FileReport[]): void {
  const ui = getUiRuntime();
  ui.renderer.line();
  ui.renderer.section("Summary");
  ui.renderer.asciiTable(
    ["File", "Lines", "Critical", "High"],
    reports.map((report) => [
      report.file,
      String(report.lines),
      report.severity.critical ? "yes" : "no",
      report.severity.high ? "yes" : "no",
    ]),
  );

  const overall = mergeSeverity(reports.map((report) => report.severity));
  if (overall.critical) {
    ui.renderer.error("CRITICAL security issues found");
  } else if (overall.high) {
    ui.renderer.warn("HIGH severity issues found - review recommended");
  } else {
    ui.renderer.ok("No critical or high severity issues");
  }
}

function clampNum(value: string | undefined, fallback: number, min: number, max: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(parsed)));
}
