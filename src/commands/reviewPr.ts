import type { PrReviewOutcome } from "../types.js";
import { CodeAnalyzer } from "../analysis/analyzer.js";
import { envValue } from "../config/env.js";
import { GitHubClient, parseRepoSlug } from "../github/client.js";
import { createLlmProvider, hasUsableCredentials, PR_MAX_TOKENS, type FetchLike } from "../llm/provider.js";
import { resolveEffectiveLlmConfig } from "../llm/resolve.js";
import { PrReviewer } from "../pipeline/prReview.js";
import { parseExtensionList } from "../scanner/language.js";
import { getUiRuntime } from "../ui/runtime.js";
import { setConsoleAnimation } from "../utils/console.js";
import { createRunLogger } from "../utils/logger.js";

export interface ReviewPrCliOptions {
  pr: string;
  repo?: string;
  securityOnly?: boolean;
  failOnCritical?: boolean;
  ext?: string;
  dryRun?: boolean;
  demo?: boolean;
  provider?: string;
  model?: string;
  logFile?: string;
  animation?: boolean;
}

export interface ReviewPrDeps {
  fetchImpl?: FetchLike;
}

export interface ReviewPrResult {
  outcome: PrReviewOutcome;
  exitCode: number;
}

export async function reviewPrCommand(cli: ReviewPrCliOptions, deps: ReviewPrDeps = {}): Promise<ReviewPrResult> {
  if (cli.animation === false) {
    setConsoleAnimation(false);
  }
  const ui = getUiRuntime();
  ui.pacer.resetRun();

  const prNumber = Number(cli.pr);
  if (!Number.isInteger(prNumber) || prNumber <= 0) {
    throw new Error(`Invalid PR number '${cli.pr}'.`);
  }

  const token = envValue("GITHUB_TOKEN");
  if (!token) {
    throw new Error("GITHUB_TOKEN environment variable is required");
  }

  const repoInput = cli.repo || envValue("GITHUB_REPOSITORY");
  if (!repoInput) {
    throw new Error("Repository is required: pass --repo owner/repo or set GITHUB_REPOSITORY");
  }

  const llm = await resolveEffectiveLlmConfig({
    provider: cli.provider,
    model: cli.model,
    maxTokens: PR_MAX_TOKENS,
  });
  if (!cli.demo && !hasUsableCredentials(llm)) {
    throw new Error(`An API key for ${llm.provider} is required (set LLM_API_KEY or use --demo)`);
  }

  const fetchImpl = deps.fetchImpl || fetch;
  const github = new GitHubClient(token, parseRepoSlug(repoInput), fetchImpl);
  const analyzer = new CodeAnalyzer({
    provider: cli.demo ? undefined : createLlmProvider(llm, fetchImpl),
    promptSet: "pr",
    fallbackOnError: false,
    maxChars: 60_000,
    logger: await createRunLogger(cli.logFile),
    withStage: (stage, fn) => ui.stageRunner.withStage(stage, fn),
    onWarning: (message) => ui.renderer.warn(message),
  });

  ui.renderer.line(ui.theme.colors.primary(`Analyzing PR #${prNumber} in ${github.repository}...`));

  const reviewer = new PrReviewer({
    github,
    analyzer,
    extensions: parseExtensionList(cli.ext),
    dryRun: cli.dryRun,
    publish: (body) => ui.renderer.block(body),
    hooks: {
      onInfo: (message) => ui.renderer.line(message),
      onWarning: (message) => ui.renderer.warn(message),
      onFileResult: (analysis) => {
        if (analysis.hasCriticalIssues) ui.renderer.error(`${analysis.filename}: CRITICAL issues found`);
        if (analysis.hasHighIssues) ui.renderer.warn(`${analysis.filename}: HIGH issues found`);
      },
    },
  });

  const outcome = await reviewer.reviewPullRequest(prNumber, !cli.securityOnly);
  const exitCode = printSummary(outcome, Boolean(cli.failOnCritical));
  return { outcome, exitCode };
}

function printSummary(outcome: PrReviewOutcome, failOnCritical: boolean): number {
  const ui = getUiRuntime();
  ui.renderer.line();
  ui.renderer.section("Analysis summary");

  if (!outcome.success) {
    ui.renderer.error(`Analysis failed: ${outcome.error}`);
    return 1;
  }

  ui.renderer.ok(`Analyzed ${outcome.filesAnalyzed} file(s)`);
  if (outcome.commentUrl) {
    ui.renderer.line(`Comment: ${outcome.commentUrl}`);
  }

  if (outcome.hasCritical) {
    ui.renderer.error("CRITICAL security issues found");
    if (failOnCritical) {
      ui.renderer.error("Failing build due to --fail-on-critical");
      return 1;
    }
  } else if (outcome.hasHigh) {
    ui.renderer.warn("HIGH severity issues found - review recommended");
  } else {
    ui.renderer.ok("No critical or high severity issues");
  }
  return 0;
}
