import path from "node:path";
import type { ChangedFile, CommentResult, PrFileAnalysis, PrReviewOutcome } from "../types.js";
import type { CodeAnalyzer } from "../analysis/analyzer.js";
import { detectSeverity } from "../analysis/severity.js";
import type { GitHubClient } from "../github/client.js";
import { formatAnalysisComment, noChangedFilesComment } from "../github/comment.js";
import { languageForExtensions, languageForPath } from "../scanner/language.js";
import { formatLocalTimestamp } from "../utils/time.js";

export interface PrReviewHooks {
  onInfo?: (message: string) => void;
  onWarning?: (message: string) => void;
  onFileResult?: (analysis: PrFileAnalysis) => void;
}

export interface PrReviewerOptions {
  github: GitHubClient;
  analyzer: CodeAnalyzer;
  extensions: string[];
  /** Print the comment through `publish` instead of posting it. */
  dryRun?: boolean;
  publish?: (body: string) => void;
  hooks?: PrReviewHooks;
  now?: () => Date;
}

export class PrReviewer {
  private readonly hooks: PrReviewHooks;
  private readonly now: () => Date;

  constructor(private readonly options: PrReviewerOptions) {
    this.hooks = options.hooks || {};
    this.now = options.now || (() => new Date());
  }

  async reviewPullRequest(prNumber: number, fullAnalysis = true): Promise<PrReviewOutcome> {
    const { github } = this.options;
    const languageName = languageForExtensions(this.options.extensions);

    let prTitle: string;
    let headSha: string;
    try {
      const pr = await github.getPullRequest(prNumber);
      prTitle = pr.title;
      headSha = pr.headSha;
      this.info(`PR #${prNumber}: ${prTitle}`);
    } catch (error) {
      return failure(`Failed to get PR info: ${errorMessage(error)}`);
    }

    let files: ChangedFile[];
    try {
      files = (await github.listPullRequestFiles(prNumber)).filter((file) => this.isReviewable(file));
      this.info(`Found ${files.length} ${languageName} file(s) to analyze`);
    } catch (error) {
      return failure(`Failed to get changed files: ${errorMessage(error)}`);
    }

    if (files.length === 0) {
      const posted = await this.publishComment(prNumber, noChangedFilesComment(languageName));
      if (!posted.success) {
        return failure(posted.error || "Failed to post comment");
      }
      return {
        success: true,
        filesAnalyzed: 0,
        hasCritical: false,
        hasHigh: false,
        prTitle,
        commentUrl: posted.commentUrl,
        message: `No ${languageName} files to analyze`,
      };
    }

    const analyses: PrFileAnalysis[] = [];
    for (const file of files) {
      const content = await github.getFileContent(file.filename, headSha).catch(() => undefined);
      if (!content) {
        this.warn(`Could not get content for ${file.filename}, skipping`);
        continue;
      }

      this.info(`Analyzing ${file.filename}`);
      try {
        const analysis = await this.analyzeFile(file.filename, content, fullAnalysis);
        analyses.push(analysis);
        this.hooks.onFileResult?.(analysis);
      } catch (error) {
        this.warn(`Error analyzing ${file.filename}: ${errorMessage(error)}`);
      }
    }

    const hasCritical = analyses.some((analysis) => analysis.hasCriticalIssues);
    const hasHigh = analyses.some((analysis) => analysis.hasHighIssues);

    let commentUrl: string | undefined;
    if (analyses.length > 0) {
      const body = formatAnalysisComment({
        analyses,
        prTitle,
        hasCritical,
        hasHigh,
        languageName,
        repository: github.repository,
        timestamp: formatLocalTimestamp(this.now()),
      });
      const posted = await this.publishComment(prNumber, body);
      if (!posted.success) {
        return failure(posted.error || "Failed to post comment");
      }
      commentUrl = posted.commentUrl;
    }

    return {
      success: true,
      filesAnalyzed: analyses.length,
      hasCritical,
      hasHigh,
      prTitle,
      commentUrl,
    };
  }

  async analyzeFile(filename: string, code: string, fullAnalysis: boolean): Promise<PrFileAnalysis> {
    const { analyzer } = this.options;
    const language = languageForPath(filename);
    const security = (await analyzer.run("security", code, language)).text;
    const severity = detectSeverity(security);

    if (!fullAnalysis) {
      return {
        filename,
        security,
        quality: "",
        migration: "",
        refactoring: "",
        hasCriticalIssues: severity.critical,
        hasHighIssues: severity.high,
      };
    }

    const quality = (await analyzer.run("quality", code, language)).text;
    const migration = (await analyzer.run("migrate", code, language)).text;
    const refactoring = (await analyzer.run("refactor", code, language)).text;
    return {
      filename,
      security,
      quality,
      migration,
      refactoring,
      hasCriticalIssues: severity.critical,
      hasHighIssues: severity.high,
    };
  }

  private isReviewable(file: ChangedFile): boolean {
    if (file.status === "removed") {
      return false;
    }
    return this.options.extensions.includes(path.extname(file.filename).toLowerCase());
  }

  private async publishComment(prNumber: number, body: string): Promise<CommentResult> {
    if (this.options.dryRun) {
      this.options.publish?.(body);
      return { success: true };
    }
    this.info("Posting analysis results to PR");
    return this.options.github.postIssueComment(prNumber, body);
  }

  private info(message: string): void {
    this.hooks.onInfo?.(message);
  }

  private warn(message: string): void {
    this.hooks.onWarning?.(message);
  }
}

function failure(error: string): PrReviewOutcome {
  return { success: false, filesAnalyzed: 0, hasCritical: false, hasHigh: false, error };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
