import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CodeAnalyzer } from "../src/analysis/analyzer.js";
import { reviewPrCommand } from "../src/commands/reviewPr.js";
import { GitHubClient, parseRepoSlug } from "../src/github/client.js";
import { noChangedFilesComment } from "../src/github/comment.js";
import type { LlmProvider } from "../src/llm/provider.js";
import { PrReviewer } from "../src/pipeline/prReview.js";
import { resetUiRuntime } from "../src/ui/runtime.js";
import { CLEAN_LLM_ENV, withEnv } from "./helpers/env.js";
import { createFetchStub, jsonResponse, type Route } from "./helpers/fetch.js";

const API = "https://api.github.com/repos/acme/shop";

function githubRoutes(files: Array<{ filename: string; status: string }>): Route[] {
  return [
    (req) =>
      req.url === `${API}/pulls/7` ? jsonResponse(200, { number: 7, title: "Payments", head: { sha: "abc" } }) : undefined,
    (req) => (req.url.startsWith(`${API}/pulls/7/files`) ? jsonResponse(200, files) : undefined),
    (req) =>
      req.url === `${API}/contents/a.py?ref=abc`
        ? jsonResponse(200, { content: Buffer.from("x = 1\n").toString("base64"), encoding: "base64" })
        : undefined,
    (req) =>
      req.method === "POST" && req.url === `${API}/issues/7/comments`
        ? jsonResponse(201, { html_url: "https://github.com/acme/shop/pull/7#issuecomment-9" })
        : undefined,
  ];
}

function scripted(answers: string[]): LlmProvider {
  return {
    complete: async () => {
      const next = answers.shift();
      if (next === undefined) throw new Error("boom");
      return next;
    },
  };
}

function postedBodies(requests: Array<{ method: string; body?: string }>): string[] {
  return requests
    .filter((req) => req.method === "POST")
    .map((req) => {
      const parsed: { body: string } = JSON.parse(req.body || "{}");
      return parsed.body;
    });
}

test("reviewPullRequest analyzes reviewable files and posts one comment", async () => {
  const { fetchImpl, requests } = createFetchStub(
    githubRoutes([
      { filename: "a.py", status: "modified" },
      { filename: "b.py", status: "removed" },
      { filename: "c.js", status: "modified" },
      { filename: "d.py", status: "added" },
    ]),
  );
  const warnings: string[] = [];
  const reviewer = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), fetchImpl),
    analyzer: new CodeAnalyzer({
      provider: scripted(["🔴 CRITICAL - SQL injection", "quality notes", "migration notes", "refactor notes"]),
      promptSet: "pr",
      fallbackOnError: false,
      maxChars: 1000,
    }),
    extensions: [".py"],
    hooks: { onWarning: (message) => warnings.push(message) },
  });

  const outcome = await reviewer.reviewPullRequest(7);
  assert.deepEqual(outcome, {
    success: true,
    filesAnalyzed: 1,
    hasCritical: true,
    hasHigh: false,
    prTitle: "Payments",
    commentUrl: "https://github.com/acme/shop/pull/7#issuecomment-9",
  });
  assert.deepEqual(warnings, ["Could not get content for d.py, skipping"]);

  const [body] = postedBodies(requests);
  assert.ok(body.startsWith("## 🚨 AI Code Review - CRITICAL ISSUES FOUND\n"));
  assert.ok(body.includes("> **Scanned:** 1 Python file(s)  "));
  assert.ok(body.includes("### 📄 `a.py`"));
  assert.ok(body.includes("refactor notes"));
});

test("security-only reviews make one model call per file", async () => {
  const { fetchImpl } = createFetchStub(githubRoutes([{ filename: "a.py", status: "modified" }]));
  const answers = ["Severity: HIGH - weak hash"];
  const reviewer = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), fetchImpl),
    analyzer: new CodeAnalyzer({ provider: scripted(answers), promptSet: "pr", fallbackOnError: false, maxChars: 1000 }),
    extensions: [".py"],
    dryRun: true,
    publish: () => undefined,
  });

  const outcome = await reviewer.reviewPullRequest(7, false);
  assert.equal(outcome.hasHigh, true);
  assert.equal(outcome.hasCritical, false);
  assert.equal(answers.length, 0);
});

test("dry runs hand the comment to publish instead of posting", async () => {
  const { fetchImpl, requests } = createFetchStub(githubRoutes([{ filename: "a.py", status: "modified" }]));
  const published: string[] = [];
  const reviewer = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), fetchImpl),
    analyzer: new CodeAnalyzer({ provider: scripted(["all clear", "q", "m", "r"]), maxChars: 1000 }),
    extensions: [".py"],
    dryRun: true,
    publish: (body) => published.push(body),
  });

  const outcome = await reviewer.reviewPullRequest(7);
  assert.deepEqual(outcome, {
    success: true,
    filesAnalyzed: 1,
    hasCritical: false,
    hasHigh: false,
    prTitle: "Payments",
    commentUrl: undefined,
  });
  assert.equal(postedBodies(requests).length, 0);
  assert.equal(published.length, 1);
  assert.ok(published[0].startsWith("## ✅ AI Code Review - No Critical Issues\n"));
});

test("a PR without matching files gets the skip comment", async () => {
  const { fetchImpl, requests } = createFetchStub(githubRoutes([{ filename: "README.md", status: "modified" }]));
  const reviewer = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), fetchImpl),
    analyzer: new CodeAnalyzer({ maxChars: 1000 }),
    extensions: [".py"],
  });

  const outcome = await reviewer.reviewPullRequest(7);
  assert.equal(outcome.success, true);
  assert.equal(outcome.filesAnalyzed, 0);
  assert.equal(outcome.message, "No Python files to analyze");
  assert.deepEqual(postedBodies(requests), [noChangedFilesComment("Python")]);
});

test("failures fetching the PR or analyzing a file are reported, not posted", async () => {
  const { fetchImpl: missing } = createFetchStub([]);
  const notFound = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), missing),
    analyzer: new CodeAnalyzer({ maxChars: 1000 }),
    extensions: [".py"],
  });
  assert.deepEqual(await notFound.reviewPullRequest(7), {
    success: false,
    filesAnalyzed: 0,
    hasCritical: false,
    hasHigh: false,
    error: "Failed to get PR info: Failed to fetch PR #7 (404)",
  });

  const { fetchImpl, requests } = createFetchStub(githubRoutes([{ filename: "a.py", status: "modified" }]));
  const warnings: string[] = [];
  const failing = new PrReviewer({
    github: new GitHubClient("test-token", parseRepoSlug("acme/shop"), fetchImpl),
    analyzer: new CodeAnalyzer({ provider: scripted([]), fallbackOnError: false, maxChars: 1000 }),
    extensions: [".py"],
    hooks: { onWarning: (message) => warnings.push(message) },
  });
  const outcome = await failing.reviewPullRequest(7);
  assert.equal(outcome.success, true);
  assert.equal(outcome.filesAnalyzed, 0);
  assert.deepEqual(warnings, ["Error analyzing a.py: boom"]);
  assert.equal(postedBodies(requests).length, 0);
});

test("reviewPrCommand validates the token and fails the build on critical findings", async (t) => {
  t.mock.method(process.stdout, "write", () => true);
  const home = await fs.mkdtemp(path.join(os.tmpdir(), "ll-home-"));
  try {
    await withEnv({ ...CLEAN_LLM_ENV, LEGACYLENS_HOME: home, GITHUB_TOKEN: undefined }, async () => {
      await assert.rejects(() => reviewPrCommand({ pr: "7", repo: "acme/shop", demo: true, animation: false }), {
        message: "GITHUB_TOKEN environment variable is required",
      });
    });

    await withEnv({ ...CLEAN_LLM_ENV, LEGACYLENS_HOME: home, GITHUB_TOKEN: "test-token" }, async () => {
      await assert.rejects(() => reviewPrCommand({ pr: "seven", repo: "acme/shop", animation: false }), {
        message: "Invalid PR number 'seven'.",
      });
      await assert.rejects(() => reviewPrCommand({ pr: "7", repo: "acme/shop", animation: false }), {
        message: "An API key for openai is required (set LLM_API_KEY or use --demo)",
      });

      const { fetchImpl, requests } = createFetchStub(githubRoutes([{ filename: "a.py", status: "modified" }]));
      const result = await reviewPrCommand(
        { pr: "7", repo: "acme/shop", demo: true, dryRun: true, failOnCritical: true, animation: false },
        { fetchImpl },
      );
      assert.equal(result.outcome.hasCritical, true);
      assert.equal(result.exitCode, 1);
      assert.equal(postedBodies(requests).length, 0);
    });
  } finally {
    resetUiRuntime();
    await fs.rm(home, { recursive: true, force: true });
  }
});
