import type { ChangedFile, CommentResult, PullRequestInfo } from "../types.js";
import type { FetchLike } from "../llm/provider.js";

export const GITHUB_API_BASE = "https://api.github.com";

export interface RepoSlug {
  owner: string;
  repo: string;
}

export function parseRepoSlug(input: string): RepoSlug {
  const [owner, repo, ...rest] = input.trim().split("/");
  if (!owner || !repo || rest.length > 0 || !isValidGitHubName(owner) || !isValidGitHubName(repo)) {
    throw new Error(`Invalid repository '${input}'. Use the form owner/repo.`);
  }
  return { owner, repo };
}

function isValidGitHubName(value: string): boolean {
  return value.length <= 100 && /^[A-Za-z0-9._-]+$/.test(value);
}

interface PullFilePayload {
  filename: string;
  status: string;
}

/** Minimal REST v3 client for the calls a PR review needs. */
export class GitHubClient {
  private readonly slug: string;

  constructor(
    private readonly token: string,
    repo: RepoSlug,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly apiBase = GITHUB_API_BASE,
  ) {
    this.slug = `${repo.owner}/${repo.repo}`;
  }

  get repository(): string {
    return this.slug;
  }

  async getPullRequest(prNumber: number): Promise<PullRequestInfo> {
    const response = await this.request(`/repos/${this.slug}/pulls/${prNumber}`);
    if (!response.ok) {
      throw new Error(`Failed to fetch PR #${prNumber} (${response.status})`);
    }
    const json = (await response.json()) as {
      number?: number;
      title?: string;
      head?: { sha?: string };
    };
    if (!json.head?.sha) {
      throw new Error(`PR #${prNumber} response did not include a head commit.`);
    }
    return {
      number: json.number ?? prNumber,
      title: json.title || `PR #${prNumber}`,
      headSha: json.head.sha,
    };
  }

  async listPullRequestFiles(prNumber: number): Promise<ChangedFile[]> {
    const files: ChangedFile[] = [];
    for (let page = 1; ; page += 1) {
      const response = await this.request(`/repos/${this.slug}/pulls/${prNumber}/files?per_page=100&page=${page}`);
      if (!response.ok) {
        throw new Error(`Failed to list files for PR #${prNumber} (${response.status})`);
      }
      const batch = (await response.json()) as PullFilePayload[];
      for (const item of batch) {
        files.push({
          filename: item.filename,
          status: item.status,
        });
      }
      if (batch.length < 100) {
        return files;
      }
    }
  }

  /** Returns undefined when the file cannot be read at `ref`. */
  async getFileContent(filePath: string, ref: string): Promise<string | undefined> {
    const encodedPath = filePath.split("/").map(encodeURIComponent).join("/");
    const response = await this.request(`/repos/${this.slug}/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`);
    if (response.status !== 200) {
      return undefined;
    }
    const json = (await response.json()) as { content?: string; encoding?: string };
    if (typeof json.content !== "string") {
      return undefined;
    }
    if (json.encoding && json.encoding !== "base64") {
      return json.content;
    }
    return Buffer.from(json.content, "base64").toString("utf8");
  }

  async postIssueComment(issueNumber: number, body: string): Promise<CommentResult> {
    const response = await this.request(`/repos/${this.slug}/issues/${issueNumber}/comments`, {
      method: "POST",
      body: JSON.stringify({ body }),
    });

    if (response.status === 201) {
      const json = (await response.json()) as { html_url?: string };
      return { success: true, commentUrl: json.html_url };
    }

    const text = await response.text().catch(() => "");
    return {
      success: false,
      error: `Failed to post comment: ${response.status} - ${text.slice(0, 400)}`,
    };
  }

  private request(pathAndQuery: string, init: { method?: string; body?: string } = {}): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "LegacyLens",
    };
    if (init.body) {
      headers["Content-Type"] = "application/json";
    }
    return this.fetchImpl(`${this.apiBase}${pathAndQuery}`, {
      method: init.method || "GET",
      headers,
      body: init.body,
    });
  }
}
