import * as core from "@actions/core";
import type { InlineComment, PullRequestTarget, ReviewPlatform } from "./types.js";

type RepoParams = {
  owner: string;
  repo: string;
};

/**
 * The part of the Octokit REST client the platform calls. `github.getOctokit()`
 * satisfies it.
 */
export interface GitHubClient {
  rest: {
    pulls: {
      createReview(
        params: RepoParams & {
          pull_number: number;
          commit_id?: string;
          body: string;
          event: "COMMENT";
          comments: { path: string; line: number; side: "RIGHT"; body: string }[];
        }
      ): Promise<unknown>;
      get(
        params: RepoParams & { pull_number: number }
      ): Promise<{ data: { head: { sha: string } } }>;
    };
    issues: {
      createComment(params: RepoParams & { issue_number: number; body: string }): Promise<unknown>;
    };
  };
}

/**
 * Reduce an Octokit failure to a message and, when present, its HTTP status.
 */
export function describeRequestError(err: unknown): { reason: string; status?: number } {
  if (err instanceof Error) {
    const status = "status" in err && typeof err.status === "number" ? err.status : undefined;
    return { reason: err.message, status };
  }
  return { reason: String(err) };
}

export function createGitHubPlatform(octokit: GitHubClient): ReviewPlatform {
  return {
    async submitReview(
      target: PullRequestTarget,
      commitSha: string | undefined,
      body: string,
      comments: InlineComment[]
    ) {
      core.info(`Creating review with ${comments.length} inline comment(s)`);
      try {
        await octokit.rest.pulls.createReview({
          owner: target.owner,
          repo: target.repo,
          pull_number: target.pullNumber,
          ...(commitSha ? { commit_id: commitSha } : {}),
          body,
          event: "COMMENT",
          comments: comments.map((c) => ({
            path: c.path,
            line: c.line,
            side: c.side,
            body: c.body,
          })),
        });
        return { ok: true };
      } catch (err) {
        return { ok: false, ...describeRequestError(err) };
      }
    },

    async postComment(target, body) {
      await octokit.rest.issues.createComment({
        owner: target.owner,
        repo: target.repo,
        issue_number: target.pullNumber,
        body,
      });
    },

    async resolveHeadCommit(target) {
      const { data: pr } = await octokit.rest.pulls.get({
        owner: target.owner,
        repo: target.repo,
        pull_number: target.pullNumber,
      });
      return pr.head.sha || undefined;
    },
  };
}
