import * as core from "@actions/core";
import { renderFallbackBody } from "./comment-mapper.js";
import { describeRequestError } from "./github.js";
import type {
  CommentPayload,
  PublishOutcome,
  PullRequestTarget,
  ReviewPlatform,
} from "./types.js";

export interface PublishInput {
  target: PullRequestTarget;
  payload: CommentPayload;
  commitSha?: string;
}

async function resolveCommit(
  platform: ReviewPlatform,
  target: PullRequestTarget,
  commitSha?: string
): Promise<string | undefined> {
  if (commitSha) return commitSha;

  try {
    const resolved = await platform.resolveHeadCommit(target);
    if (resolved) {
      core.info(`Resolved head commit ${resolved}`);
      return resolved;
    }
    core.warning("Pull request has no head commit, submitting review without commit_id");
  } catch (err) {
    core.warning(
      `Could not resolve head commit, submitting review without commit_id: ${describeRequestError(err).reason}`
    );
  }
  return undefined;
}

/**
 * Submit the summary and inline comments as one review. If the platform
 * rejects it, post a single plain comment holding all of the content instead.
 * One attempt each, no retries. A failing fallback post propagates.
 */
export async function publishReview(
  platform: ReviewPlatform,
  input: PublishInput
): Promise<PublishOutcome> {
  const { target, payload } = input;
  const commitSha = await resolveCommit(platform, target, input.commitSha);

  const result = await platform.submitReview(target, commitSha, payload.body, payload.comments);
  if (result.ok) {
    core.info(`Review posted on ${target.owner}/${target.repo}#${target.pullNumber}`);
    return { mode: "review", commitSha };
  }

  const status = result.status !== undefined ? ` (HTTP ${result.status})` : "";
  core.warning(`Review submission rejected${status}: ${result.reason}. Posting fallback comment`);

  await platform.postComment(target, renderFallbackBody(payload, result.reason, result.status));
  core.info("Fallback comment posted");

  return { mode: "fallback", reason: result.reason, status: result.status };
}
