import * as core from "@actions/core";
import { buildCommentPayload } from "./comment-mapper.js";
import { collectContext } from "./context-collector.js";
import { normalizeReview } from "./normalizer.js";
import { publishReview } from "./publisher.js";
import { requestReview } from "./review-requester.js";
import { evaluateSignal, type ExitSignal } from "./signal.js";
import type {
  CommentPayload,
  DroppedIssue,
  PublishOutcome,
  PullRequestTarget,
  ReviewConfig,
  ReviewPlatform,
  ReviewResult,
  ReviewService,
  VersionControl,
} from "./types.js";

export interface PipelineDeps {
  vcs: VersionControl;
  reviewService: ReviewService;
  platform: ReviewPlatform;
}

export interface PipelineOptions {
  baseRef: string;
  target: PullRequestTarget;
  headSha?: string;
  config: ReviewConfig;
  rootDir?: string;
}

export type PipelineOutcome =
  | { status: "skipped"; signal: ExitSignal }
  | { status: "parse-failed"; error: string; raw: string; signal: ExitSignal }
  | {
      status: "completed";
      review: ReviewResult;
      payload: CommentPayload;
      dropped: DroppedIssue[];
      publish: PublishOutcome;
      signal: ExitSignal;
    };

/**
 * collect → request → normalize → map → publish → evaluate, once.
 * Nothing to review ends early with success and without calling the review
 * service or the platform.
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineOutcome> {
  // ── Collect ──────────────────────────────────────────────────
  const { context, files } = await collectContext(deps.vcs, {
    base: options.baseRef,
    include: options.config.include,
    ignore: options.config.ignore,
    rootDir: options.rootDir,
  });

  if (files.length === 0) {
    core.info("No changed files of interest, skipping review");
    return { status: "skipped", signal: evaluateSignal([]) };
  }

  // ── Request ──────────────────────────────────────────────────
  const raw = await requestReview(deps.reviewService, context, files, {
    instructions: options.config.instructions,
    contextBudget: options.config.settings.contextBudget,
  });

  // ── Normalize ────────────────────────────────────────────────
  const normalized = normalizeReview(raw);
  if (!normalized.ok) {
    core.error(`Failed to parse review: ${normalized.error}`);
    core.startGroup("Raw review response");
    core.info(normalized.raw);
    core.endGroup();
    return {
      status: "parse-failed",
      error: normalized.error,
      raw: normalized.raw,
      signal: {
        failed: true,
        criticalCount: 0,
        message: `Review response could not be parsed: ${normalized.error}`,
      },
    };
  }

  const { review, dropped } = normalized;
  for (const d of dropped) {
    core.warning(`Dropped issue #${d.index} from review response: ${d.reason}`);
  }
  core.info(`Review parsed: ${review.issues.length} issue(s), overall ${review.severity}`);

  // ── Map & publish ────────────────────────────────────────────
  const payload = buildCommentPayload(review, dropped.length);
  const publish = await publishReview(deps.platform, {
    target: options.target,
    payload,
    commitSha: options.headSha,
  });

  return {
    status: "completed",
    review,
    payload,
    dropped,
    publish,
    signal: evaluateSignal(review.issues),
  };
}
