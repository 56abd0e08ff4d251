import { vi } from "vitest";
import type {
  Issue,
  ReviewConfig,
  ReviewPlatform,
  ReviewResult,
  ReviewService,
  VersionControl,
} from "../src/types.js";

export function makeIssue(partial: Partial<Issue> = {}): Issue {
  return {
    file: "src/app.ts",
    line: 10,
    severity: "medium",
    category: "code-quality",
    title: "Duplicated branch",
    description: "Both branches do the same thing.",
    ...partial,
  };
}

export function makeReview(partial: Partial<ReviewResult> = {}): ReviewResult {
  return {
    summary: "Looks mostly fine",
    severity: "medium",
    issues: [],
    positiveNotes: [],
    ...partial,
  };
}

export function makeConfig(partial: Partial<ReviewConfig> = {}): ReviewConfig {
  return {
    include: ["**/*.txt", "**/*.ts"],
    ignore: [],
    settings: {
      model: "test-model",
      maxTokens: 1000,
      contextBudget: 50000,
    },
    ...partial,
  };
}

export function makeVcs(paths: string[], diff = "diff --git a/a.txt b/a.txt\n+hello") {
  return {
    diff: vi.fn<VersionControl["diff"]>().mockResolvedValue(diff),
    changedPaths: vi.fn<VersionControl["changedPaths"]>().mockResolvedValue(paths),
  };
}

export function makeReviewService(text: string) {
  return {
    review: vi.fn<ReviewService["review"]>().mockResolvedValue(text),
  };
}

export function makePlatform() {
  return {
    submitReview: vi.fn<ReviewPlatform["submitReview"]>().mockResolvedValue({ ok: true }),
    postComment: vi.fn<ReviewPlatform["postComment"]>().mockResolvedValue(undefined),
    resolveHeadCommit: vi
      .fn<ReviewPlatform["resolveHeadCommit"]>()
      .mockResolvedValue("abc123"),
  };
}
