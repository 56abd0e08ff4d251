// Context collection

export interface ChangedFile {
  path: string;
  // null when the file could not be read
  content: string | null;
}

export interface DiffContext {
  base: string;
  diff: string;
  changedPaths: string[];
}

export interface CollectedContext {
  context: DiffContext;
  files: ChangedFile[];
}

// Review result

export type Severity = "critical" | "high" | "medium" | "low";

export type Category =
  | "security"
  | "best-practices"
  | "compliance"
  | "testing"
  | "code-quality";

export interface Issue {
  file: string;
  line?: number;
  severity: Severity;
  category: Category;
  title: string;
  description: string;
  suggestion?: string;
  codeExample?: string;
}

export interface ReviewResult {
  summary: string;
  severity: Severity;
  issues: Issue[];
  positiveNotes: string[];
}

export interface DroppedIssue {
  index: number;
  reason: string;
}

export type NormalizeResult =
  | { ok: true; review: ReviewResult; dropped: DroppedIssue[] }
  | { ok: false; error: string; raw: string };

// Publishing

export interface InlineComment {
  path: string;
  line: number;
  side: "RIGHT";
  body: string;
}

export interface CommentPayload {
  body: string;
  comments: InlineComment[];
}

export interface PullRequestTarget {
  owner: string;
  repo: string;
  pullNumber: number;
}

export type SubmitResult =
  | { ok: true }
  | { ok: false; reason: string; status?: number };

export type PublishOutcome =
  | { mode: "review"; commitSha?: string }
  | { mode: "fallback"; reason: string; status?: number };

// Collaborators

export interface VersionControl {
  diff(base: string): Promise<string>;
  changedPaths(base: string): Promise<string[]>;
}

export interface ReviewService {
  review(prompt: string): Promise<string>;
}

export interface ReviewPlatform {
  submitReview(
    target: PullRequestTarget,
    commitSha: string | undefined,
    body: string,
    comments: InlineComment[]
  ): Promise<SubmitResult>;
  // Throws when the comment cannot be created
  postComment(target: PullRequestTarget, body: string): Promise<void>;
  resolveHeadCommit(target: PullRequestTarget): Promise<string | undefined>;
}

// Configuration

export interface ReviewSettings {
  model: string;
  maxTokens: number;
  contextBudget: number;
}

export interface ReviewConfig {
  include: string[];
  ignore: string[];
  instructions?: string;
  settings: ReviewSettings;
}

export interface ActionInputs {
  baseRef: string;
  target: PullRequestTarget;
  githubToken: string;
  anthropicApiKey: string;
  headSha?: string;
  configPath: string;
  model?: string;
}
