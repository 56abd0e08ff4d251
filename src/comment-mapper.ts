import { getLanguage } from "./prompts.js";
import type {
  CommentPayload,
  InlineComment,
  Issue,
  ReviewResult,
  Severity,
} from "./types.js";

export const MARKER_SUMMARY = "<!-- adversarial-review:summary -->";
export const MARKER_FALLBACK = "<!-- adversarial-review:fallback -->";

export const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: "🚨",
  high: "⚠️",
  medium: "⚡",
  low: "ℹ️",
};

const SEVERITY_ORDER: Severity[] = ["critical", "high", "medium", "low"];

const FOOTER = "*This review was generated by an AI model. Please verify all suggestions.*";

export type AnchoredIssue = Issue & { line: number };

export interface IssuePartition {
  inline: AnchoredIssue[];
  bodyOnly: Issue[];
}

export function hasAnchor(issue: Issue): issue is AnchoredIssue {
  return (
    issue.file.length > 0 &&
    typeof issue.line === "number" &&
    Number.isInteger(issue.line) &&
    issue.line > 0
  );
}

/**
 * Split issues into those the platform can anchor to a file line and those
 * that can only go into the summary. Order is preserved on both sides.
 */
export function partitionIssues(issues: Issue[]): IssuePartition {
  const inline: AnchoredIssue[] = [];
  const bodyOnly: Issue[] = [];
  for (const issue of issues) {
    if (hasAnchor(issue)) {
      inline.push(issue);
    } else {
      bodyOnly.push(issue);
    }
  }
  return { inline, bodyOnly };
}

export function renderIssueComment(issue: Issue): string {
  let body = `${SEVERITY_EMOJI[issue.severity]} **${issue.title}**\n\n`;
  body += `**Severity:** ${issue.severity} | **Category:** ${issue.category}\n\n`;
  body += `${issue.description}\n`;
  if (issue.suggestion) {
    body += `\n**Suggestion:** ${issue.suggestion}\n`;
  }
  if (issue.codeExample) {
    body += `\n\`\`\`${getLanguage(issue.file)}\n${issue.codeExample}\n\`\`\`\n`;
  }
  return body;
}

function formatLocation(issue: Issue): string | null {
  if (!issue.file) return null;
  return issue.line !== undefined ? `\`${issue.file}\` (line ${issue.line})` : `\`${issue.file}\``;
}

/**
 * Issue rendered for the summary body, with its file location when known.
 */
export function renderBodyOnlyIssue(issue: Issue): string {
  const location = formatLocation(issue);
  const body = renderIssueComment(issue);
  return location ? `${body}\n📍 ${location}\n` : body;
}

function renderSeverityTable(issues: Issue[]): string {
  let table = `| Severity | Count |\n|----------|-------|\n`;
  for (const severity of SEVERITY_ORDER) {
    const count = issues.filter((i) => i.severity === severity).length;
    if (count > 0) {
      table += `| ${SEVERITY_EMOJI[severity]} ${severity} | ${count} |\n`;
    }
  }
  return table;
}

/**
 * `omitted` counts issue records dropped as malformed; they are noted so the
 * pull request shows that findings are missing.
 */
export function renderSummaryBody(review: ReviewResult, bodyOnly: Issue[], omitted = 0): string {
  let body = `${MARKER_SUMMARY}\n## 🤖 AI Code Review\n\n`;
  body += `**Summary:** ${review.summary}\n\n`;
  body += `**Overall Severity:** ${review.severity.toUpperCase()}\n\n`;
  if (omitted > 0) {
    body += `> ⚠️ ${omitted} malformed finding(s) omitted from this review. See the action log.\n\n`;
  }

  if (review.issues.length === 0) {
    body += `✅ No issues found.\n\n`;
  } else {
    body += `### Issues Found\n\n${renderSeverityTable(review.issues)}\n`;
    const inlineCount = review.issues.length - bodyOnly.length;
    if (inlineCount > 0) {
      body += `${inlineCount} issue(s) are posted as inline comments.\n\n`;
    }
  }

  if (bodyOnly.length > 0) {
    body += `### Issues Without a Line Anchor\n\n`;
    body += bodyOnly.map(renderBodyOnlyIssue).join("\n---\n\n");
    body += `\n`;
  }

  if (review.positiveNotes.length > 0) {
    body += `### ✅ Positive Notes\n\n`;
    for (const note of review.positiveNotes) {
      body += `- ${note}\n`;
    }
    body += `\n`;
  }

  body += `---\n${FOOTER}`;
  return body;
}

export function buildCommentPayload(review: ReviewResult, omitted = 0): CommentPayload {
  const { inline, bodyOnly } = partitionIssues(review.issues);

  const comments: InlineComment[] = inline.map((issue) => ({
    path: issue.file,
    line: issue.line,
    side: "RIGHT" as const,
    body: renderIssueComment(issue),
  }));

  return { body: renderSummaryBody(review, bodyOnly, omitted), comments };
}

/**
 * Single unanchored comment used when the review submission is rejected.
 * Carries the full summary body and every inline comment under its location.
 */
export function renderFallbackBody(
  payload: CommentPayload,
  reason: string,
  status?: number
): string {
  const code = status !== undefined ? ` (HTTP ${status})` : "";
  let body = `${MARKER_FALLBACK}\n`;
  body += `> ⚠️ **Inline review could not be posted${code}:** ${reason}\n`;
  body += `> Findings meant as inline comments are listed at the end of this comment.\n\n`;
  body += payload.body;

  if (payload.comments.length > 0) {
    body += `\n\n### Inline Findings\n\n`;
    body += payload.comments
      .map((c) => `#### \`${c.path}:${c.line}\`\n\n${c.body}`)
      .join("\n---\n\n");
  }

  return body;
}
