import { z } from "zod";
import type {
  DroppedIssue,
  Issue,
  NormalizeResult,
  ReviewResult,
  Severity,
} from "./types.js";

export const SEVERITIES = ["critical", "high", "medium", "low"] as const;
export const CATEGORIES = [
  "security",
  "best-practices",
  "compliance",
  "testing",
  "code-quality",
] as const;

const SeveritySchema = z.enum(SEVERITIES);
const CategorySchema = z.enum(CATEGORIES);

const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((v) => (v ? v : undefined));

/**
 * Anchor line: a positive integer, or a string holding one. Anything else that
 * is still scalar (0, negatives, fractions, null, "n/a") means "no anchor".
 */
export function toAnchorLine(value: number | string | null | undefined): number | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return /^\d+$/.test(trimmed) && Number(trimmed) > 0 ? Number(trimmed) : undefined;
  }
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  return undefined;
}

const LineSchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform(toAnchorLine);

export const IssueSchema = z.object({
  file: z
    .string()
    .nullish()
    .transform((v) => (v ?? "").trim()),
  line: LineSchema,
  severity: SeveritySchema,
  category: CategorySchema,
  title: z.string(),
  description: z.string(),
  suggestion: OptionalTextSchema,
  code_example: OptionalTextSchema,
});

export const ReviewSchema = z.object({
  summary: z
    .string()
    .nullish()
    .transform((v) => v ?? ""),
  severity: SeveritySchema.nullish().transform((v): Severity => v ?? "low"),
  issues: z.array(z.unknown()),
  positive_notes: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
});

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

const JSON_FENCE = /^```json\b[^\n]*\n([\s\S]*?)^```[^\S\n]*$/gim;
const ANY_FENCE = /^```[^\n]*\n([\s\S]*?)^```[^\S\n]*$/gm;

/**
 * Places a JSON document may sit in a model answer, in order: fences tagged
 * json, any other fence, then the whole text. Fences open and close at the
 * start of a line, so backticks inside JSON strings do not end them.
 */
export function jsonCandidates(text: string): string[] {
  const fenced = [...text.matchAll(JSON_FENCE), ...text.matchAll(ANY_FENCE)].map((m) =>
    m[1].trim()
  );
  return [...fenced, text.trim()].filter(Boolean);
}

type ParsedCandidate = { ok: true; source: string; value: unknown } | { ok: false; error: string };

function parseFirstCandidate(text: string): ParsedCandidate | undefined {
  let firstError: string | undefined;
  for (const source of jsonCandidates(text)) {
    try {
      const value: unknown = JSON.parse(source);
      return { ok: true, source, value };
    } catch (err) {
      firstError ??= err instanceof Error ? err.message : String(err);
    }
  }
  return firstError === undefined ? undefined : { ok: false, error: firstError };
}

/**
 * The first candidate that parses as JSON, or the whole trimmed text.
 */
export function extractJSON(text: string): string {
  const parsed = parseFirstCandidate(text);
  return parsed?.ok ? parsed.source : text.trim();
}

/**
 * Validate a single issue record. Returns the issue, or the reason it was rejected.
 */
export function normalizeIssue(record: unknown): Issue | string {
  const parsed = IssueSchema.safeParse(record);
  if (!parsed.success) return formatZodError(parsed.error);

  const { code_example, ...rest } = parsed.data;
  return { ...rest, codeExample: code_example };
}

/**
 * Parse a raw model answer into a ReviewResult. Never throws: malformed JSON
 * or a malformed top level gives `ok: false` with the raw text kept. Issue
 * records that fail validation are dropped one by one and listed in `dropped`.
 */
export function normalizeReview(raw: string): NormalizeResult {
  const parsedJSON = parseFirstCandidate(raw);
  if (!parsedJSON) {
    return { ok: false, error: "Response contains no JSON", raw };
  }
  if (!parsedJSON.ok) {
    return { ok: false, error: `Invalid JSON: ${parsedJSON.error}`, raw };
  }

  const document = parsedJSON.value;

  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    return { ok: false, error: "Response JSON is not an object", raw };
  }

  const parsed = ReviewSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, error: `Invalid review shape: ${formatZodError(parsed.error)}`, raw };
  }

  const issues: Issue[] = [];
  const dropped: DroppedIssue[] = [];
  parsed.data.issues.forEach((record, index) => {
    const result = normalizeIssue(record);
    if (typeof result === "string") {
      dropped.push({ index, reason: result });
    } else {
      issues.push(result);
    }
  });

  const review: ReviewResult = {
    summary: parsed.data.summary,
    severity: parsed.data.severity,
    issues,
    positiveNotes: parsed.data.positive_notes,
  };

  return { ok: true, review, dropped };
}
