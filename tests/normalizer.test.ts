import { describe, it, expect } from "vitest";
import {
  extractJSON,
  jsonCandidates,
  normalizeIssue,
  normalizeReview,
  toAnchorLine,
} from "../src/normalizer.js";

const RESPONSE = {
  summary: "ok",
  severity: "low",
  issues: [
    {
      file: "a.txt",
      line: 5,
      severity: "medium",
      category: "code-quality",
      title: "t",
      description: "d",
    },
  ],
  positive_notes: [],
};

const validIssue = (overrides: Record<string, unknown> = {}) => ({
  file: "src/app.ts",
  line: 3,
  severity: "high",
  category: "security",
  title: "Hardcoded key",
  description: "A key is committed.",
  ...overrides,
});

describe("extractJSON", () => {
  it("prefers a fence tagged json", () => {
    const text = "Example:\n```ts\nconst x = 1;\n```\nResult:\n```json\n{\"a\": 1}\n```\n";
    expect(extractJSON(text)).toBe('{"a": 1}');
  });

  it("falls back to any fence", () => {
    const text = "Here you go\n```\n{\"a\": 2}\n```";
    expect(extractJSON(text)).toBe('{"a": 2}');
  });

  it("uses the whole text when there is no fence", () => {
    expect(extractJSON('  {"a": 3}\n')).toBe('{"a": 3}');
  });

  it("moves on to the next fence when one does not parse", () => {
    const text = "Example:\n```\nnot json\n```\n```\n{\"a\": 5}\n```";
    expect(extractJSON(text)).toBe('{"a": 5}');
  });

  it("does not treat backticks inside a JSON string as a fence", () => {
    const text = JSON.stringify({ code: "```ts\nconst x = 1;\n```" });
    expect(jsonCandidates(text)).toEqual([text]);
    expect(extractJSON(text)).toBe(text);
  });
});

describe("jsonCandidates", () => {
  it("lists json fences, other fences, then the whole text", () => {
    const text = "```ts\nconst x = 1;\n```\n```json\n{}\n```";
    expect(jsonCandidates(text)).toEqual(["{}", "const x = 1;", "{}", text]);
  });

  it("is empty for blank text", () => {
    expect(jsonCandidates("  \n")).toEqual([]);
  });
});

describe("normalizeReview", () => {
  it("parses the plain JSON response", () => {
    const result = normalizeReview(JSON.stringify(RESPONSE));
    expect(result).toEqual({
      ok: true,
      dropped: [],
      review: {
        summary: "ok",
        severity: "low",
        issues: [
          {
            file: "a.txt",
            line: 5,
            severity: "medium",
            category: "code-quality",
            title: "t",
            description: "d",
          },
        ],
        positiveNotes: [],
      },
    });
  });

  it("gives the same result for a json-fenced response wrapped in prose", () => {
    const plain = JSON.stringify(RESPONSE, null, 2);
    const wrapped = `Here is my review.\n\n\`\`\`json\n${plain}\n\`\`\`\n\nLet me know if you need more.`;
    expect(normalizeReview(wrapped)).toEqual(normalizeReview(plain));
  });

  it("keeps a code example holding a fence inside a json-fenced response", () => {
    const codeExample = "```swift\nlet key = try Keychain.load()\n```";
    const document = {
      ...RESPONSE,
      issues: [{ ...RESPONSE.issues[0], code_example: codeExample }],
    };
    const raw = `Review:\n\n\`\`\`json\n${JSON.stringify(document, null, 2)}\n\`\`\``;

    const result = normalizeReview(raw);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.review.issues).toHaveLength(1);
    expect(result.review.issues[0].codeExample).toBe(codeExample);
  });

  it("keeps a code example holding a fence in a bare JSON response", () => {
    const codeExample = "```swift\nlet key = try Keychain.load()\n```";
    const raw = JSON.stringify({
      ...RESPONSE,
      issues: [{ ...RESPONSE.issues[0], code_example: codeExample }],
    });

    const result = normalizeReview(raw);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.review.issues[0].codeExample).toBe(codeExample);
  });

  it("reports the first parse error when no candidate is JSON", () => {
    const result = normalizeReview("```json\n{broken\n```");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatch(/^Invalid JSON: /);
  });

  it("reports text without JSON as a failure and keeps the raw text", () => {
    const raw = "I could not review this change.";
    const result = normalizeReview(raw);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatch(/^Invalid JSON/);
    expect(result.raw).toBe(raw);
  });

  it("reports an empty response as a failure", () => {
    expect(normalizeReview("   ")).toEqual({
      ok: false,
      error: "Response contains no JSON",
      raw: "   ",
    });
  });

  it("rejects a top-level array", () => {
    const result = normalizeReview("[]");
    expect(result).toEqual({ ok: false, error: "Response JSON is not an object", raw: "[]" });
  });

  it("rejects JSON without an issues list", () => {
    const result = normalizeReview('{"summary": "fine"}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toContain("issues");
  });

  it("rejects an overall severity outside the enumeration", () => {
    const result = normalizeReview('{"severity": "urgent", "issues": []}');
    expect(result.ok).toBe(false);
  });

  it("applies defaults for missing optional keys", () => {
    const result = normalizeReview('{"issues": []}');
    expect(result).toEqual({
      ok: true,
      dropped: [],
      review: { summary: "", severity: "low", issues: [], positiveNotes: [] },
    });
  });

  it("drops invalid issue records one by one", () => {
    const raw = JSON.stringify({
      summary: "s",
      severity: "high",
      issues: [
        validIssue({ title: "kept" }),
        validIssue({ severity: "blocker" }),
        validIssue({ category: "style" }),
        validIssue({ severity: "CRITICAL" }),
        "not an object",
      ],
      positive_notes: ["Clear naming"],
    });

    const result = normalizeReview(raw);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.review.issues.map((i) => i.title)).toEqual(["kept"]);
    expect(result.dropped.map((d) => d.index)).toEqual([1, 2, 3, 4]);
    expect(result.dropped[0].reason).toContain("severity");
    expect(result.dropped[1].reason).toContain("category");
    expect(result.review.positiveNotes).toEqual(["Clear naming"]);
  });

  it("ignores unknown keys", () => {
    const raw = JSON.stringify({ ...RESPONSE, model: "x", issues: [validIssue({ confidence: 7 })] });
    const result = normalizeReview(raw);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.review.issues[0]).toEqual({
      file: "src/app.ts",
      line: 3,
      severity: "high",
      category: "security",
      title: "Hardcoded key",
      description: "A key is committed.",
    });
  });
});

describe("normalizeIssue", () => {
  it("maps code_example and keeps the suggestion", () => {
    const issue = normalizeIssue(
      validIssue({ suggestion: "Read it from the environment", code_example: "const k = env.KEY;" })
    );
    expect(issue).toEqual({
      file: "src/app.ts",
      line: 3,
      severity: "high",
      category: "security",
      title: "Hardcoded key",
      description: "A key is committed.",
      suggestion: "Read it from the environment",
      codeExample: "const k = env.KEY;",
    });
  });

  it("treats null optional fields as absent", () => {
    const issue = normalizeIssue(validIssue({ suggestion: null, code_example: null }));
    expect(typeof issue).toBe("object");
    if (typeof issue === "string") return;
    expect(issue.suggestion).toBeUndefined();
    expect(issue.codeExample).toBeUndefined();
  });

  it("defaults a missing file to an empty string", () => {
    const { file: _file, ...withoutFile } = validIssue();
    const issue = normalizeIssue(withoutFile);
    if (typeof issue === "string") throw new Error(issue);
    expect(issue.file).toBe("");
  });

  it.each([
    [0, undefined],
    [-4, undefined],
    [2.5, undefined],
    [null, undefined],
    ["12", 12],
    ["n/a", undefined],
  ])("normalizes line %s to %s", (line, expected) => {
    const issue = normalizeIssue(validIssue({ line }));
    if (typeof issue === "string") throw new Error(issue);
    expect(issue.line).toBe(expected);
  });

  it("rejects a line of the wrong shape", () => {
    const issue = normalizeIssue(validIssue({ line: true }));
    expect(typeof issue).toBe("string");
    expect(issue).toContain("line");
  });

  it("rejects a record without a title", () => {
    const { title: _title, ...withoutTitle } = validIssue();
    expect(normalizeIssue(withoutTitle)).toContain("title");
  });
});

describe("toAnchorLine", () => {
  it("keeps positive integers", () => {
    expect(toAnchorLine(1)).toBe(1);
    expect(toAnchorLine(" 7 ")).toBe(7);
  });

  it("drops zero from strings too", () => {
    expect(toAnchorLine("0")).toBeUndefined();
  });
});
