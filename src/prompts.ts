import type { ChangedFile, DiffContext } from "./types.js";

const LANG_MAP: Record<string, string> = {
  ts: "typescript",
  tsx: "typescript",
  js: "javascript",
  jsx: "javascript",
  py: "python",
  go: "go",
  java: "java",
  kt: "kotlin",
  rs: "rust",
  rb: "ruby",
  swift: "swift",
  yml: "yaml",
  yaml: "yaml",
  json: "json",
  md: "markdown",
  sh: "shell",
  bash: "shell",
};

export interface PromptOptions {
  instructions?: string;
  // Rough token budget for embedded file contents
  contextBudget: number;
}

/**
 * Infer the fence language from a file extension.
 */
export function getLanguage(filePath: string): string {
  const base = filePath.split("/").pop() ?? "";
  if (!base.includes(".")) return "";
  const ext = base.split(".").pop()?.toLowerCase() ?? "";
  return LANG_MAP[ext] ?? ext;
}

/**
 * Rough token estimate: ~4 characters per token on average.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function formatFiles(files: ChangedFile[], contextBudget: number): string {
  let remaining = contextBudget;
  const sections: string[] = [];

  for (const file of files) {
    if (file.content === null) {
      sections.push(`### ${file.path}\n_(content unavailable)_`);
      continue;
    }

    const tokens = estimateTokens(file.content);
    if (tokens > remaining) {
      sections.push(`### ${file.path}\n_(content omitted: context budget exceeded)_`);
      continue;
    }
    remaining -= tokens;

    sections.push(
      `### ${file.path}\n\`\`\`${getLanguage(file.path)}\n${file.content}\n\`\`\``
    );
  }

  return sections.join("\n\n");
}

export function buildReviewPrompt(
  context: DiffContext,
  files: ChangedFile[],
  options: PromptOptions
): string {
  const extra = options.instructions
    ? `\n## Project-Specific Instructions\n${options.instructions}\n`
    : "";

  return `You are performing an adversarial code review of a pull request.

Parts of this change may have been written or suggested by AI tools. Your job is to find the problems such tools tend to miss or introduce.

## Changed Files (current content)
${formatFiles(files, options.contextBudget)}

## Diff against ${context.base}
\`\`\`diff
${context.diff}
\`\`\`

## Review Guidelines

### Security
- Secrets, keys or tokens committed to the code
- Sensitive data written to logs
- Missing validation of external input
- Misused cryptographic primitives

### Best Practices
- Unsafe handling of absent values
- Error handling that swallows or loses failures
- Shared mutable state without coordination

### Compliance
- Deviations from the standards or protocols the code claims to implement

### Testing
- Changed behavior without tests
- Missing edge-case and error-path coverage

### Code Quality
- Needless complexity or abstraction
- Duplicated logic that should be shared
- Verbose code with no added value
${extra}
## Output Format

Respond with a single JSON object:

\`\`\`json
{
  "summary": "Brief overview of findings",
  "severity": "critical|high|medium|low",
  "issues": [
    {
      "file": "path/to/file",
      "line": 42,
      "severity": "critical|high|medium|low",
      "category": "security|best-practices|compliance|testing|code-quality",
      "title": "Brief issue title",
      "description": "Detailed explanation of the issue",
      "suggestion": "How to fix it (optional)",
      "code_example": "Example of better code (optional)"
    }
  ],
  "positive_notes": ["Things that were done well"]
}
\`\`\`

Use line numbers from the new version of the file. Omit "line" when a finding is not tied to one line.
Be thorough but fair. Flag real issues, not stylistic nitpicks unless they affect security or maintainability.`;
}
