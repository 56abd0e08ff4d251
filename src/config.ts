import * as core from "@actions/core";
import * as github from "@actions/github";
import * as fs from "fs";
import * as yaml from "yaml";
import type { ActionInputs, PullRequestTarget, ReviewConfig } from "./types.js";

interface RawConfig {
  include?: string[];
  ignore?: string[];
  instructions?: string;
  settings?: {
    model?: string;
    max_tokens?: number;
    context_budget?: number;
  };
}

export const DEFAULT_BASE_REF = "main";
export const DEFAULT_CONFIG_PATH = ".adversarial-review.yml";

export const DEFAULT_INCLUDE = [
  "**/*.ts",
  "**/*.tsx",
  "**/*.js",
  "**/*.jsx",
  "**/*.py",
  "**/*.go",
  "**/*.java",
  "**/*.kt",
  "**/*.rs",
  "**/*.rb",
  "**/*.swift",
  "**/*.md",
];

export const DEFAULT_CONFIG: ReviewConfig = {
  include: DEFAULT_INCLUDE,
  ignore: [],
  settings: {
    model: "claude-sonnet-4-20250514",
    maxTokens: 4000,
    contextBudget: 50000,
  },
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : fallback;
}

/**
 * Load the optional YAML config. Every key falls back to its default on its own.
 */
export function loadConfig(configPath: string): ReviewConfig {
  if (!fs.existsSync(configPath)) {
    core.info(`No config file found at ${configPath}, using defaults`);
    return DEFAULT_CONFIG;
  }

  const raw = (yaml.parse(fs.readFileSync(configPath, "utf-8")) ?? {}) as RawConfig;

  return {
    include: isStringArray(raw.include) && raw.include.length > 0
      ? raw.include
      : DEFAULT_CONFIG.include,
    ignore: isStringArray(raw.ignore) ? raw.ignore : DEFAULT_CONFIG.ignore,
    instructions:
      typeof raw.instructions === "string" && raw.instructions.trim()
        ? raw.instructions.trim()
        : undefined,
    settings: {
      model:
        typeof raw.settings?.model === "string" && raw.settings.model
          ? raw.settings.model
          : DEFAULT_CONFIG.settings.model,
      maxTokens: positiveOr(raw.settings?.max_tokens, DEFAULT_CONFIG.settings.maxTokens),
      contextBudget: positiveOr(
        raw.settings?.context_budget,
        DEFAULT_CONFIG.settings.contextBudget
      ),
    },
  };
}

/**
 * Read an action input, falling back to environment variables in order.
 */
export function readInput(name: string, ...envNames: string[]): string | undefined {
  const fromInput = core.getInput(name).trim();
  if (fromInput) return fromInput;

  for (const envName of envNames) {
    const value = process.env[envName]?.trim();
    if (value) return value;
  }
  return undefined;
}

export function parseRepository(value: string): Pick<PullRequestTarget, "owner" | "repo"> {
  const [owner, repo, ...rest] = value.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository "${value}", expected "owner/repo"`);
  }
  return { owner, repo };
}

export function parsePullNumber(value: string): number {
  const pullNumber = Number(value);
  if (!Number.isInteger(pullNumber) || pullNumber <= 0) {
    throw new Error(`Invalid pull request number "${value}"`);
  }
  return pullNumber;
}

function required(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

export function getActionInputs(): ActionInputs {
  const pr = github.context.payload.pull_request;

  const repository = required(
    "repository",
    readInput("repository", "REPO", "GITHUB_REPOSITORY")
  );
  const prNumber = required(
    "pr-number",
    readInput("pr-number", "PR_NUMBER") ?? (pr ? String(pr.number) : undefined)
  );

  const headFromPayload: unknown = pr?.head?.sha;

  return {
    baseRef: readInput("base-ref", "BASE_REF", "GITHUB_BASE_REF") ?? DEFAULT_BASE_REF,
    target: {
      ...parseRepository(repository),
      pullNumber: parsePullNumber(prNumber),
    },
    githubToken: required("github-token", readInput("github-token", "GITHUB_TOKEN")),
    anthropicApiKey: required(
      "anthropic-api-key",
      readInput("anthropic-api-key", "ANTHROPIC_API_KEY")
    ),
    headSha:
      readInput("head-sha", "HEAD_SHA") ??
      (typeof headFromPayload === "string" && headFromPayload ? headFromPayload : undefined),
    configPath: readInput("config-path") ?? DEFAULT_CONFIG_PATH,
    model: readInput("model"),
  };
}
