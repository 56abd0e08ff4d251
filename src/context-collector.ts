import * as core from "@actions/core";
import { readFile } from "fs/promises";
import * as path from "path";
import { minimatch } from "minimatch";
import { DEFAULT_BASE_REF } from "./config.js";
import type { ChangedFile, CollectedContext, VersionControl } from "./types.js";

export interface CollectOptions {
  base?: string;
  include: string[];
  ignore?: string[];
  rootDir?: string;
}

/**
 * Check whether a changed path is one we review: it must match an include
 * glob and no ignore glob.
 */
export function isPathOfInterest(
  filePath: string,
  include: string[],
  ignore: string[] = []
): boolean {
  const matches = (pattern: string) =>
    minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes("/") });
  return include.some(matches) && !ignore.some(matches);
}

async function readChangedFile(rootDir: string, filePath: string): Promise<ChangedFile> {
  try {
    const content = await readFile(path.resolve(rootDir, filePath), "utf-8");
    return { path: filePath, content };
  } catch (err) {
    core.warning(`Could not read ${filePath}, reviewing without its content: ${err}`);
    return { path: filePath, content: null };
  }
}

/**
 * Gather the diff against the base reference and the current content of every
 * changed file of interest. The diff is not fetched when nothing is left after
 * filtering.
 */
export async function collectContext(
  vcs: VersionControl,
  options: CollectOptions
): Promise<CollectedContext> {
  const base = options.base || DEFAULT_BASE_REF;
  const rootDir = options.rootDir ?? process.cwd();

  const allPaths = await vcs.changedPaths(base);
  const changedPaths = allPaths.filter((p) =>
    isPathOfInterest(p, options.include, options.ignore)
  );
  core.info(`${changedPaths.length} of ${allPaths.length} changed file(s) selected for review`);

  if (changedPaths.length === 0) {
    return { context: { base, diff: "", changedPaths }, files: [] };
  }

  const diff = await vcs.diff(base);
  const files = await Promise.all(changedPaths.map((p) => readChangedFile(rootDir, p)));

  return { context: { base, diff, changedPaths }, files };
}
