import * as exec from "@actions/exec";
import type { VersionControl } from "./types.js";

async function git(args: string[], cwd?: string): Promise<string> {
  const { exitCode, stdout, stderr } = await exec.getExecOutput("git", args, {
    cwd,
    silent: true,
    ignoreReturnCode: true,
  });

  if (exitCode !== 0) {
    throw new Error(`git ${args.join(" ")} failed (exit ${exitCode}): ${stderr.trim()}`);
  }
  return stdout;
}

/**
 * Three-dot range: changes on HEAD since it diverged from the remote base branch.
 */
export function diffRange(base: string): string {
  return `origin/${base}...HEAD`;
}

export function createGitClient(cwd?: string): VersionControl {
  return {
    diff: (base) => git(["diff", diffRange(base)], cwd),
    // -z keeps paths verbatim (no C-quoting of non-ASCII names); deleted files are left out.
    async changedPaths(base) {
      const output = await git(
        ["diff", "--name-only", "-z", "--diff-filter=d", diffRange(base)],
        cwd
      );
      return output.split("\0").filter(Boolean);
    },
  };
}
