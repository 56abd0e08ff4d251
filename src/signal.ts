import * as core from "@actions/core";
import type { Issue, Severity } from "./types.js";

export const TOP_SEVERITY: Severity = "critical";

export interface ExitSignal {
  failed: boolean;
  criticalCount: number;
  message: string;
}

/**
 * The run fails when any issue is in the top severity tier, whatever the
 * overall severity claims.
 */
export function evaluateSignal(issues: Issue[]): ExitSignal {
  const criticalCount = issues.filter((i) => i.severity === TOP_SEVERITY).length;
  if (criticalCount > 0) {
    return {
      failed: true,
      criticalCount,
      message: `Found ${criticalCount} critical issue(s)`,
    };
  }
  return { failed: false, criticalCount: 0, message: "Review complete, no critical issues" };
}

export function reportSignal(signal: ExitSignal): void {
  if (signal.failed) {
    core.setFailed(signal.message);
  } else {
    core.info(signal.message);
  }
}
