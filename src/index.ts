import * as core from "@actions/core";
import * as github from "@actions/github";
import { getActionInputs, loadConfig } from "./config.js";
import { createGitClient } from "./git.js";
import { createGitHubPlatform } from "./github.js";
import { runPipeline } from "./pipeline.js";
import { createAnthropicReviewService } from "./review-requester.js";
import { reportSignal } from "./signal.js";

async function run(): Promise<void> {
  try {
    // ── Read inputs ──────────────────────────────────────────────
    const inputs = getActionInputs();
    const loaded = loadConfig(inputs.configPath);
    const config = inputs.model
      ? { ...loaded, settings: { ...loaded.settings, model: inputs.model } }
      : loaded;

    const { owner, repo, pullNumber } = inputs.target;
    core.info(`Reviewing ${owner}/${repo}#${pullNumber} against ${inputs.baseRef}`);

    const outcome = await runPipeline(
      {
        vcs: createGitClient(),
        reviewService: createAnthropicReviewService({
          apiKey: inputs.anthropicApiKey,
          model: config.settings.model,
          maxTokens: config.settings.maxTokens,
        }),
        platform: createGitHubPlatform(github.getOctokit(inputs.githubToken)),
      },
      {
        baseRef: inputs.baseRef,
        target: inputs.target,
        headSha: inputs.headSha,
        config,
      }
    );

    // ── Set outputs ──────────────────────────────────────────────
    if (outcome.status === "completed") {
      core.setOutput("issues-count", outcome.review.issues.length.toString());
      core.setOutput("review-mode", outcome.publish.mode);
    } else {
      core.setOutput("issues-count", "0");
      core.setOutput("review-mode", outcome.status);
    }
    core.setOutput("critical-count", outcome.signal.criticalCount.toString());

    reportSignal(outcome.signal);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

run();
