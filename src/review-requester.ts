import Anthropic from "@anthropic-ai/sdk";
import * as core from "@actions/core";
import { buildReviewPrompt, type PromptOptions } from "./prompts.js";
import type { ChangedFile, DiffContext, ReviewService } from "./types.js";

export interface AnthropicServiceOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

/**
 * Review service backed by the Anthropic Messages API. Text blocks are joined
 * and returned untouched; an answer without text yields "".
 */
export function createAnthropicReviewService(options: AnthropicServiceOptions): ReviewService {
  const client = new Anthropic({ apiKey: options.apiKey });

  return {
    async review(prompt) {
      const response = await client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        messages: [{ role: "user", content: prompt }],
      });

      core.info(
        `Review tokens: ${response.usage.input_tokens} in / ${response.usage.output_tokens} out`
      );
      if (response.stop_reason === "max_tokens") {
        core.warning("Review response hit max_tokens and may be truncated");
      }

      return response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("\n");
    },
  };
}

/**
 * Build one review request from the collected context and return the model's
 * raw answer. Service failures propagate.
 */
export async function requestReview(
  service: ReviewService,
  context: DiffContext,
  files: ChangedFile[],
  options: PromptOptions
): Promise<string> {
  const prompt = buildReviewPrompt(context, files, options);
  core.info(`Requesting review for ${files.length} file(s)`);
  return service.review(prompt);
}
