import { describe, it, expect, vi, beforeEach } from "vitest";
import { createAnthropicReviewService, requestReview } from "../src/review-requester.js";
import { makeReviewService } from "./helpers.js";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create };
  },
}));
vi.mock("@actions/core");

beforeEach(() => {
  vi.clearAllMocks();
});

describe("createAnthropicReviewService", () => {
  it("sends one user message and joins the text blocks", async () => {
    create.mockResolvedValue({
      content: [
        { type: "text", text: "Here is the review:" },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: '{"issues": []}' },
      ],
      usage: { input_tokens: 120, output_tokens: 30 },
      stop_reason: "end_turn",
    });

    const service = createAnthropicReviewService({
      apiKey: "test-key",
      model: "test-model",
      maxTokens: 4000,
    });

    await expect(service.review("the prompt")).resolves.toBe('Here is the review:\n{"issues": []}');
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 4000,
      messages: [{ role: "user", content: "the prompt" }],
    });
  });

  it("returns an empty string when there is no text", async () => {
    create.mockResolvedValue({
      content: [],
      usage: { input_tokens: 1, output_tokens: 0 },
      stop_reason: "end_turn",
    });

    const service = createAnthropicReviewService({ apiKey: "test-key", model: "m", maxTokens: 10 });
    await expect(service.review("p")).resolves.toBe("");
  });

  it("propagates API failures", async () => {
    create.mockRejectedValue(new Error("401 invalid x-api-key"));

    const service = createAnthropicReviewService({ apiKey: "test-key", model: "m", maxTokens: 10 });
    await expect(service.review("p")).rejects.toThrow("401 invalid x-api-key");
  });
});

describe("requestReview", () => {
  it("passes the built prompt to the service and returns its raw text", async () => {
    const service = makeReviewService("raw answer");

    const raw = await requestReview(
      service,
      { base: "main", diff: "+changed line", changedPaths: ["a.md"] },
      [{ path: "a.md", content: "# Title" }],
      { contextBudget: 100 }
    );

    expect(raw).toBe("raw answer");
    const prompt = service.review.mock.calls[0][0];
    expect(prompt).toContain("+changed line");
    expect(prompt).toContain("### a.md\n```markdown\n# Title\n```");
  });
});
