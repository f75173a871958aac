import { describe, it, expect, beforeEach, vi } from "vitest";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import { createMockLogger, createTestMessage } from "../test-utils/fixtures";
import { NO_MESSAGES_SENTINEL } from "./schema";

vi.mock("ai", () => ({
  generateText: vi.fn(),
}));

import { generateText } from "ai";
import { generateDigest } from "./generator";

describe("generateDigest", () => {
  let mockLogger: Logger;
  const mockModel = {} as LanguageModel;

  beforeEach(() => {
    vi.clearAllMocks();
    mockLogger = createMockLogger();
  });

  it("should return the sentinel without calling the model when there are no messages", async () => {
    const result = await generateDigest([], mockModel, { maxOutputTokens: 1000 }, mockLogger);

    expect(result).toEqual({ status: "no_messages", sentinel: NO_MESSAGES_SENTINEL });
    expect(vi.mocked(generateText)).not.toHaveBeenCalled();
  });

  it("should send the transcript in a single request with the token budget and no retries", async () => {
    vi.mocked(generateText).mockResolvedValueOnce({
      text: '{"summary":"ok","action_items":[],"decisions":[]}',
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
    } as any);

    const messages = [
      createTestMessage(1700000000, "kickoff at 10"),
      createTestMessage(1700000060, "sounds good"),
    ];

    await generateDigest(messages, mockModel, { maxOutputTokens: 512 }, mockLogger);

    expect(vi.mocked(generateText)).toHaveBeenCalledOnce();
    const params = vi.mocked(generateText).mock.calls[0]![0];
    expect(params.model).toBe(mockModel);
    expect(params.maxOutputTokens).toBe(512);
    expect(params.maxRetries).toBe(0);
    expect(params.prompt).toContain(
      "2023-11-14 22:13:20: kickoff at 10\n2023-11-14 22:14:20: sounds good",
    );
  });

  it("should parse a digest wrapped in prose", async () => {
    vi.mocked(generateText).mockResolvedValueOnce({
      text: 'Sure! {"summary":"Team aligned on X","action_items":["Alice: ship Y"],"decisions":["Adopt Z"]} Hope this helps!',
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
    } as any);

    const result = await generateDigest(
      [createTestMessage(1700000000, "hello")],
      mockModel,
      { maxOutputTokens: 1000 },
      mockLogger,
    );

    expect(result).toEqual({
      status: "digest",
      structured: true,
      digest: {
        summary: "Team aligned on X",
        action_items: ["Alice: ship Y"],
        decisions: ["Adopt Z"],
      },
    });
  });

  it("should fall back to the raw text when the output has no JSON", async () => {
    vi.mocked(generateText).mockResolvedValueOnce({
      text: "Great week, everyone! 🎉",
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
    } as any);

    const result = await generateDigest(
      [createTestMessage(1700000000, "hello")],
      mockModel,
      { maxOutputTokens: 1000 },
      mockLogger,
    );

    expect(result).toEqual({
      status: "digest",
      structured: false,
      digest: { summary: "Great week, everyone! 🎉", action_items: [], decisions: [] },
    });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { length: 24 },
      "no json digest in model output, falling back to raw text",
    );
  });

  it("should return a failure result without throwing when the model call fails", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(new Error("overloaded"));

    const result = await generateDigest(
      [createTestMessage(1700000000, "hello")],
      mockModel,
      { maxOutputTokens: 1000 },
      mockLogger,
    );

    expect(result).toEqual({ status: "failed", error: "overloaded" });
    expect(mockLogger.error).toHaveBeenCalledWith(
      { error: "overloaded" },
      "error generating digest",
    );
  });
});
