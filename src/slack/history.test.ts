import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import { ErrorCode, type WebClient } from "@slack/web-api";
import { createHistoryFetcher } from "./history";
import type { TimeWindow } from "./types";

const logger = pino({ level: "silent" });

const window: TimeWindow = {
  start: new Date("2023-11-14T00:00:00Z"),
  end: new Date("2023-11-21T00:00:00Z"),
};

function rawMessages(from: number, count: number) {
  return Array.from({ length: count }, (_, i) => ({
    ts: `${1700000000 + from + i}.000000`,
    text: `message ${from + i}`,
  }));
}

function platformError(code: string): Error {
  return Object.assign(new Error(`An API error occurred: ${code}`), {
    code: ErrorCode.PlatformError,
    data: { ok: false, error: code },
  });
}

describe("createHistoryFetcher", () => {
  const history = vi.fn();
  const client = { conversations: { history } } as unknown as WebClient;

  beforeEach(() => {
    history.mockReset();
  });

  it("should request the window in epoch seconds with the configured page size", async () => {
    history.mockResolvedValueOnce({ ok: true, messages: [], has_more: false });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    await fetchHistory("C0TEST0001", window, logger);

    expect(history).toHaveBeenCalledWith({
      channel: "C0TEST0001",
      oldest: "1699920000",
      latest: "1700524800",
      limit: 100,
      cursor: undefined,
    });
  });

  it("should follow cursors and concatenate every page in order", async () => {
    history
      .mockResolvedValueOnce({
        ok: true,
        messages: rawMessages(0, 100),
        has_more: true,
        response_metadata: { next_cursor: "cursor-2" },
      })
      .mockResolvedValueOnce({
        ok: true,
        messages: rawMessages(100, 1),
        has_more: false,
        response_metadata: { next_cursor: "" },
      });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(history).toHaveBeenCalledTimes(2);
    expect(history.mock.calls[1]![0]).toMatchObject({ cursor: "cursor-2" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.messages).toHaveLength(101);
      expect(result.messages.map((m) => m.text)).toEqual(
        Array.from({ length: 101 }, (_, i) => `message ${i}`),
      );
      expect(result.messages[100]).toEqual({
        ts: "1700000100.000000",
        timestamp: new Date(1700000100 * 1000),
        text: "message 100",
      });
    }
  });

  it("should return an empty successful result for a quiet channel", async () => {
    history.mockResolvedValueOnce({ ok: true, messages: [], has_more: false });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(result).toEqual({ success: true, messages: [] });
  });

  it("should default missing text to an empty string", async () => {
    history.mockResolvedValueOnce({
      ok: true,
      messages: [{ ts: "1700000000.000200" }],
      has_more: false,
    });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(result.success && result.messages[0]?.text).toBe("");
  });

  it("should skip messages without a numeric ts", async () => {
    history.mockResolvedValueOnce({
      ok: true,
      messages: [{ text: "no ts" }, { ts: "1700000000.000000", text: "kept" }],
      has_more: false,
    });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(result.success && result.messages.map((m) => m.text)).toEqual(["kept"]);
  });

  it("should stop when more pages are reported without a cursor", async () => {
    history.mockResolvedValueOnce({
      ok: true,
      messages: rawMessages(0, 2),
      has_more: true,
      response_metadata: { next_cursor: "" },
    });

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(history).toHaveBeenCalledOnce();
    expect(result.success && result.messages).toHaveLength(2);
  });

  it("should report a platform error by its code", async () => {
    history.mockRejectedValueOnce(platformError("channel_not_found"));

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(result).toEqual({ success: false, error: "channel_not_found" });
  });

  it("should discard earlier pages when a later page fails", async () => {
    history
      .mockResolvedValueOnce({
        ok: true,
        messages: rawMessages(0, 100),
        has_more: true,
        response_metadata: { next_cursor: "cursor-2" },
      })
      .mockRejectedValueOnce(new Error("socket hang up"));

    const fetchHistory = createHistoryFetcher(client, { pageSize: 100 });
    const result = await fetchHistory("C0TEST0001", window, logger);

    expect(result).toEqual({ success: false, error: "socket hang up" });
  });
});
