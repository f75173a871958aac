import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { ChannelMessage } from "../slack/types";

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(): AppConfig {
  return {
    slack: {
      channelId: "C0TEST0001",
      pageSize: 100,
    },
    llm: {
      provider: "anthropic",
      model: "test-model",
      maxOutputTokens: 1000,
    },
    window: {
      lookbackHours: 168,
    },
    output: {
      directory: "./output",
      filePrefix: "slack_summary",
    },
    publish: {
      enabled: false,
    },
  };
}

/**
 * Creates a mock Logger whose methods are spies. `child` returns the same mock
 * so assertions see calls made through child loggers.
 */
export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    isLevelEnabled: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

/**
 * Builds a message at the given epoch second.
 */
export function createTestMessage(seconds: number, text: string): ChannelMessage {
  return {
    ts: `${seconds}.000000`,
    timestamp: new Date(seconds * 1000),
    text,
  };
}
