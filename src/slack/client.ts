import { WebClient } from "@slack/web-api";

/**
 * Builds the process-wide Slack client. Retries are disabled and rate-limited
 * calls reject immediately, so every failure surfaces to the caller once.
 */
export function createSlackClient(token: string): WebClient {
  return new WebClient(token, {
    retryConfig: { retries: 0 },
    rejectRateLimitedCalls: true,
  });
}
