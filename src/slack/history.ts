// pattern: Imperative Shell
import type { WebClient } from "@slack/web-api";
import type { Logger } from "pino";
import { describeSlackError } from "./errors";
import type { ChannelMessage, FetchResult, TimeWindow } from "./types";

export type HistoryFetcherOptions = Readonly<{
  pageSize: number;
}>;

/**
 * Fetches a channel's history within a window.
 * Never throws: transport failures come back as `{ success: false }`,
 * which is distinct from a successful fetch of zero messages.
 */
export type FetchHistoryFn = (
  channelId: string,
  window: TimeWindow,
  logger: Logger,
) => Promise<FetchResult>;

function toEpochSeconds(date: Date): string {
  return String(date.getTime() / 1000);
}

/**
 * Creates a history fetcher bound to a Slack client.
 *
 * Pages through `conversations.history` with the configured page size,
 * following `response_metadata.next_cursor` while `has_more` is set, and
 * returns every page concatenated in the order Slack returned them.
 */
export function createHistoryFetcher(
  client: WebClient,
  options: HistoryFetcherOptions,
): FetchHistoryFn {
  return async function fetchHistory(
    channelId: string,
    window: TimeWindow,
    logger: Logger,
  ): Promise<FetchResult> {
    const oldest = toEpochSeconds(window.start);
    const latest = toEpochSeconds(window.end);
    const messages: Array<ChannelMessage> = [];
    let cursor: string | undefined;
    let pages = 0;

    try {
      do {
        const result = await client.conversations.history({
          channel: channelId,
          oldest,
          latest,
          limit: options.pageSize,
          cursor,
        });
        pages += 1;

        for (const raw of result.messages ?? []) {
          const ts = raw.ts ?? "";
          const seconds = Number.parseFloat(ts);
          if (!Number.isFinite(seconds)) {
            logger.warn({ channelId, ts }, "skipping message without a numeric ts");
            continue;
          }
          messages.push({
            ts,
            timestamp: new Date(seconds * 1000),
            text: raw.text ?? "",
          });
        }

        cursor = result.has_more
          ? result.response_metadata?.next_cursor || undefined
          : undefined;

        if (result.has_more && !cursor) {
          logger.warn(
            { channelId, pages },
            "history reported more pages without a cursor, stopping",
          );
        }
      } while (cursor);
    } catch (err) {
      const error = describeSlackError(err);
      logger.error({ channelId, pages, error }, "error fetching channel history");
      return { success: false, error };
    }

    logger.info({ channelId, pages, count: messages.length }, "channel history fetched");
    return { success: true, messages };
  };
}
