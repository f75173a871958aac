// pattern: Imperative Shell
import type { KnownBlock, WebClient } from "@slack/web-api";
import type { Logger } from "pino";
import { describeSlackError } from "./errors";
import type { PublishResult } from "./types";

/**
 * Posts rendered digest blocks to a channel.
 * Never throws; failures are returned in the result.
 */
export type PublishDigestFn = (
  channelId: string,
  blocks: ReadonlyArray<KnownBlock>,
  text: string,
  logger: Logger,
) => Promise<PublishResult>;

/**
 * Creates a publisher bound to a Slack client. One `chat.postMessage` call per
 * digest; nothing is retried or queued.
 */
export function createSlackPublisher(client: WebClient): PublishDigestFn {
  return async function publishDigest(
    channelId: string,
    blocks: ReadonlyArray<KnownBlock>,
    text: string,
    logger: Logger,
  ): Promise<PublishResult> {
    try {
      const result = await client.chat.postMessage({
        channel: channelId,
        blocks: [...blocks],
        text,
      });

      logger.info({ channelId, ts: result.ts }, "digest posted to slack");
      return { success: true, ts: result.ts ?? "unknown" };
    } catch (err) {
      const error = describeSlackError(err);
      logger.error({ channelId, error }, "error posting to slack");
      return { success: false, error };
    }
  };
}
