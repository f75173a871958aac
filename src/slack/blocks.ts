// pattern: Functional Core
import { format } from "date-fns";
import type { KnownBlock } from "@slack/web-api";
import type { Digest } from "../digest/schema";
import type { TimeWindow } from "./types";

/** Slack rejects section text longer than this. */
export const SECTION_TEXT_LIMIT = 3000;

export function formatTimeRange(window: TimeWindow): string {
  const pattern = "MMMM dd, yyyy HH:mm";
  return `${format(window.start, pattern)} to ${format(window.end, pattern)}`;
}

function truncate(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit - 1)}…`;
}

function section(text: string): KnownBlock {
  return {
    type: "section",
    text: { type: "mrkdwn", text: truncate(text, SECTION_TEXT_LIMIT) },
  };
}

function bulleted(items: ReadonlyArray<string>): string {
  return items.map((item) => `• ${item}`).join("\n");
}

/**
 * Header, divider and summary, then action items and decisions only when
 * they are non-empty.
 */
export function renderDigestBlocks(
  digest: Digest,
  window: TimeWindow,
): Array<KnownBlock> {
  const blocks: Array<KnownBlock> = [
    {
      type: "header",
      text: {
        type: "plain_text",
        text: `📋 Slack Digest: ${formatTimeRange(window)}`,
      },
    },
    { type: "divider" },
    section(`*Summary:*\n${digest.summary}`),
  ];

  if (digest.action_items.length > 0) {
    blocks.push(section(`*Action Items:*\n${bulleted(digest.action_items)}`));
  }

  if (digest.decisions.length > 0) {
    blocks.push(section(`*Key Decisions:*\n${bulleted(digest.decisions)}`));
  }

  return blocks;
}

/** Notification text shown where blocks cannot be rendered. */
export function digestFallbackText(window: TimeWindow): string {
  return `Slack Digest: ${formatTimeRange(window)}`;
}
