// pattern: Functional Core
import { format } from "date-fns";
import type { ChannelMessage } from "../slack/types";

export function formatMessageTimestamp(timestamp: Date): string {
  return format(timestamp, "yyyy-MM-dd HH:mm:ss");
}

export function formatMessageLine(message: ChannelMessage): string {
  return `${formatMessageTimestamp(message.timestamp)}: ${message.text}`;
}

/**
 * One line per message, in the order given. No re-sorting.
 */
export function formatTranscript(messages: ReadonlyArray<ChannelMessage>): string {
  return messages.map(formatMessageLine).join("\n");
}
