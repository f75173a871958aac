/**
 * A channel message as fetched from `conversations.history`.
 * `timestamp` is derived from the epoch-seconds `ts` field.
 */
export type ChannelMessage = Readonly<{
  ts: string;
  timestamp: Date;
  text: string;
}>;

/**
 * Half-open interval `[start, end)` bounding which messages are fetched.
 * `start <= end` is assumed, not checked.
 */
export type TimeWindow = Readonly<{
  start: Date;
  end: Date;
}>;

export type FetchResult =
  | { readonly success: true; readonly messages: ReadonlyArray<ChannelMessage> }
  | { readonly success: false; readonly error: string };

export type PublishResult =
  | { readonly success: true; readonly ts: string }
  | { readonly success: false; readonly error: string };
