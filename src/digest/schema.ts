import { z } from "zod/v3";

export const digestSchema = z.object({
  summary: z.string().describe("Concise summary of the key points discussed"),
  action_items: z
    .array(z.string())
    .describe("Action items, with the responsible person where mentioned")
    .default([]),
  decisions: z
    .array(z.string())
    .describe("Important decisions made in the conversation")
    .default([]),
});

export type Digest = z.infer<typeof digestSchema>;

/**
 * Returned in place of a digest when the window held no messages.
 */
export const NO_MESSAGES_SENTINEL = "No messages found in the specified timeframe.";
