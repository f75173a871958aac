// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { ChannelMessage } from "../slack/types";
import { extractDigest } from "./extractor";
import { buildDigestPrompt } from "./prompt";
import { NO_MESSAGES_SENTINEL, type Digest } from "./schema";
import { formatTranscript } from "./transcript";

export type GenerationOptions = Readonly<{
  maxOutputTokens: number;
}>;

/**
 * Three distinct outcomes: nothing to summarise, a digest (possibly the
 * raw-text fallback when `structured` is false), or a failed model call.
 */
export type GenerationResult =
  | { readonly status: "no_messages"; readonly sentinel: string }
  | { readonly status: "digest"; readonly digest: Digest; readonly structured: boolean }
  | { readonly status: "failed"; readonly error: string };

/**
 * Summarises channel messages into a digest with a single model call.
 *
 * - Empty input returns the no-messages sentinel without calling the model
 * - One blocking request, no retries
 * - Output that holds no valid JSON payload degrades to a digest whose summary
 *   is the raw text
 * - Errors from the model call are logged and returned, never thrown
 *
 * @param messages - Messages in the order they should appear in the transcript
 * @param model - Language model to call
 * @param options - Output token budget
 * @param logger - Logger instance
 */
export async function generateDigest(
  messages: ReadonlyArray<ChannelMessage>,
  model: LanguageModel,
  options: GenerationOptions,
  logger: Logger,
): Promise<GenerationResult> {
  if (messages.length === 0) {
    logger.info("no messages to summarise");
    return { status: "no_messages", sentinel: NO_MESSAGES_SENTINEL };
  }

  const prompt = buildDigestPrompt(formatTranscript(messages));

  try {
    const response = await generateText({
      model,
      prompt,
      maxOutputTokens: options.maxOutputTokens,
      maxRetries: 0,
    });

    const { digest, structured } = extractDigest(response.text);

    if (!structured) {
      logger.warn(
        { length: response.text.length },
        "no json digest in model output, falling back to raw text",
      );
    }

    logger.info(
      {
        messageCount: messages.length,
        actionItems: digest.action_items.length,
        decisions: digest.decisions.length,
        structured,
      },
      "digest generated",
    );

    return { status: "digest", digest, structured };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "error generating digest");
    return { status: "failed", error: message };
  }
}
