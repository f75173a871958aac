// pattern: Imperative Shell
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { format } from "date-fns";
import type { Logger } from "pino";
import type { ChannelMessage } from "../slack/types";
import type { Digest } from "./schema";
import { formatMessageLine } from "./transcript";

export const MESSAGES_HEADER = "=== Original Messages ===";
export const SUMMARY_HEADER = "=== Summary ===";

export type WriteResult =
  | { readonly success: true; readonly path: string }
  | { readonly success: false; readonly error: string };

/**
 * Renders the transcript section followed by the digest (or the sentinel
 * string) as two-space indented JSON.
 */
export function renderArtifact(
  messages: ReadonlyArray<ChannelMessage>,
  content: Digest | string,
): string {
  const lines = messages.map((m) => `${formatMessageLine(m)}\n`).join("");
  return (
    `${MESSAGES_HEADER}\n\n` +
    lines +
    `\n${SUMMARY_HEADER}\n\n` +
    JSON.stringify(content, null, 2)
  );
}

/**
 * Default artifact path, named after the end of the window, e.g.
 * `output/slack_summary_20261019_0900.txt`.
 */
export function defaultArtifactPath(
  directory: string,
  prefix: string,
  end: Date,
): string {
  return join(directory, `${prefix}_${format(end, "yyyyMMdd_HHmm")}.txt`);
}

/**
 * Writes the artifact, replacing any existing file at `path`.
 * Missing parent directories are created.
 */
export async function writeArtifact(
  path: string,
  messages: ReadonlyArray<ChannelMessage>,
  content: Digest | string,
  logger: Logger,
): Promise<WriteResult> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, renderArtifact(messages, content), "utf-8");
    logger.info({ path, messageCount: messages.length }, "artifact written");
    return { success: true, path };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ path, error: message }, "error saving artifact");
    return { success: false, error: message };
  }
}
