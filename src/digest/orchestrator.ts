// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import { digestFallbackText, renderDigestBlocks } from "../slack/blocks";
import type { FetchHistoryFn } from "../slack/history";
import type { PublishDigestFn } from "../slack/publisher";
import type { TimeWindow } from "../slack/types";
import { writeArtifact } from "./artifact";
import { generateDigest, type GenerationOptions } from "./generator";

export type DigestRequest = Readonly<{
  channelId: string;
  window: TimeWindow;
  outputPath: string;
  publish: boolean;
}>;

export type DigestPipeline = Readonly<{
  fetchHistory: FetchHistoryFn;
  model: LanguageModel;
  generation: GenerationOptions;
  publishDigest: PublishDigestFn;
}>;

export type StepOutcome = "ok" | "failed" | "skipped";

/**
 * Outcome of one run. `success` is the aggregate; the step fields say which
 * step failed and which never ran.
 */
export type DigestRunReport = Readonly<{
  success: boolean;
  steps: Readonly<{
    fetch: StepOutcome;
    generate: StepOutcome;
    write: StepOutcome;
    publish: StepOutcome;
  }>;
  messageCount: number;
  outputPath: string;
  error: string | null;
}>;

/**
 * Runs one digest: fetch → generate → write → publish (when requested).
 *
 * The first failing step ends the run and the remaining steps are reported as
 * skipped. When the window holds no messages the sentinel is written to the
 * artifact and nothing is published; that run still succeeds.
 *
 * @param request - Channel, window, artifact path and whether to publish
 * @param pipeline - Slack fetcher and publisher, model and generation options
 * @param logger - Logger instance
 */
export async function runDigestCycle(
  request: DigestRequest,
  pipeline: DigestPipeline,
  logger: Logger,
): Promise<DigestRunReport> {
  const { channelId, window, outputPath } = request;
  const runLogger = logger.child({ channelId });

  const report = (
    steps: DigestRunReport["steps"],
    messageCount: number,
    error: string | null,
  ): DigestRunReport => ({
    success: error === null,
    steps,
    messageCount,
    outputPath,
    error,
  });

  runLogger.info(
    { start: window.start.toISOString(), end: window.end.toISOString() },
    "digest run starting",
  );

  const fetched = await pipeline.fetchHistory(channelId, window, runLogger);
  if (!fetched.success) {
    return report(
      { fetch: "failed", generate: "skipped", write: "skipped", publish: "skipped" },
      0,
      `fetch failed: ${fetched.error}`,
    );
  }

  const { messages } = fetched;
  const generated = await generateDigest(
    messages,
    pipeline.model,
    pipeline.generation,
    runLogger,
  );
  if (generated.status === "failed") {
    return report(
      { fetch: "ok", generate: "failed", write: "skipped", publish: "skipped" },
      messages.length,
      `generation failed: ${generated.error}`,
    );
  }

  const content =
    generated.status === "digest" ? generated.digest : generated.sentinel;
  const written = await writeArtifact(outputPath, messages, content, runLogger);
  if (!written.success) {
    return report(
      { fetch: "ok", generate: "ok", write: "failed", publish: "skipped" },
      messages.length,
      `write failed: ${written.error}`,
    );
  }

  if (!request.publish || generated.status === "no_messages") {
    if (request.publish) {
      runLogger.info("no messages in window, skipping publish");
    }
    runLogger.info({ outputPath }, "digest run complete");
    return report(
      { fetch: "ok", generate: "ok", write: "ok", publish: "skipped" },
      messages.length,
      null,
    );
  }

  const blocks = renderDigestBlocks(generated.digest, window);
  const published = await pipeline.publishDigest(
    channelId,
    blocks,
    digestFallbackText(window),
    runLogger,
  );
  if (!published.success) {
    return report(
      { fetch: "ok", generate: "ok", write: "ok", publish: "failed" },
      messages.length,
      `publish failed: ${published.error}`,
    );
  }

  runLogger.info({ outputPath }, "digest run complete and published");
  return report(
    { fetch: "ok", generate: "ok", write: "ok", publish: "ok" },
    messages.length,
    null,
  );
}
