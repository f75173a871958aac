import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets, type AppConfig, type Secrets } from "./config";
import { createLlmClient } from "./llm/client";
import { createSlackClient } from "./slack/client";
import { createHistoryFetcher } from "./slack/history";
import { createSlackPublisher } from "./slack/publisher";
import { runDigestCycle, type DigestPipeline, type DigestRequest } from "./digest";
import { parseCliArgs, resolveDigestRequest, USAGE, type CliArgs } from "./cli";
import { createDigestScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

async function main(): Promise<void> {
  const logger = createLogger();

  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "argument error",
    );
    console.error(USAGE);
    process.exit(1);
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const configPath = resolve(
    args.configPath ?? process.env["CONFIG_PATH"] ?? "./config.yaml",
  );

  let config: AppConfig;
  let secrets: Secrets;
  try {
    config = loadConfig(configPath);
    secrets = loadSecrets(process.env, config.llm.provider);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "config loaded",
  );

  const slack = createSlackClient(secrets.slackToken);
  const pipeline: DigestPipeline = {
    fetchHistory: createHistoryFetcher(slack, {
      pageSize: config.slack.pageSize,
    }),
    model: createLlmClient(config),
    generation: { maxOutputTokens: config.llm.maxOutputTokens },
    publishDigest: createSlackPublisher(slack),
  };

  if (args.schedule) {
    if (!config.schedule) {
      logger.fatal("--schedule given but no schedule is configured");
      process.exit(1);
    }

    // Each tick gets a fresh window and a fresh timestamp-named artifact.
    const scheduledArgs = {
      ...args,
      since: undefined,
      until: undefined,
      outputPath: undefined,
    };
    const scheduler = createDigestScheduler(
      config.schedule,
      (now) =>
        runDigestCycle(
          resolveDigestRequest(config, scheduledArgs, now),
          pipeline,
          logger,
        ),
      logger,
    );
    logger.info({ schedule: config.schedule }, "digest scheduler started");

    registerShutdownHandlers({ schedulers: [scheduler], logger });
    return;
  }

  let request: DigestRequest;
  try {
    request = resolveDigestRequest(config, args, new Date());
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "argument error",
    );
    process.exit(1);
  }

  const report = await runDigestCycle(request, pipeline, logger);

  if (report.success) {
    logger.info(
      {
        outputPath: report.outputPath,
        published: report.steps.publish === "ok",
        messageCount: report.messageCount,
      },
      "digest saved",
    );
  } else {
    logger.error({ steps: report.steps, error: report.error }, "digest run failed");
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("fatal error:", err);
  process.exit(1);
});
