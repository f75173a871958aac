import { subHours } from "date-fns";
import { z } from "zod/v3";
import type { AppConfig } from "./config";
import { defaultArtifactPath, type DigestRequest } from "./digest";

export const USAGE = `Usage: channel-digest [options]

Options:
  --config <path>          YAML config file (default: $CONFIG_PATH or ./config.yaml)
  --channel <id>           Slack channel id (default: slack.channelId)
  --since <date>           Window start (default: --until minus the lookback)
  --until <date>           Window end, exclusive (default: now)
  --lookback-hours <n>     Window length when --since is absent (default: window.lookbackHours)
  --output <path>          Artifact path (default: <output.directory>/<output.filePrefix>_<yyyyMMdd_HHmm>.txt)
  --publish                Post the digest back to the channel
  --no-publish             Do not post, whatever publish.enabled says
  --schedule               Run on the configured cron schedule instead of once
  --help                   Show this message`;

const cliArgsSchema = z.object({
  configPath: z.string().min(1).optional(),
  channelId: z.string().min(1).optional(),
  since: z.coerce.date().optional(),
  until: z.coerce.date().optional(),
  lookbackHours: z.coerce.number().positive().optional(),
  outputPath: z.string().min(1).optional(),
  publish: z.boolean().optional(),
  schedule: z.boolean(),
  help: z.boolean(),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

const VALUE_FLAGS = {
  "--config": "configPath",
  "--channel": "channelId",
  "--since": "since",
  "--until": "until",
  "--lookback-hours": "lookbackHours",
  "--output": "outputPath",
} as const;

function isValueFlag(name: string): name is keyof typeof VALUE_FLAGS {
  return name in VALUE_FLAGS;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: ReadonlyArray<string>): CliArgs {
  const raw: Record<string, unknown> = { schedule: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (isValueFlag(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined) {
        throw new Error(`missing value for ${name}`);
      }
      raw[VALUE_FLAGS[name]] = value;
      continue;
    }

    switch (arg) {
      case "--publish":
        raw["publish"] = true;
        break;
      case "--no-publish":
        raw["publish"] = false;
        break;
      case "--schedule":
        raw["schedule"] = true;
        break;
      case "--help":
      case "-h":
        raw["help"] = true;
        break;
      default:
        throw new Error(`unknown argument: ${arg}`);
    }
  }

  const result = cliArgsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid arguments:\n${issues}`);
  }

  return result.data;
}

/**
 * Combines config and flags into the request for one run whose window ends
 * at `until` (or `now`).
 */
export function resolveDigestRequest(
  config: AppConfig,
  args: CliArgs,
  now: Date,
): DigestRequest {
  const end = args.until ?? now;
  const start =
    args.since ?? subHours(end, args.lookbackHours ?? config.window.lookbackHours);

  if (start.getTime() > end.getTime()) {
    throw new Error(
      `window start ${start.toISOString()} is after window end ${end.toISOString()}`,
    );
  }

  return {
    channelId: args.channelId ?? config.slack.channelId,
    window: { start, end },
    outputPath:
      args.outputPath ??
      defaultArtifactPath(config.output.directory, config.output.filePrefix, end),
    publish: args.publish ?? config.publish.enabled,
  };
}
