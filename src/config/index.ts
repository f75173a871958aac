import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema, PROVIDER_KEY_VARIABLES } from "./schema";
import type { AppConfig, LlmProvider } from "./schema";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export type Secrets = Readonly<{
  slackToken: string;
}>;

/**
 * Reads credentials from the environment. The Slack token is always required;
 * the provider key is only checked here, since the provider SDK reads it itself.
 */
export function loadSecrets(
  env: NodeJS.ProcessEnv,
  provider: LlmProvider,
): Secrets {
  const keyVariable = PROVIDER_KEY_VARIABLES[provider];
  const slackToken = env["SLACK_BOT_TOKEN"];

  const missing: Array<string> = [];
  if (!slackToken) missing.push("SLACK_BOT_TOKEN");
  if (keyVariable && !env[keyVariable]) missing.push(keyVariable);

  if (!slackToken || missing.length > 0) {
    throw new Error(
      `missing credentials in environment: ${missing.join(", ")}`,
    );
  }

  return { slackToken };
}

export type { AppConfig, LlmProvider };
