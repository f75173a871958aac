import { z } from "zod/v3";

export const llmProviderSchema = z.enum([
  "anthropic",
  "openai",
  "gemini",
  "ollama",
  "lmstudio",
]);

export type LlmProvider = z.infer<typeof llmProviderSchema>;

export const appConfigSchema = z.object({
  slack: z.object({
    channelId: z.string().min(1),
    pageSize: z.number().int().positive().max(1000).default(100),
  }),
  llm: z.object({
    provider: llmProviderSchema.default("anthropic"),
    model: z.string().min(1),
    maxOutputTokens: z.number().int().positive().default(1000),
  }),
  window: z
    .object({
      lookbackHours: z.number().positive().default(168),
    })
    .default({}),
  output: z
    .object({
      directory: z.string().min(1).default("./output"),
      filePrefix: z.string().min(1).default("slack_summary"),
    })
    .default({}),
  publish: z
    .object({
      enabled: z.boolean().default(false),
    })
    .default({}),
  schedule: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Environment variable holding the API key for each hosted provider.
 * Local providers (ollama, lmstudio) need none.
 */
export const PROVIDER_KEY_VARIABLES: Readonly<Record<LlmProvider, string | null>> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_GENERATIVE_AI_API_KEY",
  ollama: null,
  lmstudio: null,
};
