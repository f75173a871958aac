import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { LlmProvider } from "../config";

/**
 * Resolves a provider name and model id to an `ai` SDK language model.
 * Hosted providers read their API key from the environment; local ones
 * take their base URL from `OLLAMA_BASE_URL` / `LMSTUDIO_BASE_URL`.
 */
export function getModel(provider: LlmProvider, modelId: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return createOllama({
        baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${String(_exhaustive)}`);
    }
  }
}
