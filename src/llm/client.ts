import type { LlmConfig } from "../config/schema.js";
import {
  openAICompatibleComplete,
  openAICompatibleEmbed,
  openAICompatibleListModels,
  type OpenAICompatibleConfig,
} from "./openai-compatible.js";
import type { LLMClient } from "./types.js";

/** Model client bound to the `llm` config section. */
export function createLLMClient(config: LlmConfig): LLMClient {
  const endpoint: OpenAICompatibleConfig = {
    baseUrl: config.baseUrl,
    model: config.model,
    embeddingModel: config.embeddingModel,
    apiKey: config.apiKey,
    authType: config.authType,
    authHeader: config.authHeader,
    timeoutMs: config.timeoutMs,
  };

  return {
    model: config.model,
    complete: (messages, options) =>
      openAICompatibleComplete(endpoint, messages, {
        maxTokens: options?.maxTokens ?? config.maxTokens,
        temperature: options?.temperature ?? config.temperature,
      }),
    embed: (texts) => openAICompatibleEmbed(endpoint, texts),
    listModels: () => openAICompatibleListModels(endpoint),
  };
}
