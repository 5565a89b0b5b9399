/**
 * OpenAI v1 API compatible client
 *
 * Works against any OpenAI-compatible endpoint; Ollama serves one at
 * `http://localhost:11434/v1`, LM Studio and vLLM do the same.
 */

import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { HTTPError, TimeoutError } from "./errors.js";
import type { ChatMessage, CompletionOptions, CompletionResult } from "./types.js";

const log = createLogger("openai-compatible");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  baseUrl: string;
  model: string;
  embeddingModel?: string;
  apiKey?: string;
  authType?: "bearer" | "api-key" | "header" | "none";
  authHeader?: string;
  timeoutMs?: number;
}

interface OpenAIRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
  stream?: boolean;
}

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

const modelsResponseSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

const errorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

type CompletionResponse = z.infer<typeof completionResponseSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Join an API path onto the base URL, tolerating a base that already ends with it. */
export function endpointUrl(baseUrl: string, path: string): string {
  const normalized = baseUrl.replace(/\/+$/, "");
  return normalized.endsWith(path) ? normalized : `${normalized}${path}`;
}

export function buildHeaders(config: OpenAICompatibleConfig): Record<string, string> {
  const { apiKey, authType, authHeader } = config;
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  // Warn on suspicious auth configurations
  if (authType === "none" && apiKey && apiKey.trim() !== "") {
    log.warn("authType is 'none' but apiKey is set; apiKey will be ignored");
  }
  if (authType === "header" && (!authHeader || authHeader.trim() === "")) {
    log.warn("authType is 'header' but authHeader is empty");
  }

  if (apiKey && apiKey.trim() !== "") {
    switch (authType ?? "bearer") {
      case "bearer":
        headers["Authorization"] = `Bearer ${apiKey}`;
        break;
      case "api-key":
        headers["Authorization"] = `ApiKey ${apiKey}`;
        break;
      case "header":
        if (authHeader) headers[authHeader] = apiKey;
        break;
      case "none":
        break;
    }
  }

  return headers;
}

export function fromOpenAIResponse(response: CompletionResponse, model: string): CompletionResult {
  const choice = response.choices[0];
  if (!choice) {
    throw new Error("No choices in OpenAI response");
  }

  return {
    content: choice.message.content ?? "",
    model: response.model || model,
    usage: {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    },
    truncated: choice.finish_reason === "length",
  };
}

async function requestJson(
  config: OpenAICompatibleConfig,
  url: string,
  init: { method: "GET" | "POST"; body?: unknown },
): Promise<unknown> {
  const timeoutMs = config.timeoutMs ?? 120_000;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: init.method,
      headers: buildHeaders(config),
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      let errorMessage = `HTTP ${response.status}: ${response.statusText}`;
      try {
        const parsed = errorResponseSchema.safeParse(await response.json());
        if (parsed.success) {
          errorMessage = `HTTP ${response.status}: ${parsed.data.error.message}`;
        }
      } catch {
        // Non-JSON error body, keep the status text
      }

      log.error(`OpenAI-compatible API error: ${errorMessage}`);
      throw new HTTPError(response.status, errorMessage);
    }

    return await response.json();
  } catch (err) {
    if (err instanceof HTTPError) {
      throw err;
    }

    if (err instanceof Error) {
      if (err.name === "AbortError") {
        log.error(`Request timeout after ${timeoutMs}ms`);
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
      }

      if (
        err.message.includes("fetch") ||
        err.message.includes("ECONNREFUSED") ||
        err.message.includes("ENOTFOUND") ||
        err.message.includes("network")
      ) {
        log.error(`Network error: ${err.message}`);
        throw new Error(`Network error: ${err.message}`);
      }
    }

    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Unexpected ${what} response: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
  }
  return parsed.data;
}

// ─────────────────────────────────────────────────────────────────────────────
// API Client
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Make a request to an OpenAI-compatible chat completions endpoint
 */
export async function openAICompatibleComplete(
  config: OpenAICompatibleConfig,
  messages: ChatMessage[],
  options?: CompletionOptions,
): Promise<CompletionResult> {
  const url = endpointUrl(config.baseUrl, "/chat/completions");

  const requestBody: OpenAIRequest = {
    model: config.model,
    messages,
    max_tokens: options?.maxTokens ?? 4096,
    stream: false,
  };
  if (options?.temperature !== undefined) {
    requestBody.temperature = options.temperature;
  }

  log.info(`Calling OpenAI-compatible endpoint: ${url} (model: ${config.model})`);
  log.debug(`Request body: ${JSON.stringify(requestBody, null, 2)}`);

  const data = await requestJson(config, url, { method: "POST", body: requestBody });
  log.debug(`Response: ${JSON.stringify(data, null, 2)}`);

  return fromOpenAIResponse(parseResponse(completionResponseSchema, data, "chat completion"), config.model);
}

/**
 * Embed texts via `/embeddings`. Vectors come back in input order.
 */
export async function openAICompatibleEmbed(
  config: OpenAICompatibleConfig,
  texts: string[],
): Promise<number[][]> {
  if (texts.length === 0) return [];

  const url = endpointUrl(config.baseUrl, "/embeddings");
  const model = config.embeddingModel ?? config.model;
  log.debug(`Embedding ${texts.length} text(s) with ${model}`);

  const data = await requestJson(config, url, {
    method: "POST",
    body: { model, input: texts },
  });
  const parsed = parseResponse(embeddingResponseSchema, data, "embeddings");
  if (parsed.data.length !== texts.length) {
    throw new Error(`Expected ${texts.length} embeddings, got ${parsed.data.length}`);
  }

  return [...parsed.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
}

/**
 * List model ids served by the endpoint (`GET /models`).
 */
export async function openAICompatibleListModels(config: OpenAICompatibleConfig): Promise<string[]> {
  const url = endpointUrl(config.baseUrl, "/models");
  const data = await requestJson(config, url, { method: "GET" });
  return parseResponse(modelsResponseSchema, data, "models").data.map((m) => m.id);
}
