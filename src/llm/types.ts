/**
 * Model client contracts.
 */

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionResult {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
  /** The model stopped at the token limit. */
  truncated: boolean;
}

export interface LLMClient {
  readonly model: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
  /** One vector per input, in input order. */
  embed(texts: string[]): Promise<number[][]>;
  listModels(): Promise<string[]>;
}
