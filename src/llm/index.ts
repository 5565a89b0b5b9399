export { createLLMClient } from "./client.js";
export { HTTPError, TimeoutError } from "./errors.js";
export type { ChatMessage, CompletionOptions, CompletionResult, LLMClient } from "./types.js";
