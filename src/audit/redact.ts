/**
 * Parameter redaction for audit logs
 */

import { createLogger } from "../utils/logger.js";

const log = createLogger("audit-redact");

const SENSITIVE_KEYS = [
  "secret",
  "password",
  "apikey",
  "api_key",
  "token",
  "auth",
  "authorization",
  "credential",
];

const MAX_STRING_LENGTH = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function redactParams(params: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(params)) {
    if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
      redacted[key] = "[REDACTED]";
      log.debug(`Redacted sensitive key: ${key}`);
      continue;
    }

    if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
      redacted[key] = value.slice(0, 50) + "...[truncated]";
      continue;
    }

    if (isRecord(value)) {
      redacted[key] = redactParams(value);
      continue;
    }

    if (Array.isArray(value)) {
      redacted[key] = value.map((item) => (isRecord(item) ? redactParams(item) : item));
      continue;
    }

    redacted[key] = value;
  }

  return redacted;
}
