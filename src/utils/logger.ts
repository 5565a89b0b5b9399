/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

/** Optional file transport: if LOG_FILE is set, also append formatted lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch (err) {
    process.stderr.write(`Cannot create log directory for ${logFile}: ${String(err)}\n`);
    return [];
  }

  return [
    (logObj: ILogObj) => {
      const meta = logObj["_meta"];
      const ts =
        typeof meta === "object" && meta !== null && "date" in meta
          ? String(meta.date)
          : new Date().toISOString();
      const parts = Object.values(logObj).filter(
        (v) => typeof v === "string" || typeof v === "number",
      );
      try {
        appendFileSync(logFile, `${ts} ${parts.join(" ")}\n`);
      } catch {
        // Logging the failure here would recurse into this transport.
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "filewise",
  minLevel: process.env.LOG_LEVEL === "debug" ? 2 : 3, // debug=2, info=3
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export type AppLogger = Logger<ILogObj>;

export function createLogger(name: string): AppLogger {
  return logger.getSubLogger({ name });
}
