/**
 * Pino logger shared by the modules of one document.
 *
 * Output is off (`silent`) unless a level is requested through document
 * options or the PDFMINT_LOG_LEVEL environment variable.
 */
import type { Logger } from "pino";
import pino from "pino";

import { type LogLevel, LogLevelSchema } from "#src/config/options";

export type { Logger };

function levelFromEnv(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.PDFMINT_LOG_LEVEL);

  return parsed.success ? parsed.data : "silent";
}

export function createLogger(level?: LogLevel): Logger {
  return pino({
    name: "pdfmint",
    level: level ?? levelFromEnv(),
  });
}
