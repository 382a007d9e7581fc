import { pino } from "pino";
import type { Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "plan-retrieval"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type { Logger };

/**
 * Returns a child logger tagged with the emitting component.
 */
export function getComponentLogger(component: string): Logger {
  return logger.child({ component });
}
