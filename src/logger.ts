import { pino } from "pino";

import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "./constants.js";

export function levelFromEnvironment(source: Record<string, string | undefined> = process.env): string {
  const requested = source.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === requested) ?? DEFAULT_LOG_LEVEL;
}

// LOG_LEVEL is read here, once: child loggers copy the level when they are
// created, and the entry point loads .env before importing this module.
const logger = pino({
  level: levelFromEnvironment(),
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

export default logger;
