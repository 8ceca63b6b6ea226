export const DEFAULT_PORT = 8080;
export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export const DEFAULT_LOG_LEVEL = "info";
export const CALENDAR_CONTENT_TYPE = "text/calendar; charset=utf-8";
export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
