import { IANAZone } from "luxon";
import { z } from "zod";

import { DEFAULT_PORT } from "./constants.js";

const schema = z.object({
  CALENDAR_URL: z
    .string({ required_error: "CALENDAR_URL environment variable is required" })
    .url()
    .refine((value) => /^(https?|webcal):\/\//i.test(value), {
      message: "CALENDAR_URL must be an http, https or webcal URL",
    }),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  TIMEZONE: z
    .string()
    .optional()
    .refine((value) => value === undefined || IANAZone.isValidZone(value), {
      message: "TIMEZONE must be an IANA zone name",
    }),
  USER_AGENT: z.string().optional(),
});

export type Env = z.infer<typeof schema>;

export type ConfigResult =
  | { success: true; env: Env }
  | { success: false; issues: string[] };

/**
 * Validates process-level settings once at startup. LOG_LEVEL is not part of
 * it: the logger reads that one itself when first imported. Empty strings count as
 * unset, so `PORT=` in a .env file falls back to the default.
 */
export function parseConfig(source: Record<string, string | undefined>): ConfigResult {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { success: true, env: parsed.data };
}
