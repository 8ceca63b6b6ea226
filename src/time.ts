import { DateTime, type Zone } from "luxon";

import { ValidationError } from "./errors.js";
import type { TimeOfDay } from "./routes/filter/types.js";
import { pad } from "./utils.js";

const UNSIGNED_INTEGER_REGEX = /^\d+$/;

export function parseTimeOfDay(value: string): TimeOfDay {
  const parts = value.split(":");
  if (parts.length !== 2) {
    throw new ValidationError("invalid time format, expected HH:MM");
  }
  const [hourPart, minutePart] = parts;

  const hour = UNSIGNED_INTEGER_REGEX.test(hourPart) ? Number.parseInt(hourPart, 10) : Number.NaN;
  if (!Number.isFinite(hour) || hour > 23) {
    throw new ValidationError(`invalid hour: ${hourPart}`);
  }

  const minute = UNSIGNED_INTEGER_REGEX.test(minutePart) ? Number.parseInt(minutePart, 10) : Number.NaN;
  if (!Number.isFinite(minute) || minute > 59) {
    throw new ValidationError(`invalid minute: ${minutePart}`);
  }

  return { hour, minute };
}

export function formatTimeOfDay(value: TimeOfDay): string {
  return `${pad(value.hour)}:${pad(value.minute)}`;
}

/** Wall-clock hour and minute of an instant as seen in `zone`. */
export function timeOfDayIn(instant: Date, zone: Zone): TimeOfDay {
  const local = DateTime.fromJSDate(instant, { zone });
  return { hour: local.hour, minute: local.minute };
}

export function sameTimeOfDay(a: TimeOfDay, b: TimeOfDay): boolean {
  return a.hour === b.hour && a.minute === b.minute;
}
