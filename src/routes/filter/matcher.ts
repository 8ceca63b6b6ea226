import { sameTimeOfDay, timeOfDayIn } from "../../time.js";
import type { FilterSpec } from "./types.js";

/**
 * True when the event's local start and end wall-clock times both equal those
 * of some range. Dates and seconds are ignored.
 */
export function matchesFilter(start: Date, end: Date, spec: FilterSpec): boolean {
    const localStart = timeOfDayIn(start, spec.zone);
    const localEnd = timeOfDayIn(end, spec.zone);
    return spec.ranges.some((range) => sameTimeOfDay(range.start, localStart) && sameTimeOfDay(range.end, localEnd));
}
