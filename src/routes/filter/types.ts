import type { Zone } from "luxon";

export interface TimeOfDay {
    /** 0-23 */
    hour: number;
    /** 0-59 */
    minute: number;
}

/** A daily block. Start after end (overnight) is allowed. */
export interface FilterRange {
    start: TimeOfDay;
    end: TimeOfDay;
}

export interface FilterSpec {
    readonly ranges: readonly FilterRange[];
    readonly zone: Zone;
}

export interface FilterResult {
    body: string;
    /** Every VEVENT in the source feed. */
    originalCount: number;
    /** Events that resolved and did not match any range. */
    keptCount: number;
}
