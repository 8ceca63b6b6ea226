import type { Zone } from "luxon";

export interface EventInterval {
  start: Date;
  end: Date;
}

/** One VEVENT. Only its instants are interpreted; the rest is carried as-is. */
export interface FeedEvent {
  readonly uid: string | null;
  readonly summary: string | null;
  /**
   * Absolute start and end. Floating and all-day values are read as wall-clock
   * time in `floatingZone`. Throws when either instant cannot be derived.
   */
  interval(floatingZone: Zone): EventInterval;
}

export interface CalendarFeed {
  /** Calendar-level property lines, serialized. */
  properties(): string[];
  events(): readonly FeedEvent[];
  /** A new feed with the same properties and non-event components. */
  withEvents(events: readonly FeedEvent[]): CalendarFeed;
  serialize(): string;
}
