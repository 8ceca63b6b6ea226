import ICAL from "ical.js";
import { DateTime, IANAZone, type Zone } from "luxon";

import { describeError, ParseError } from "./errors.js";
import type { CalendarFeed, EventInterval, FeedEvent } from "./types.js";

const VCALENDAR = "vcalendar";
const VEVENT = "vevent";
const VTIMEZONE = "vtimezone";

type TimezoneTable = Map<string, ICAL.Timezone>;

function textProperty(component: ICAL.Component, name: string): string | null {
  const value = component.getFirstPropertyValue(name);
  return typeof value === "string" ? value : null;
}

function readTime(property: ICAL.Property): ICAL.Time {
  const value = property.getFirstValue();
  if (!(value instanceof ICAL.Time)) {
    throw new Error(`${property.name.toUpperCase()} is not a date or date-time`);
  }
  return value;
}

function wallClockInstant(text: string, zone: Zone | string): Date {
  const parsed = DateTime.fromISO(text, { zone });
  if (!parsed.isValid) {
    throw new Error(`cannot place ${text} in ${typeof zone === "string" ? zone : zone.name}: ${parsed.invalidExplanation ?? parsed.invalidReason ?? "invalid"}`);
  }
  return parsed.toJSDate();
}

function offsetInstant(time: ICAL.Time, timezone: ICAL.Timezone): Date {
  const offsetSeconds = timezone.utcOffset(time);
  const wallClock = Date.UTC(time.year, time.month - 1, time.day, time.hour, time.minute, time.second);
  return new Date(wallClock - offsetSeconds * 1000);
}

/**
 * UTC values are absolute. A TZID is looked up as an IANA name first, then
 * among the feed's own VTIMEZONE definitions. Floating and DATE values take
 * the wall clock of `floatingZone`.
 */
function resolveInstant(property: ICAL.Property, timezones: TimezoneTable, floatingZone: Zone): Date {
  const time = readTime(property);
  const text = time.toString();
  if (text.endsWith("Z")) {
    return wallClockInstant(text, "utc");
  }

  const tzid = property.getParameter("tzid");
  if (typeof tzid === "string" && tzid) {
    if (IANAZone.isValidZone(tzid)) {
      return wallClockInstant(text, IANAZone.create(tzid));
    }
    const timezone = timezones.get(tzid);
    if (timezone) {
      return offsetInstant(time, timezone);
    }
    throw new Error(`unknown TZID ${tzid}`);
  }

  return wallClockInstant(text, floatingZone);
}

class IcalEvent implements FeedEvent {
  readonly uid: string | null;
  readonly summary: string | null;

  constructor(readonly component: ICAL.Component, private readonly timezones: TimezoneTable) {
    this.uid = textProperty(component, "uid");
    this.summary = textProperty(component, "summary");
  }

  interval(floatingZone: Zone): EventInterval {
    const startProperty = this.component.getFirstProperty("dtstart");
    if (!startProperty) {
      throw new Error("missing DTSTART");
    }
    const start = resolveInstant(startProperty, this.timezones, floatingZone);

    const endProperty = this.component.getFirstProperty("dtend");
    if (endProperty) {
      return { start, end: resolveInstant(endProperty, this.timezones, floatingZone) };
    }

    const duration = this.component.getFirstPropertyValue("duration");
    if (duration instanceof ICAL.Duration) {
      return { start, end: new Date(start.getTime() + duration.toSeconds() * 1000) };
    }

    // RFC 5545: without DTEND or DURATION an all-day event lasts one day and a timed one is instantaneous.
    if (readTime(startProperty).isDate) {
      const end = DateTime.fromJSDate(start, { zone: floatingZone }).plus({ days: 1 });
      return { start, end: end.toJSDate() };
    }
    return { start, end: start };
  }
}

class IcalFeed implements CalendarFeed {
  private readonly timezones: TimezoneTable = new Map();
  private readonly eventList: IcalEvent[] = [];

  constructor(private readonly calendar: ICAL.Component) {
    for (const definition of calendar.getAllSubcomponents(VTIMEZONE)) {
      const tzid = textProperty(definition, "tzid");
      if (tzid) {
        this.timezones.set(tzid, new ICAL.Timezone(definition));
      }
    }
    for (const component of calendar.getAllSubcomponents(VEVENT)) {
      this.eventList.push(new IcalEvent(component, this.timezones));
    }
  }

  properties(): string[] {
    return this.calendar.getAllProperties().map((property) => property.toICALString());
  }

  events(): readonly FeedEvent[] {
    return this.eventList;
  }

  withEvents(events: readonly FeedEvent[]): CalendarFeed {
    const kept = new Set<ICAL.Component>();
    for (const event of events) {
      if (event instanceof IcalEvent) {
        kept.add(event.component);
      }
    }

    const output = new ICAL.Component(VCALENDAR);
    for (const property of this.calendar.getAllProperties()) {
      output.addProperty(ICAL.Property.fromString(property.toICALString()));
    }
    for (const component of this.calendar.getAllSubcomponents()) {
      if (component.name === VEVENT && !kept.has(component)) {
        continue;
      }
      output.addSubcomponent(ICAL.Component.fromString(component.toString()));
    }
    return new IcalFeed(output);
  }

  serialize(): string {
    return this.calendar.toString();
  }
}

function readCalendar(text: string): ICAL.Component {
  try {
    const root = ICAL.Component.fromString(text);
    if (root.name === VCALENDAR) {
      return root;
    }
  } catch (error) {
    throw new ParseError(`failed to parse calendar: ${describeError(error)}`);
  }
  throw new ParseError("failed to parse calendar: no VCALENDAR component");
}

export function parseFeed(text: string): CalendarFeed {
  return new IcalFeed(readCalendar(text));
}
