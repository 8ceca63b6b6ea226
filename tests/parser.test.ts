import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { FixedOffsetZone, IANAZone } from "luxon";
import { describe, expect, it } from "vitest";

import { ParseError } from "../src/errors.js";
import { parseFeed } from "../src/parser.js";
import type { CalendarFeed, FeedEvent } from "../src/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function loadFixture(name: string): string {
  return readFileSync(join(__dirname, "fixtures", name), "utf8");
}

function eventById(feed: CalendarFeed, uid: string): FeedEvent {
  const event = feed.events().find((candidate) => candidate.uid === uid);
  if (!event) {
    throw new Error(`no event ${uid}`);
  }
  return event;
}

function isoInterval(event: FeedEvent, zone: Parameters<FeedEvent["interval"]>[0]): [string, string] {
  const { start, end } = event.interval(zone);
  return [start.toISOString(), end.toISOString()];
}

const berlin = IANAZone.create("Europe/Berlin");

describe("parseFeed", () => {
  const feed = parseFeed(loadFixture("team.ics"));

  it("lists every VEVENT in source order", () => {
    expect(feed.events().map((event) => event.uid)).toEqual([
      "standup@example.org",
      "focus@example.org",
      "planning@example.org",
      "floating@example.org",
      "custom-zone@example.org",
      "duration@example.org",
      "unknown-zone@example.org",
      "holiday@example.org",
      "no-start@example.org",
    ]);
    expect(eventById(feed, "focus@example.org").summary).toBe("Focus block");
  });

  it("exposes calendar-level properties", () => {
    expect(feed.properties()).toEqual([
      "VERSION:2.0",
      "PRODID:-//Example Org//Team Calendar//EN",
      "CALSCALE:GREGORIAN",
      "METHOD:PUBLISH",
      "X-WR-CALNAME:Team Calendar",
      "X-WR-TIMEZONE:Europe/Berlin",
    ]);
  });

  it("reads UTC instants as absolute", () => {
    expect(isoInterval(eventById(feed, "standup@example.org"), berlin)).toEqual([
      "2025-10-06T07:00:00.000Z",
      "2025-10-06T07:15:00.000Z",
    ]);
  });

  it("places TZID values in their IANA zone", () => {
    expect(isoInterval(eventById(feed, "focus@example.org"), FixedOffsetZone.utcInstance)).toEqual([
      "2025-10-07T07:00:00.000Z",
      "2025-10-07T08:00:00.000Z",
    ]);
  });

  it("falls back to the feed's own VTIMEZONE for non-IANA names", () => {
    expect(isoInterval(eventById(feed, "custom-zone@example.org"), berlin)).toEqual([
      "2025-10-09T07:00:00.000Z",
      "2025-10-09T08:00:00.000Z",
    ]);
  });

  it("reads floating times in the supplied zone", () => {
    expect(isoInterval(eventById(feed, "floating@example.org"), FixedOffsetZone.instance(-300))).toEqual([
      "2025-10-08T19:00:00.000Z",
      "2025-10-08T20:00:00.000Z",
    ]);
  });

  it("derives the end from DURATION", () => {
    expect(isoInterval(eventById(feed, "duration@example.org"), berlin)).toEqual([
      "2025-10-10T12:00:00.000Z",
      "2025-10-10T13:00:00.000Z",
    ]);
  });

  it("starts all-day events at midnight in the supplied zone", () => {
    expect(isoInterval(eventById(feed, "holiday@example.org"), FixedOffsetZone.utcInstance)).toEqual([
      "2025-10-11T00:00:00.000Z",
      "2025-10-12T00:00:00.000Z",
    ]);
  });

  it("fails to resolve unknown zones and missing starts", () => {
    expect(() => eventById(feed, "unknown-zone@example.org").interval(berlin)).toThrow("unknown TZID Nowhere/Land");
    expect(() => eventById(feed, "no-start@example.org").interval(berlin)).toThrow("missing DTSTART");
  });

  it("applies the RFC 5545 defaults when DTEND and DURATION are absent", () => {
    const bare = parseFeed(
      [
        "BEGIN:VCALENDAR",
        "VERSION:2.0",
        "PRODID:-//Example Org//Test//EN",
        "BEGIN:VEVENT",
        "UID:day@example.org",
        "DTSTART;VALUE=DATE:20250301",
        "END:VEVENT",
        "BEGIN:VEVENT",
        "UID:instant@example.org",
        "DTSTART:20250301T101500Z",
        "END:VEVENT",
        "END:VCALENDAR",
      ].join("\r\n"),
    );

    expect(isoInterval(eventById(bare, "day@example.org"), FixedOffsetZone.utcInstance)).toEqual([
      "2025-03-01T00:00:00.000Z",
      "2025-03-02T00:00:00.000Z",
    ]);
    expect(isoInterval(eventById(bare, "instant@example.org"), FixedOffsetZone.utcInstance)).toEqual([
      "2025-03-01T10:15:00.000Z",
      "2025-03-01T10:15:00.000Z",
    ]);
  });

  it("rejects text that is not a calendar", () => {
    expect(() => parseFeed("<html><body>Service unavailable</body></html>")).toThrow(ParseError);
    expect(() => parseFeed("BEGIN:VEVENT\r\nUID:x\r\nEND:VEVENT")).toThrow(
      "failed to parse calendar: no VCALENDAR component",
    );
  });
});

describe("CalendarFeed.withEvents", () => {
  it("builds a new feed with the same properties and timezone definitions", () => {
    const source = parseFeed(loadFixture("team.ics"));
    const chosen = source.events().filter((event) => event.uid === "planning@example.org");

    const output = source.withEvents(chosen);
    const reparsed = parseFeed(output.serialize());

    expect(reparsed.properties()).toEqual(source.properties());
    expect(reparsed.events().map((event) => event.uid)).toEqual(["planning@example.org"]);
    expect(output.serialize()).toContain("TZID:Custom Standard Time");
    expect(source.events()).toHaveLength(9);
  });

  it("keeps properties when every event is dropped", () => {
    const source = parseFeed(loadFixture("team.ics"));
    const reparsed = parseFeed(source.withEvents([]).serialize());

    expect(reparsed.events()).toHaveLength(0);
    expect(reparsed.properties()).toEqual(source.properties());
  });
});
