import { DateTime, type Zone } from "luxon";
import { z } from "zod";

import { describeError, ValidationError } from "../../errors.js";
import logger from "../../logger.js";
import { parseTimeOfDay } from "../../time.js";
import { ianaZones, type ZoneResolver } from "../../zones.js";
import type { FilterRange, FilterSpec, TimeOfDay } from "./types.js";

const log = logger.child({ module: "filter-request" });

const filterBodySchema = z.object({
    time_ranges: z.array(
        z.object({
            start: z.string().datetime({ offset: true }),
            end: z.string().datetime({ offset: true }),
        }),
    ),
});

export type FilterRequestBody = z.infer<typeof filterBodySchema>;

export interface FilterRequestOptions {
    /** Zone used when the request names none. */
    defaultZone: Zone;
    zones?: ZoneResolver;
}

function withContext(prefix: string, parse: () => TimeOfDay): TimeOfDay {
    try {
        return parse();
    } catch (error) {
        throw new ValidationError(`${prefix}: ${describeError(error)}`);
    }
}

/** Parses `09:00-10:00,14:00-15:00`; blank tokens are skipped. */
export function parseRangeList(value: string): FilterRange[] {
    const ranges: FilterRange[] = [];
    for (const rawToken of value.split(",")) {
        const token = rawToken.trim();
        if (!token) {
            continue;
        }
        const parts = token.split("-");
        if (parts.length !== 2) {
            throw new ValidationError(`invalid range format: ${token} (expected HH:MM-HH:MM)`);
        }
        const [startPart, endPart] = parts;
        ranges.push({
            start: withContext(`invalid start time in range ${token}`, () => parseTimeOfDay(startPart.trim())),
            end: withContext(`invalid end time in range ${token}`, () => parseTimeOfDay(endPart.trim())),
        });
    }
    return ranges;
}

export function parseRangePairs(starts: readonly string[], ends: readonly string[]): FilterRange[] {
    if (starts.length !== ends.length) {
        throw new ValidationError("mismatched start/end time pairs");
    }
    return starts.map((start, index) => {
        const end = ends[index];
        return {
            start: withContext(`invalid start time ${start}`, () => parseTimeOfDay(start)),
            end: withContext(`invalid end time ${end}`, () => parseTimeOfDay(end)),
        };
    });
}

/** Keeps the hour and minute exactly as written in an RFC 3339 timestamp. */
function writtenTimeOfDay(timestamp: string): TimeOfDay {
    const parsed = DateTime.fromISO(timestamp, { setZone: true });
    return { hour: parsed.hour, minute: parsed.minute };
}

export function rangesFromBody(body: FilterRequestBody): FilterRange[] {
    return body.time_ranges.map((range) => ({
        start: writtenTimeOfDay(range.start),
        end: writtenTimeOfDay(range.end),
    }));
}

async function readBodyRanges(request: Request): Promise<FilterRange[]> {
    if (request.method !== "POST") {
        return [];
    }
    const text = await request.text();
    if (!text.trim()) {
        return [];
    }
    let payload: unknown;
    try {
        payload = JSON.parse(text);
    } catch (error) {
        log.debug({ err: describeError(error) }, "Request body is not JSON, using query parameters");
        return [];
    }
    const parsed = filterBodySchema.safeParse(payload);
    if (!parsed.success) {
        log.debug({ issues: parsed.error.issues.length }, "Request body does not match time_ranges schema");
        return [];
    }
    return rangesFromBody(parsed.data);
}

function resolveZone(params: URLSearchParams, options: FilterRequestOptions): Zone {
    const name = params.get("tz");
    if (!name) {
        return options.defaultZone;
    }
    const zone = (options.zones ?? ianaZones).resolve(name);
    if (!zone) {
        throw new ValidationError(`invalid timezone: ${name}`);
    }
    return zone;
}

/**
 * Builds the filter for one request. A JSON body with at least one entry
 * wins over the query string and is always matched in the default zone;
 * `tz` is still checked so a bad name is rejected either way. Otherwise
 * `ranges` is tried before repeated `start`/`end` parameters. No ranges at
 * all means pass-through.
 */
export async function parseFilterRequest(request: Request, options: FilterRequestOptions): Promise<FilterSpec> {
    const params = new URL(request.url).searchParams;
    const zone = resolveZone(params, options);

    const bodyRanges = await readBodyRanges(request);
    if (bodyRanges.length > 0) {
        return { ranges: bodyRanges, zone: options.defaultZone };
    }

    const rangesParam = params.get("ranges");
    if (rangesParam) {
        return { ranges: parseRangeList(rangesParam), zone };
    }

    return { ranges: parseRangePairs(params.getAll("start"), params.getAll("end")), zone };
}
