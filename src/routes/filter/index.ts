import type { Env } from "../../config.js";
import { CALENDAR_CONTENT_TYPE, TEXT_CONTENT_TYPE } from "../../constants.js";
import { describeError, FetchError, ParseError, ValidationError } from "../../errors.js";
import logger from "../../logger.js";
import { parseFeed } from "../../parser.js";
import { formatTimeOfDay } from "../../time.js";
import { defaultZone, ianaZones, type ZoneResolver } from "../../zones.js";
import { decodeFeed, fetchFeed } from "./fetcher.js";
import { parseFilterRequest } from "./request.js";
import { filterFeed } from "./transform.js";
import type { FilterSpec } from "./types.js";

const log = logger.child({ module: "filter" });

export interface FilterContext {
    /** Caller address, for logs only. */
    remoteAddress?: string;
    zones?: ZoneResolver;
}

function textResponse(message: string, status: number): Response {
    return new Response(message, {
        status,
        headers: { "Content-Type": TEXT_CONTENT_TYPE },
    });
}

function calendarResponse(body: string | Uint8Array): Response {
    return new Response(body, {
        headers: { "Content-Type": CALENDAR_CONTENT_TYPE },
    });
}

function countEvents(text: string): number | null {
    try {
        return parseFeed(text).events().length;
    } catch (error) {
        log.warn({ err: describeError(error) }, "Unfiltered feed could not be parsed for counting");
        return null;
    }
}

export async function handleFilterRequest(request: Request, env: Env, context: FilterContext = {}): Promise<Response> {
    const zones = context.zones ?? ianaZones;
    const client = context.remoteAddress ?? request.headers.get("x-forwarded-for") ?? "unknown";

    let spec: FilterSpec;
    try {
        spec = await parseFilterRequest(request, { defaultZone: defaultZone(env, zones), zones });
    } catch (error) {
        if (error instanceof ValidationError) {
            log.info({ client, err: error.message }, "Rejected filter parameters");
            return textResponse(`Invalid filter parameters: ${error.message}`, error.status);
        }
        throw error;
    }

    let bytes: Uint8Array;
    try {
        bytes = await fetchFeed(env);
    } catch (error) {
        if (error instanceof FetchError) {
            log.error({ client, err: error.message }, "Upstream calendar fetch failed");
            return textResponse(`Failed to fetch calendar: ${error.message}`, error.status);
        }
        throw error;
    }

    if (spec.ranges.length === 0) {
        log.info({ client, events: countEvents(decodeFeed(bytes)) }, "No filters applied");
        return calendarResponse(bytes);
    }

    try {
        const result = filterFeed(decodeFeed(bytes), spec);
        log.info(
            {
                client,
                zone: spec.zone.name,
                ranges: spec.ranges.map((range) => `${formatTimeOfDay(range.start)}-${formatTimeOfDay(range.end)}`),
                original: result.originalCount,
                kept: result.keptCount,
                removed: result.originalCount - result.keptCount,
            },
            "Filtered calendar",
        );
        return calendarResponse(result.body);
    } catch (error) {
        if (error instanceof ParseError) {
            log.error({ client, err: error.message }, "Upstream calendar could not be parsed");
            return textResponse(`Failed to filter calendar: ${error.message}`, error.status);
        }
        throw error;
    }
}
