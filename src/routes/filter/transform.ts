import { describeError } from "../../errors.js";
import logger from "../../logger.js";
import { parseFeed } from "../../parser.js";
import type { EventInterval, FeedEvent } from "../../types.js";
import { matchesFilter } from "./matcher.js";
import type { FilterResult, FilterSpec } from "./types.js";

const log = logger.child({ module: "filter-transform" });

export function filterFeed(text: string, spec: FilterSpec): FilterResult {
    const feed = parseFeed(text);
    const source = feed.events();
    const kept: FeedEvent[] = [];

    for (const event of source) {
        let interval: EventInterval;
        try {
            interval = event.interval(spec.zone);
        } catch (error) {
            log.warn({ uid: event.uid, err: describeError(error) }, "Skipping event without resolvable start/end");
            continue;
        }
        if (!matchesFilter(interval.start, interval.end, spec)) {
            kept.push(event);
        }
    }

    return {
        body: feed.withEvents(kept).serialize(),
        originalCount: source.length,
        keptCount: kept.length,
    };
}
