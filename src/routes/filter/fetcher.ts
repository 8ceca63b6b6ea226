import type { Env } from "../../config.js";
import { describeError, FetchError } from "../../errors.js";
import { toHttpsUrl } from "../../utils.js";

/** One plain GET of the configured feed; anything but 200 is a failure. Returns the body undecoded. */
export async function fetchFeed(env: Pick<Env, "CALENDAR_URL" | "USER_AGENT">): Promise<Uint8Array> {
    const url = toHttpsUrl(env.CALENDAR_URL);
    const headers: Record<string, string> = {
        Accept: "text/calendar, text/plain;q=0.9, */*;q=0.5",
    };
    if (env.USER_AGENT) {
        headers["User-Agent"] = env.USER_AGENT;
    }

    let response: Response;
    try {
        response = await fetch(url, { headers });
    } catch (error) {
        throw new FetchError(`request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status !== 200) {
        throw new FetchError(`unexpected status code: ${response.status}`);
    }

    try {
        return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
        throw new FetchError(`failed to read response: ${describeError(error)}`, { cause: error });
    }
}

/** UTF-8 text for the parser; a leading byte-order mark is dropped. */
export function decodeFeed(bytes: Uint8Array): string {
    return new TextDecoder().decode(bytes);
}
