export class RequestError extends Error {
    constructor(message: string, public status: number) {
        super(message);
        this.name = new.target.name;
    }
}

/** Malformed filter input: bad time, token, pair count or zone. */
export class ValidationError extends RequestError {
    constructor(message: string) {
        super(message, 400);
    }
}

/** Transport failure or non-200 answer from the upstream feed. */
export class FetchError extends RequestError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 500);
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/** The fetched bytes are not a well-formed calendar. */
export class ParseError extends RequestError {
    constructor(message: string) {
        super(message, 500);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
