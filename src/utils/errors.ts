/**
 * Error taxonomy
 *
 * Each class names one unit of failure. Callers contain these at the unit they
 * describe (one source, one server, one field, one subscriber) and surface them
 * as data; none of them is meant to abort a whole discovery run, log write or
 * elicitation session.
 */

import _ from 'lodash';

/** One configuration source could not be read or parsed */
export class SourceParseError extends Error {
    override readonly name = 'SourceParseError';

    constructor(readonly sourcePath: string, message: string) {
        super(message);
    }
}

/** One server entry is structurally invalid */
export class ServerValidationError extends Error {
    override readonly name = 'ServerValidationError';

    constructor(readonly serverName: string, message: string) {
        super(message);
    }
}

/** Connecting to a backend or listing its capabilities failed */
export class ProbeError extends Error {
    override readonly name = 'ProbeError';

    constructor(readonly serverName: string, message: string) {
        super(message);
    }
}

/** Reading or writing a durable store failed */
export class PersistenceError extends Error {
    override readonly name = 'PersistenceError';

    constructor(readonly path: string, readonly operation: 'read' | 'write', message: string) {
        super(message);
    }
}

/** An operator-supplied value does not fit the declared field */
export class ElicitationParseError extends Error {
    override readonly name = 'ElicitationParseError';

    constructor(readonly fieldName: string, message: string) {
        super(message);
    }
}

/** A log subscriber threw while being notified */
export class SubscriberError extends Error {
    override readonly name = 'SubscriberError';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}

/** A forwarded request arrived faster than the configured rate allows */
export class RateLimitError extends Error {
    override readonly name = 'RateLimitError';

    constructor(readonly ratePerSecond: number) {
        super(`Rate limit exceeded: maximum ${ratePerSecond} requests per second`);
    }
}
