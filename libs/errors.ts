export type ErrorDetails = Record<string, unknown>;

/**
 * Base for every failure the pipeline raises on purpose. `details` carries
 * the offending table/column/id so callers can report without parsing text.
 */
export class TimelineError extends Error {
    readonly details: ErrorDetails;

    constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.details = details;
    }

    get recoverable(): boolean {
        return false;
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            details: this.details,
            recoverable: this.recoverable,
        };
    }
}

/** Neither a source root nor a connection, a basic table listed explicitly, or bad option values. */
export class ConfigurationError extends TimelineError {}

export class MissingTableParser extends TimelineError {
    readonly table: string;

    constructor(table: string, registered: string[]) {
        super(`Parser for table ${table} is not implemented`, { table, registered });
        this.table = table;
    }
}

export class MissingSource extends TimelineError {
    readonly table: string;

    constructor(table: string, location: string, options?: { cause?: unknown }) {
        super(`Source for table ${table} not found at ${location}`, { table, location }, options);
        this.table = table;
    }
}

export class SchemaError extends TimelineError {
    readonly table: string;
    readonly column: string;

    constructor(table: string, column: string, reason = "required column is missing") {
        super(`Schema error in ${table}.${column}: ${reason}`, { table, column });
        this.table = table;
        this.column = column;
    }
}

export class ParseError extends TimelineError {
    get recoverable(): boolean {
        return true;
    }
}

/** Cached artifact unreadable. Only an explicit refreshCache run recovers. */
export class CacheCorruption extends TimelineError {
    constructor(key: string, location: string, options?: { cause?: unknown }) {
        const reason = options?.cause instanceof Error ? options.cause.message : "unreadable artifact";
        super(
            `Cached timeline ${key} at ${location} is unreadable (${reason}); rerun with refreshCache=true`,
            { key, location },
            options,
        );
    }
}

export class MappingError extends TimelineError {}

// fs errors fail `instanceof Error` under Jest's VM realm; match on shape.
export function isNotFound(err: unknown): boolean {
    return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") return err.message;
    return String(err);
}
