import { ParseError } from "../errors";

/** Canonical local timestamp, `YYYY-MM-DDTHH:mm:ss`. Sorts lexicographically. */
export type Timestamp = string;

const TIMESTAMP_RE =
    /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

export function formatTimestamp(y: number, mo: number, d: number, h = 0, mi = 0, s = 0): Timestamp {
    const probe = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
    const valid =
        probe.getUTCFullYear() === y &&
        probe.getUTCMonth() === mo - 1 &&
        probe.getUTCDate() === d &&
        h < 24 && mi < 60 && s < 60;
    if (!valid) {
        throw new ParseError(`Invalid calendar date ${y}-${mo}-${d} ${h}:${mi}:${s}`, { year: y, month: mo, day: d });
    }
    return `${pad(y, 4)}-${pad(mo)}-${pad(d)}T${pad(h)}:${pad(mi)}:${pad(s)}`;
}

/**
 * Date-only values get midnight. Timezone suffixes are dropped; OMOP
 * datetimes are local to the source site.
 */
export function toTimestamp(raw: string): Timestamp {
    const m = raw.trim().match(TIMESTAMP_RE);
    if (!m) throw new ParseError(`Unrecognised timestamp "${raw}"`, { value: raw });
    const [, y, mo, d, h = "0", mi = "0", s = "0"] = m;
    return formatTimestamp(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s));
}

export function toTimestampOrNull(raw: string | undefined): Timestamp | null {
    if (raw === undefined || raw.trim() === "") return null;
    return toTimestamp(raw);
}

/** Ascending, nulls last. */
export function compareTimestamps(a: Timestamp | null, b: Timestamp | null): number {
    if (a === b) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return a < b ? -1 : 1;
}
