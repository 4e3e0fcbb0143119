import { createHash } from "crypto";
import type { OnUnitError } from "../timeline/units";
import type { CodeMapping } from "../vocab/config";

/** Bumped whenever the persisted layout changes; part of every key. */
export const CACHE_FORMAT_VERSION = 1;
export const CACHE_SCHEMA = "timeline.cache.v1";

export interface CacheKeyInput {
    datasetName: string;
    root: string;
    tables: readonly string[];
    codeMapping: CodeMapping;
    dev: boolean;
    delimiter: string;
    compressed: boolean;
    onUnitError: OnUnitError;
}

/** JSON with object keys sorted at every level. */
export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
    if (value !== null && typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
    }
    return JSON.stringify(value) ?? "null";
}

export function cacheKeyMaterial(input: CacheKeyInput): string {
    const mapping = Object.keys(input.codeMapping)
        .sort()
        .map((source) => `${source}=${stableStringify(input.codeMapping[source])}`);
    return [
        `${CACHE_SCHEMA}@${CACHE_FORMAT_VERSION}`,
        input.datasetName,
        input.root,
        ...[...input.tables].sort(),
        ...mapping,
        input.dev ? "dev" : "prod",
        `delimiter=${JSON.stringify(input.delimiter)}`,
        input.compressed ? "gz" : "plain",
        `onUnitError=${input.onUnitError}`,
    ].join("+");
}

export function cacheKey(input: CacheKeyInput): string {
    return createHash("sha256").update(cacheKeyMaterial(input)).digest("hex");
}
