import { gunzipSync, gzipSync } from "zlib";
import { validate } from "../contracts/src/validate";
import { CacheCorruption } from "../errors";
import type { Person, Timeline } from "../timeline/model";
import type { TransitionLog, VocabularyRegistry } from "../vocab/mapper";
import { CACHE_FORMAT_VERSION, CACHE_SCHEMA } from "./key";

export interface CachedTimeline {
    datasetName: string;
    timeline: Timeline;
    registry: VocabularyRegistry;
    transitions: TransitionLog;
}

export interface CacheEnvelope {
    schema: typeof CACHE_SCHEMA;
    formatVersion: number;
    key: string;
    createdAt: string;
    datasetName: string;
    registry: VocabularyRegistry;
    transitions: TransitionLog;
    persons: Person[];
}

export function encodeTimeline(key: string, cached: CachedTimeline, now = new Date()): Buffer {
    const envelope: CacheEnvelope = {
        schema: CACHE_SCHEMA,
        formatVersion: CACHE_FORMAT_VERSION,
        key,
        createdAt: now.toISOString(),
        datasetName: cached.datasetName,
        registry: cached.registry,
        transitions: cached.transitions,
        persons: [...cached.timeline.values()],
    };
    return gzipSync(JSON.stringify(envelope));
}

/**
 * Any failure here (gzip, JSON, contract, version or key mismatch) is a
 * CacheCorruption; the caller decides whether to rebuild.
 */
export function decodeTimeline(key: string, body: Buffer, location: string): CachedTimeline {
    try {
        const envelope: unknown = JSON.parse(gunzipSync(body).toString("utf8"));
        validate<CacheEnvelope>("timeline.cache.v1", envelope);
        if (envelope.formatVersion !== CACHE_FORMAT_VERSION) {
            throw new Error(`format version ${envelope.formatVersion}, expected ${CACHE_FORMAT_VERSION}`);
        }
        if (envelope.key !== key) throw new Error(`artifact was written for key ${envelope.key}`);
        return {
            datasetName: envelope.datasetName,
            timeline: new Map(envelope.persons.map((person) => [person.personId, person])),
            registry: envelope.registry,
            transitions: envelope.transitions,
        };
    } catch (err) {
        throw new CacheCorruption(key, location, { cause: err });
    }
}
