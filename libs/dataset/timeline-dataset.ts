import type { ReadOptions } from "../adapters/csv/table-reader";
import { sourceFromRoot, type TableSource } from "../adapters/source";
import { decodeTimeline, encodeTimeline } from "../cache/codec";
import { cacheKey } from "../cache/key";
import { defaultCacheStore, type CacheStore } from "../cache/store";
import { ConfigurationError } from "../errors";
import { auditTimelineBuilt } from "../obs/audit";
import { metricCount, metricMs } from "../obs/metrics";
import { attachEvents, droppedTotal, eventsOf, type AttachReport } from "../timeline/attach";
import { assembleBasicInfo, readBasicTables } from "../timeline/basic-info";
import { countEpisodes, countEvents, indexEpisodes, type Timeline } from "../timeline/model";
import { defaultParserRegistry, type ParserRegistry } from "../timeline/parsers";
import type { UnitFailure } from "../timeline/units";
import type { CrossMapFactory } from "../vocab/crossmap";
import { bindCrossMaps, mapVocabularies, type TransitionLog, type VocabularyRegistry } from "../vocab/mapper";
import { resolveOptions, type DatasetOptions, type DatasetOptionsInput } from "./options";

export interface DatasetDeps {
    /** Mapping service; required when codeMapping is non-empty. */
    crossMaps?: CrossMapFactory;
    parsers?: ParserRegistry;
}

export interface BuildReport {
    droppedRows: Record<string, number>;
    attach: Record<string, AttachReport>;
    /** Orphaned or malformed events dropped at attachment, over all tables. */
    droppedEvents: number;
    unitFailures: Array<{ stage: string; key: string; message: string }>;
    mappedEvents: number;
    emittedEvents: number;
    durationMs: number;
}

export interface TimelineDataset {
    datasetName: string;
    cacheKey: string;
    fromCache: boolean;
    timeline: Timeline;
    registry: VocabularyRegistry;
    transitions: TransitionLog;
    /** Null when served from cache. */
    report: BuildReport | null;
}

export interface BuiltTimeline {
    timeline: Timeline;
    registry: VocabularyRegistry;
    transitions: TransitionLog;
    report: BuildReport;
}

export const DATASET_LAYOUT = `
dataset.timeline: person_id -> <Person>

<Person>
    - episodes: ordered by encounter time
    - birthTime, deathTime, gender, ethnicity

    <Episode>
        - events: table -> ClinicalEvent[]
        - encounterTime, dischargeTime, dischargeStatus

        <ClinicalEvent>
            - code, vocabulary, timestamp, attributes
`;

export function describeDataset(): string {
    return DATASET_LAYOUT;
}

function summarizeFailures(failures: UnitFailure[]) {
    return failures.map((f) => ({ stage: f.stage, key: f.key, message: f.error.message }));
}

/**
 * Full pipeline without the cache: basic info, table parsers (concurrent),
 * attachment in requested order, then vocabulary mapping.
 */
export async function buildTimeline(
    source: TableSource,
    opts: DatasetOptions,
    parsers: ParserRegistry,
    crossMaps: CrossMapFactory | undefined,
): Promise<BuiltTimeline> {
    const t0 = Date.now();
    const readOpts: ReadOptions = { delimiter: opts.delimiter, compressed: opts.compressed };

    const basicTables = await readBasicTables(source, readOpts, opts.dev);
    const basic = await assembleBasicInfo(basicTables, opts.onUnitError);
    const timeline = basic.timeline;
    console.log("basic-info-parsed", { persons: timeline.size, episodes: countEpisodes(timeline), ms: Date.now() - t0 });

    const parsed = await Promise.all(
        opts.tables.map((table) => parsers.get(table).parse(source, { ...readOpts, onUnitError: opts.onUnitError })),
    );

    const droppedRows: Record<string, number> = {
        person: basicTables.person.droppedRows,
        visit_occurrence: basicTables.visit.droppedRows,
        death: basicTables.death.droppedRows,
    };
    const attach: Record<string, AttachReport> = {};
    const failures = [...basic.failures];
    const index = indexEpisodes(timeline);

    for (const table of parsed) {
        droppedRows[table.table] = table.droppedRows;
        failures.push(...table.failures);
        attach[table.table] = attachEvents(timeline, eventsOf(table.eventsByPerson), index);
        const dropped = droppedTotal(attach[table.table]);
        if (dropped > 0) console.warn("orphan-events-dropped", { table: table.table, ...attach[table.table] });
    }
    const droppedEvents = Object.values(attach).reduce((n, r) => n + droppedTotal(r), 0);

    let registry = parsers.defaultVocabularies(opts.tables);
    let transitions: TransitionLog = {};
    let mappedEvents = 0;
    let emittedEvents = 0;
    if (Object.keys(opts.codeMapping).length > 0) {
        if (!crossMaps) throw new ConfigurationError("codeMapping is set but no mapping service was supplied", {});
        const bindings = await bindCrossMaps(opts.codeMapping, crossMaps);
        const mapped = await mapVocabularies(timeline, bindings, registry);
        ({ registry, transitions, mappedEvents, emittedEvents } = mapped);
        console.log("codes-mapped", { mappedEvents, emittedEvents, registry });
    }

    return {
        timeline,
        registry,
        transitions,
        report: {
            droppedRows,
            attach,
            droppedEvents,
            unitFailures: summarizeFailures(failures),
            mappedEvents,
            emittedEvents,
            durationMs: Date.now() - t0,
        },
    };
}

/**
 * Loads the dataset from cache when an artifact exists for these options,
 * otherwise builds and persists it. A corrupt artifact is never rebuilt
 * silently: the caller has to pass refreshCache.
 */
export async function loadTimelineDataset(input: DatasetOptionsInput, deps: DatasetDeps = {}): Promise<TimelineDataset> {
    const opts = resolveOptions(input);
    const parsers = deps.parsers ?? defaultParserRegistry();
    parsers.validate(opts.tables);
    if (Object.keys(opts.codeMapping).length > 0 && !deps.crossMaps) {
        throw new ConfigurationError("codeMapping is set but no mapping service was supplied", {});
    }

    const source = opts.source ?? sourceFromRoot(opts.root ?? "");
    const root = opts.root ?? source.location;
    const key = cacheKey({
        datasetName: opts.datasetName,
        root,
        tables: opts.tables,
        codeMapping: opts.codeMapping,
        dev: opts.dev,
        delimiter: opts.delimiter,
        compressed: opts.compressed,
        onUnitError: opts.onUnitError,
    });
    const store: CacheStore | null = opts.cache === false ? null : opts.cache ?? defaultCacheStore();

    if (store && !opts.refreshCache) {
        const body = await store.get(key);
        if (body) {
            const cached = decodeTimeline(key, body, store.describe(key));
            console.log("timeline-cache-hit", { datasetName: opts.datasetName, location: store.describe(key) });
            await metricCount("timeline_cache_hit", 1, { dataset: opts.datasetName });
            return { ...cached, datasetName: opts.datasetName, cacheKey: key, fromCache: true, report: null };
        }
    }

    console.log("timeline-build-start", { datasetName: opts.datasetName, root, tables: opts.tables, dev: opts.dev });
    const built = await buildTimeline(source, opts, parsers, deps.crossMaps);

    if (store) {
        await store.put(key, encodeTimeline(key, { datasetName: opts.datasetName, ...built }));
        console.log("timeline-cache-write", { location: store.describe(key) });
    }

    await metricCount("orphan_events_dropped", built.report.droppedEvents, { dataset: opts.datasetName });
    await metricMs("timeline_build_ms", built.report.durationMs, { dataset: opts.datasetName });
    await auditTimelineBuilt({
        datasetName: opts.datasetName,
        cacheKey: key,
        fromCache: false,
        persons: built.timeline.size,
        episodes: countEpisodes(built.timeline),
        events: countEvents(built.timeline),
        droppedEvents: built.report.droppedEvents,
        unitFailures: built.report.unitFailures.length,
    });

    return { datasetName: opts.datasetName, cacheKey: key, fromCache: false, ...built };
}
