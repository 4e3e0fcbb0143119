export * from "./errors";
export { FileTableSource, MemoryTableSource, S3TableSource, sourceFromRoot, type TableSource } from "./adapters/source";
export { readTable, type Row, type TableSpec, type TableRows } from "./adapters/csv/table-reader";
export * from "./timeline/model";
export { toTimestamp, toTimestampOrNull, type Timestamp } from "./timeline/time";
export { BASIC_TABLES, EVENT_TABLES } from "./timeline/tables";
export { assembleBasicInfo, readBasicTables, dischargeStatus } from "./timeline/basic-info";
export { ParserRegistry, defaultParserRegistry, eventTableParser, type TableParser, type ParsedTable } from "./timeline/parsers";
export { attachEvents, type AttachReport } from "./timeline/attach";
export { parseCodeMapping, type CodeMapping } from "./vocab/config";
export { StaticCrossMap, loadCrossMapFile, crossMapDirectory, type CrossMap, type CrossMapFactory } from "./vocab/crossmap";
export { bindCrossMaps, mapVocabularies, type VocabularyRegistry, type TransitionLog } from "./vocab/mapper";
export { cacheKey } from "./cache/key";
export { FileCacheStore, S3CacheStore, defaultCacheStore, type CacheStore } from "./cache/store";
export { loadTimelineDataset, buildTimeline, describeDataset, type TimelineDataset, type BuildReport } from "./dataset/timeline-dataset";
export { setTask, type SampleSet, type TaskFn } from "./dataset/task";
