import { readTable, groupRows, type ReadOptions, type Row } from "../adapters/csv/table-reader";
import type { TableSource } from "../adapters/source";
import { MissingTableParser, ParseError } from "../errors";
import type { ClinicalEvent } from "./model";
import { EVENT_TABLES, PERSON_ID, VISIT_ID, eventTableSpec, type EventTableDef } from "./tables";
import { toTimestampOrNull } from "./time";
import { fanOut, type OnUnitError, type UnitFailure } from "./units";

export interface ParseOptions extends ReadOptions {
    onUnitError: OnUnitError;
}

export interface ParsedTable {
    table: string;
    vocabulary: string;
    /** person id -> that person's events, ordered by (episode id, timestamp). */
    eventsByPerson: Map<string, ClinicalEvent[]>;
    droppedRows: number;
    failures: UnitFailure[];
}

export interface TableParser {
    readonly table: string;
    /** Vocabulary every event of this table starts in. */
    readonly vocabulary: string;
    parse(source: TableSource, opts: ParseOptions): Promise<ParsedTable>;
}

function toEvent(def: EventTableDef, personId: string, row: Row): ClinicalEvent {
    const episodeId = row[VISIT_ID];
    const code = row[def.codeColumn];
    if (episodeId === undefined || code === undefined) {
        throw new ParseError(`Row without ${VISIT_ID} or ${def.codeColumn} in ${def.table}`, { table: def.table, personId });
    }
    const event: ClinicalEvent = {
        code,
        vocabulary: def.vocabulary,
        table: def.table,
        episodeId,
        personId,
        timestamp: toTimestampOrNull(row[def.timestampColumn]),
    };
    const attributes: Record<string, string> = {};
    for (const column of def.extraColumns) {
        const value = row[column];
        if (value !== undefined) attributes[column] = value;
    }
    if (Object.keys(attributes).length > 0) event.attributes = attributes;
    return event;
}

/**
 * Parser for a clinical table whose rows are (person, visit, code, time).
 * Episode existence is not checked here; attachment drops orphans.
 */
export function eventTableParser(def: EventTableDef): TableParser {
    const spec = eventTableSpec(def);
    return {
        table: def.table,
        vocabulary: def.vocabulary,
        async parse(source, opts) {
            const { rows, droppedRows } = await readTable(source, spec, opts);
            const { results, failures } = await fanOut(
                def.table,
                groupRows(rows, PERSON_ID),
                (personId, personRows) => personRows.map((row) => toEvent(def, personId, row)),
                opts.onUnitError,
            );
            if (droppedRows > 0) console.warn("rows-dropped", { table: def.table, droppedRows });
            return { table: def.table, vocabulary: def.vocabulary, eventsByPerson: results, droppedRows, failures };
        },
    };
}

/** Explicit table -> parser map, checked up front instead of mid-run. */
export class ParserRegistry {
    private readonly parsers = new Map<string, TableParser>();

    constructor(parsers: Iterable<TableParser> = []) {
        for (const parser of parsers) this.register(parser);
    }

    register(parser: TableParser): this {
        this.parsers.set(parser.table, parser);
        return this;
    }

    tables(): string[] {
        return [...this.parsers.keys()];
    }

    get(table: string): TableParser {
        const parser = this.parsers.get(table);
        if (!parser) throw new MissingTableParser(table, this.tables());
        return parser;
    }

    validate(tables: readonly string[]): void {
        for (const table of tables) this.get(table);
    }

    defaultVocabularies(tables: readonly string[]): Record<string, string> {
        const out: Record<string, string> = {};
        for (const table of tables) out[table] = this.get(table).vocabulary;
        return out;
    }
}

export function defaultParserRegistry(): ParserRegistry {
    return new ParserRegistry(EVENT_TABLES.map(eventTableParser));
}
