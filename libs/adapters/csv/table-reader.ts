import { parse } from "csv-parse/sync";
import { gunzipSync } from "zlib";
import { z } from "zod";
import type { TableSource } from "../source";
import { ParseError, SchemaError, errorMessage } from "../../errors";
import { toTimestamp } from "../../timeline/time";

/** One source row. Empty cells are absent, every present cell is text. */
export type Row = Readonly<Record<string, string | undefined>>;

export interface SortKey {
    column: string;
    /** "time" columns order by their parsed value; unparseable ones fall back to raw text. */
    kind: "text" | "time";
}

export interface TableSpec {
    table: string;
    /** Header must contain these. */
    required: readonly string[];
    /** Rows missing any of these are dropped. */
    nonNull: readonly string[];
    sortBy: readonly SortKey[];
}

export interface ReadOptions {
    delimiter: string;
    compressed: boolean;
    /** Keep only the first N data rows (development mode). */
    limit?: number;
}

export interface TableRows {
    table: string;
    rows: Row[];
    droppedRows: number;
}

const CsvRecordsSchema = z.array(z.array(z.string()));

function decodeRecords(table: string, buf: Buffer, opts: ReadOptions): string[][] {
    let text: Buffer = buf;
    if (opts.compressed) {
        try {
            text = gunzipSync(buf);
        } catch (err) {
            throw new ParseError(`Cannot decompress ${table}: ${errorMessage(err)}`, { table }, { cause: err });
        }
    }
    let records: unknown;
    try {
        records = parse(text, {
            delimiter: opts.delimiter,
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
            relax_quotes: true,
        });
    } catch (err) {
        throw new ParseError(`Cannot parse ${table}: ${errorMessage(err)}`, { table }, { cause: err });
    }
    return CsvRecordsSchema.parse(records);
}

function sortValue(row: Row, key: SortKey): string | undefined {
    const raw = row[key.column];
    if (raw === undefined || key.kind === "text") return raw;
    try {
        return toTimestamp(raw);
    } catch (err) {
        if (err instanceof ParseError) return raw;
        throw err;
    }
}

function compareKeys(a: readonly (string | undefined)[], b: readonly (string | undefined)[]): number {
    for (let i = 0; i < a.length; i++) {
        const x = a[i];
        const y = b[i];
        if (x === y) continue;
        if (x === undefined) return 1;
        if (y === undefined) return -1;
        return x < y ? -1 : 1;
    }
    return 0;
}

/** Stable sort, missing values last. Keys are computed once per row. */
export function sortRows(rows: readonly Row[], sortBy: readonly SortKey[]): Row[] {
    return rows
        .map((row) => ({ row, keys: sortBy.map((key) => sortValue(row, key)) }))
        .sort((a, b) => compareKeys(a.keys, b.keys))
        .map(({ row }) => row);
}

/**
 * Loads one table: header check, text-only cells, null filter, optional row
 * cap, then a stable sort on the table's keys. Downstream stages rely on
 * that order and never re-sort rows.
 */
export async function readTable(source: TableSource, spec: TableSpec, opts: ReadOptions): Promise<TableRows> {
    const buf = await source.read(spec.table, { compressed: opts.compressed });
    const records = decodeRecords(spec.table, buf, opts);
    if (records.length === 0) throw new SchemaError(spec.table, spec.required[0] ?? "*", "table has no header row");

    const [rawHeader, ...body] = records;
    const header = rawHeader.map((column) => column.trim());
    for (const column of spec.required) {
        if (!header.includes(column)) throw new SchemaError(spec.table, column);
    }

    const data = opts.limit === undefined ? body : body.slice(0, opts.limit);
    const rows: Row[] = [];
    let droppedRows = 0;

    for (const record of data) {
        const row: Record<string, string> = {};
        header.forEach((column, i) => {
            const cell = record[i]?.trim();
            if (cell !== undefined && cell !== "") row[column] = cell;
        });
        if (spec.nonNull.some((column) => row[column] === undefined)) {
            droppedRows++;
            continue;
        }
        rows.push(row);
    }

    return { table: spec.table, rows: sortRows(rows, spec.sortBy), droppedRows };
}

/** Groups already-sorted rows by a column, keeping first-seen order. */
export function groupRows(rows: readonly Row[], column: string): Map<string, Row[]> {
    const groups = new Map<string, Row[]>();
    for (const row of rows) {
        const key = row[column];
        if (key === undefined) continue;
        const group = groups.get(key);
        if (group) group.push(row);
        else groups.set(key, [row]);
    }
    return groups;
}
