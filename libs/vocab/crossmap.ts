import { readFile } from "fs/promises";
import { join } from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { MissingSource, SchemaError, isNotFound } from "../errors";
import type { Kwargs } from "./config";

/**
 * Translates one code into zero or more codes of another vocabulary.
 * Order of the returned codes is kept in the mapped timeline.
 */
export interface CrossMap {
    map(code: string, sourceKwargs: Kwargs, targetKwargs: Kwargs): string[] | Promise<string[]>;
}

/** One CrossMap per configured (source, target) pair, built before mapping starts. */
export type CrossMapFactory = (source: string, target: string) => CrossMap | Promise<CrossMap>;

/** Lookup-table service. Kwargs are accepted and ignored. */
export class StaticCrossMap implements CrossMap {
    private readonly table: Map<string, string[]>;

    constructor(entries: Record<string, string[]> | Map<string, string[]>) {
        this.table = entries instanceof Map ? new Map(entries) : new Map(Object.entries(entries));
    }

    map(code: string): string[] {
        return [...(this.table.get(code) ?? [])];
    }
}

const PairRowsSchema = z.array(z.object({ source_code: z.string(), target_code: z.string() }));

/** Reads `{dir}/{source}_to_{target}.csv` with `source_code,target_code` columns. */
export async function loadCrossMapFile(dir: string, source: string, target: string): Promise<StaticCrossMap> {
    const name = `${source}_to_${target}`;
    const path = join(dir, `${name}.csv`);
    let buf: Buffer;
    try {
        buf = await readFile(path);
    } catch (err) {
        if (isNotFound(err)) throw new MissingSource(name, path, { cause: err });
        throw err;
    }
    const records: unknown = parse(buf, { columns: true, skip_empty_lines: true, trim: true, bom: true });
    const rows = PairRowsSchema.safeParse(records);
    if (!rows.success) throw new SchemaError(name, "source_code,target_code");

    const table = new Map<string, string[]>();
    for (const { source_code, target_code } of rows.data) {
        if (!source_code || !target_code) continue;
        const codes = table.get(source_code);
        if (codes) codes.push(target_code);
        else table.set(source_code, [target_code]);
    }
    return new StaticCrossMap(table);
}

export function crossMapDirectory(dir: string): CrossMapFactory {
    return (source, target) => loadCrossMapFile(dir, source, target);
}
