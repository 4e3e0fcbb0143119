import { z } from "zod";
import type { TableSource } from "../adapters/source";
import type { CacheStore } from "../cache/store";
import { ConfigurationError } from "../errors";
import { BASIC_TABLES, isBasicTable } from "../timeline/tables";
import { CodeMappingSchema } from "../vocab/config";

export const DatasetOptionsSchema = z.object({
    datasetName: z.string().min(1).default("OMOPDataset"),
    root: z.string().min(1).optional(),
    tables: z.array(z.string().min(1)).default([]),
    codeMapping: CodeMappingSchema.default({}),
    dev: z.boolean().default(false),
    refreshCache: z.boolean().default(false),
    delimiter: z.string().min(1).default("\t"),
    compressed: z.boolean().default(false),
    onUnitError: z.enum(["fail", "isolate"]).default("fail"),
});

export type DatasetOptionsInput = z.input<typeof DatasetOptionsSchema> & {
    /** Pre-built source; takes precedence over `root` for reading. */
    source?: TableSource;
    /** `false` disables caching; omitted uses the default store. */
    cache?: CacheStore | false;
};

export type DatasetOptions = z.output<typeof DatasetOptionsSchema> & {
    source?: TableSource;
    cache?: CacheStore | false;
};

export function resolveOptions(input: DatasetOptionsInput): DatasetOptions {
    const { source, cache, ...rest } = input;
    const parsed = DatasetOptionsSchema.safeParse(rest);
    if (!parsed.success) {
        const messages = parsed.error.issues.map((i) => `${i.path.join(".") || "/"} ${i.message}`).join("; ");
        throw new ConfigurationError(`Invalid dataset options: ${messages}`, { issues: parsed.error.issues });
    }
    const opts = parsed.data;

    if (opts.root === undefined && source === undefined) {
        throw new ConfigurationError("Either root or source must be given", {});
    }
    const basic = opts.tables.filter(isBasicTable);
    if (basic.length > 0) {
        throw new ConfigurationError(
            `Basic tables are parsed by default and must not be listed: ${basic.join(", ")} (basic tables: ${BASIC_TABLES.join(", ")})`,
            { tables: basic },
        );
    }
    return { ...opts, tables: [...new Set(opts.tables)], source, cache };
}
