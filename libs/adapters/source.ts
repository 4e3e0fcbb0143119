import { readFile } from "fs/promises";
import { join } from "path";
import { gzipSync } from "zlib";
import { createHash } from "crypto";
import { S3Client, GetObjectCommand, NoSuchKey } from "@aws-sdk/client-s3";
import { MissingSource, isNotFound } from "../errors";

/**
 * Where table extracts live. One object per table, `{table}.csv` or
 * `{table}.csv.gz`. A live-query store would implement the same shape.
 */
export interface TableSource {
    /** Identifies the data; a source given without `root` is cached under it. */
    readonly location: string;
    read(table: string, opts: { compressed: boolean }): Promise<Buffer>;
}

export function tableFileName(table: string, compressed: boolean): string {
    return `${table}.csv${compressed ? ".gz" : ""}`;
}

export class FileTableSource implements TableSource {
    constructor(readonly location: string) {}

    async read(table: string, opts: { compressed: boolean }): Promise<Buffer> {
        const path = join(this.location, tableFileName(table, opts.compressed));
        try {
            return await readFile(path);
        } catch (err) {
            if (isNotFound(err)) {
                throw new MissingSource(table, path, { cause: err });
            }
            throw err;
        }
    }
}

export class S3TableSource implements TableSource {
    readonly location: string;

    constructor(
        private readonly bucket: string,
        private readonly prefix: string,
        private readonly s3: S3Client = new S3Client({}),
    ) {
        this.location = `s3://${bucket}/${prefix}`;
    }

    async read(table: string, opts: { compressed: boolean }): Promise<Buffer> {
        const key = [this.prefix.replace(/\/+$/, ""), tableFileName(table, opts.compressed)].filter(Boolean).join("/");
        try {
            const out = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
            if (!out.Body) throw new MissingSource(table, `s3://${this.bucket}/${key}`);
            return Buffer.from(await out.Body.transformToByteArray());
        } catch (err) {
            if (err instanceof NoSuchKey) {
                throw new MissingSource(table, `s3://${this.bucket}/${key}`, { cause: err });
            }
            throw err;
        }
    }
}

function contentLocation(tables: Record<string, string>): string {
    const hash = createHash("sha256");
    const entries = Object.entries(tables).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [name, text] of entries) hash.update(`${name}\0${text}\0`);
    return `memory://${hash.digest("hex").slice(0, 16)}`;
}

/**
 * Tables held as text in memory; compressed reads get gzipped bytes. The
 * default location is derived from the contents.
 */
export class MemoryTableSource implements TableSource {
    private readonly tables: Map<string, string>;
    readonly location: string;

    constructor(tables: Record<string, string>, location?: string) {
        this.tables = new Map(Object.entries(tables));
        this.location = location ?? contentLocation(tables);
    }

    async read(table: string, opts: { compressed: boolean }): Promise<Buffer> {
        const text = this.tables.get(table);
        if (text === undefined) throw new MissingSource(table, `${this.location}/${tableFileName(table, opts.compressed)}`);
        const buf = Buffer.from(text, "utf8");
        return opts.compressed ? gzipSync(buf) : buf;
    }
}

/** `s3://bucket/prefix` or a local directory. */
export function sourceFromRoot(root: string): TableSource {
    const m = root.match(/^s3:\/\/([^/]+)\/?(.*)$/);
    if (m) return new S3TableSource(m[1], m[2]);
    return new FileTableSource(root);
}
