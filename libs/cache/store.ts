import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { randomUUID } from "crypto";
import { S3Client, GetObjectCommand, PutObjectCommand, NoSuchKey } from "@aws-sdk/client-s3";
import { isNotFound } from "../errors";
import { CACHE_FORMAT_VERSION } from "./key";

/**
 * Holds one artifact per cache key. Writers are not serialized: two runs
 * sharing a key race and the last rename/put wins.
 */
export interface CacheStore {
    readonly location: string;
    describe(key: string): string;
    get(key: string): Promise<Buffer | null>;
    put(key: string, body: Buffer): Promise<void>;
}

const artifactName = (key: string) => `${key}.json.gz`;

export class FileCacheStore implements CacheStore {
    constructor(readonly location: string) {}

    describe(key: string): string {
        return join(this.location, artifactName(key));
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            return await readFile(this.describe(key));
        } catch (err) {
            if (isNotFound(err)) return null;
            throw err;
        }
    }

    async put(key: string, body: Buffer): Promise<void> {
        await mkdir(this.location, { recursive: true });
        const tmp = join(this.location, `.${artifactName(key)}.${randomUUID()}.tmp`);
        await writeFile(tmp, body);
        await rename(tmp, this.describe(key));
    }
}

export class S3CacheStore implements CacheStore {
    readonly location: string;

    constructor(
        private readonly bucket: string,
        private readonly prefix = "timeline-cache",
        private readonly s3: S3Client = new S3Client({}),
    ) {
        this.location = `s3://${bucket}/${prefix}`;
    }

    private objectKey(key: string): string {
        return [this.prefix.replace(/\/+$/, ""), artifactName(key)].filter(Boolean).join("/");
    }

    describe(key: string): string {
        return `s3://${this.bucket}/${this.objectKey(key)}`;
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            const out = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) }));
            if (!out.Body) return null;
            return Buffer.from(await out.Body.transformToByteArray());
        } catch (err) {
            if (err instanceof NoSuchKey) return null;
            throw err;
        }
    }

    async put(key: string, body: Buffer): Promise<void> {
        await this.s3.send(new PutObjectCommand({
            Bucket: this.bucket,
            Key: this.objectKey(key),
            Body: body,
            ContentType: "application/gzip",
            Metadata: { formatVersion: String(CACHE_FORMAT_VERSION) },
        }));
    }
}

const CACHE_DIR = process.env.TIMELINE_CACHE_DIR ?? join(homedir(), ".cache", "omop-timeline");
const CACHE_BUCKET = process.env.TIMELINE_CACHE_BUCKET;

/** S3 when TIMELINE_CACHE_BUCKET is set, else a local directory. */
export function defaultCacheStore(): CacheStore {
    return CACHE_BUCKET ? new S3CacheStore(CACHE_BUCKET) : new FileCacheStore(CACHE_DIR);
}
