import { z } from "zod";
import { loadTimelineDataset } from "../../libs/dataset/timeline-dataset";
import { DatasetOptionsSchema } from "../../libs/dataset/options";
import { countEpisodes, countEvents } from "../../libs/timeline/model";
import { crossMapDirectory } from "../../libs/vocab/crossmap";
import { CacheCorruption, ConfigurationError, MissingSource, MissingTableParser, SchemaError, TimelineError, errorMessage } from "../../libs/errors";
import type { CacheStore } from "../../libs/cache/store";

const CROSSMAP_DIR = process.env.CROSSMAP_DIR;

const EventSchema = z.object({
    body: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
});

function parseBody(event: unknown): unknown {
    const parsed = EventSchema.safeParse(event);
    if (!parsed.success || parsed.data.body === undefined) return event ?? {};
    const raw = parsed.data.body;
    if (typeof raw !== "string") return raw;
    try {
        return JSON.parse(raw);
    } catch (err) {
        throw new ConfigurationError(`Request body is not valid JSON: ${errorMessage(err)}`, {}, { cause: err });
    }
}

function statusFor(err: unknown): number {
    if (err instanceof ConfigurationError || err instanceof MissingTableParser) return 400;
    if (err instanceof MissingSource || err instanceof SchemaError) return 422;
    if (err instanceof CacheCorruption) return 409;
    return 500;
}

export interface HandlerResult {
    statusCode: number;
    body: string;
}

/**
 * Builds (or loads from cache) a timeline for the requested dataset and
 * answers with its summary. Accepts an API Gateway-style `{ body }` or the
 * request object itself. `cache` omitted uses the environment's store.
 */
export function createHandler(cache?: CacheStore | false) {
    return (event: unknown) => handle(event, cache);
}

async function handle(event: unknown, cache: CacheStore | false | undefined): Promise<HandlerResult> {
    const t0 = Date.now();
    try {
        const request = DatasetOptionsSchema.parse(parseBody(event));
        const dataset = await loadTimelineDataset(
            { ...request, cache },
            { crossMaps: CROSSMAP_DIR ? crossMapDirectory(CROSSMAP_DIR) : undefined },
        );

        return {
            statusCode: 200,
            body: JSON.stringify({
                ok: true,
                datasetName: dataset.datasetName,
                cacheKey: dataset.cacheKey,
                fromCache: dataset.fromCache,
                persons: dataset.timeline.size,
                episodes: countEpisodes(dataset.timeline),
                events: countEvents(dataset.timeline),
                registry: dataset.registry,
                report: dataset.report,
                ms: Date.now() - t0,
            }),
        };
    } catch (err) {
        console.error("build-timeline error", err);
        if (err instanceof z.ZodError) {
            return { statusCode: 400, body: JSON.stringify({ ok: false, error: "Invalid request", issues: err.issues }) };
        }
        const details = err instanceof TimelineError ? err.details : undefined;
        const message = err instanceof Error ? err.message : "Internal Error";
        return { statusCode: statusFor(err), body: JSON.stringify({ ok: false, error: message, details }) };
    }
}

export const main = createHandler();
