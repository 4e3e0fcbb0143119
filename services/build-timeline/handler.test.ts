import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createHandler, type HandlerResult } from "./handler";
import { FileCacheStore } from "../../libs/cache/store";

function writeRoot(): string {
    const root = mkdtempSync(join(tmpdir(), "build-timeline-"));
    const files: Record<string, string> = {
        person: "person_id\tyear_of_birth\tmonth_of_birth\tday_of_birth\tgender_concept_id\trace_concept_id\nP1\t1980\t1\t1\t8507\t8527\n",
        visit_occurrence:
            "person_id\tvisit_occurrence_id\tvisit_start_datetime\tvisit_start_date\tvisit_end_date\nP1\tV1\t2020-01-01 00:00:00\t2020-01-01\t2020-01-05\n",
        death: "person_id\tdeath_date\n",
        condition_occurrence:
            "person_id\tvisit_occurrence_id\tcondition_concept_id\tcondition_start_datetime\nP1\tV1\tC1\t2020-01-02\nP1\tV1\tC2\t2020-01-03\n",
    };
    for (const [table, text] of Object.entries(files)) writeFileSync(join(root, `${table}.csv`), text);
    return root;
}

const main = createHandler(false);

beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterAll(() => {
    jest.restoreAllMocks();
});

test("summarizes a built timeline from an API Gateway body", async () => {
    const root = writeRoot();
    const res = await main({ body: JSON.stringify({ datasetName: "demo", root, tables: ["condition_occurrence"] }) });

    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.body);
    expect(body).toMatchObject({
        ok: true,
        datasetName: "demo",
        fromCache: false,
        persons: 1,
        episodes: 1,
        events: 2,
        registry: { condition_occurrence: "CONDITION_CONCEPT_ID" },
    });
    expect(body.report.droppedEvents).toBe(0);
});

test("second call with a cache reports a hit", async () => {
    const root = writeRoot();
    const cache = new FileCacheStore(mkdtempSync(join(tmpdir(), "build-timeline-cache-")));
    const request = { root, tables: ["condition_occurrence"] };

    const cached = createHandler(cache);
    const first = JSON.parse((await cached(request)).body);
    const second = JSON.parse((await cached(request)).body);

    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.cacheKey).toBe(first.cacheKey);
    expect(second.events).toBe(2);
    expect(second.report).toBeNull();
});

test("maps failures to status codes", async () => {
    const root = writeRoot();

    const invalid = await main({ body: JSON.stringify({ root, dev: "yes" }) });
    expect(invalid.statusCode).toBe(400);
    expect(JSON.parse(invalid.body).error).toBe("Invalid request");

    const badJson = await main({ body: "{not json" });
    expect(badJson.statusCode).toBe(400);
    expect(JSON.parse(badJson.body).error).toMatch(/^Request body is not valid JSON/);

    const basic = await main({ root, tables: ["person"] });
    expect(basic.statusCode).toBe(400);

    const unknown = await main({ root, tables: ["note_nlp"] });
    expect(unknown.statusCode).toBe(400);
    expect(JSON.parse(unknown.body).details).toEqual({ table: "note_nlp", registered: expect.any(Array) });

    const missing = await main({ root, tables: ["measurement"] });
    expect(missing.statusCode).toBe(422);
    expect(JSON.parse(missing.body).error).toBe(`Source for table measurement not found at ${join(root, "measurement.csv")}`);
});

test("a runtime context passed as second argument is ignored", async () => {
    const root = writeRoot();
    const invoke: (event: unknown, context: unknown) => Promise<HandlerResult> = createHandler(
        new FileCacheStore(mkdtempSync(join(tmpdir(), "build-timeline-cache-"))),
    );

    const res = await invoke({ body: JSON.stringify({ root }) }, { functionName: "build-timeline", awsRequestId: "req-1" });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).persons).toBe(1);
});
