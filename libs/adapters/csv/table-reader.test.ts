import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { gzipSync } from "zlib";
import { readTable, groupRows, type TableSpec } from "./table-reader";
import { FileTableSource, MemoryTableSource } from "../source";
import { MissingSource, ParseError, SchemaError } from "../../errors";

const spec: TableSpec = {
    table: "condition_occurrence",
    required: ["person_id", "visit_occurrence_id", "condition_concept_id", "condition_start_datetime"],
    nonNull: ["person_id", "visit_occurrence_id", "condition_concept_id"],
    sortBy: [
        { column: "person_id", kind: "text" },
        { column: "visit_occurrence_id", kind: "text" },
        { column: "condition_start_datetime", kind: "time" },
    ],
};

const header = "person_id\tvisit_occurrence_id\tcondition_concept_id\tcondition_start_datetime";
const tsv = (...lines: string[]) => [header, ...lines].join("\n") + "\n";

test("ids stay text, incomplete rows are dropped, rows come back sorted", async () => {
    const source = new MemoryTableSource({
        condition_occurrence: tsv(
            "0002\tV9\t201826\t2020-01-05",
            "0001\tV1\t00123\t2020-01-3",
            "0001\tV1\t00124\t2020-01-02 08:00",
            "0001\t\t999\t2020-01-01",
            "0001\tV1\t\t2020-01-01",
        ),
    });
    const out = await readTable(source, spec, { delimiter: "\t", compressed: false });

    expect(out.droppedRows).toBe(2);
    expect(out.rows.map((r) => [r.person_id, r.condition_concept_id])).toEqual([
        ["0001", "00124"],
        ["0001", "00123"],
        ["0002", "201826"],
    ]);
});

test("row cap keeps the first data rows before sorting", async () => {
    const source = new MemoryTableSource({
        condition_occurrence: tsv("3\tV3\tc3\t2020-01-01", "1\tV1\tc1\t2020-01-01", "2\tV2\tc2\t2020-01-01"),
    });
    const out = await readTable(source, spec, { delimiter: "\t", compressed: false, limit: 2 });
    expect(out.rows.map((r) => r.person_id)).toEqual(["1", "3"]);
});

test("missing column is a schema error naming table and column", async () => {
    const source = new MemoryTableSource({
        condition_occurrence: "person_id\tvisit_occurrence_id\tcondition_concept_id\n1\tV1\tc1\n",
    });
    const err = await readTable(source, spec, { delimiter: "\t", compressed: false }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ table: "condition_occurrence", column: "condition_start_datetime" });
});

test("missing table is MissingSource", async () => {
    await expect(readTable(new MemoryTableSource({}), spec, { delimiter: "\t", compressed: false }))
        .rejects.toBeInstanceOf(MissingSource);
});

test("reads gzipped files from a directory", async () => {
    const dir = mkdtempSync(join(tmpdir(), "table-reader-"));
    writeFileSync(join(dir, "condition_occurrence.csv.gz"), gzipSync(tsv("7\tV7\tc7\t2021-06-01")));
    const out = await readTable(new FileTableSource(dir), spec, { delimiter: "\t", compressed: true });
    expect(out.rows).toEqual([
        {
            person_id: "7",
            visit_occurrence_id: "V7",
            condition_concept_id: "c7",
            condition_start_datetime: "2021-06-01",
        },
    ]);

    await expect(readTable(new FileTableSource(dir), spec, { delimiter: "\t", compressed: false }))
        .rejects.toThrow(`Source for table condition_occurrence not found at ${join(dir, "condition_occurrence.csv")}`);
});

test("quotes inside a field are kept as text", async () => {
    const source = new MemoryTableSource({ condition_occurrence: tsv('1\tV1\t5 "high"\t2020-01-01') });
    const out = await readTable(source, spec, { delimiter: "\t", compressed: false });
    expect(out.rows.map((r) => r.condition_concept_id)).toEqual(['5 "high"']);
});

test("unparseable text is a ParseError naming the table", async () => {
    const source = new MemoryTableSource({ condition_occurrence: tsv('1\tV1\t"unterminated\t2020-01-01') });
    const err = await readTable(source, spec, { delimiter: "\t", compressed: false }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ details: { table: "condition_occurrence" } });
    expect(err).toMatchObject({ message: expect.stringMatching(/^Cannot parse condition_occurrence: /) });
});

test("groupRows keeps first-seen order", () => {
    const groups = groupRows([{ k: "b" }, { k: "a" }, { k: "b" }, {}], "k");
    expect([...groups.keys()]).toEqual(["b", "a"]);
    expect(groups.get("b")).toHaveLength(2);
});
