import { assembleBasicInfo, dischargeStatus, readBasicTables } from "./basic-info";
import { MemoryTableSource } from "../adapters/source";
import { ParseError, SchemaError } from "../errors";

const PERSON = ["person_id", "year_of_birth", "month_of_birth", "day_of_birth", "gender_concept_id", "race_concept_id"];
const VISIT = ["person_id", "visit_occurrence_id", "visit_start_datetime", "visit_start_date", "visit_end_date"];
const DEATH = ["person_id", "death_date"];

const tsv = (header: string[], rows: string[][]) => [header, ...rows].map((r) => r.join("\t")).join("\n") + "\n";

function source(persons: string[][], visits: string[][], deaths: string[][] = []) {
    return new MemoryTableSource({
        person: tsv(PERSON, persons),
        visit_occurrence: tsv(VISIT, visits),
        death: tsv(DEATH, deaths),
    });
}

async function assemble(src: MemoryTableSource, onUnitError: "fail" | "isolate" = "fail", dev = false) {
    const tables = await readBasicTables(src, { delimiter: "\t", compressed: false }, dev);
    return assembleBasicInfo(tables, onUnitError);
}

test("one person, one visit, no death record", async () => {
    const { timeline, failures } = await assemble(source(
        [["P1", "1980", "1", "1", "8507", "8527"]],
        [["P1", "V1", "2020-01-01 09:30:00", "2020-01-01", "2020-01-05"]],
    ));

    expect(failures).toEqual([]);
    expect([...timeline.keys()]).toEqual(["P1"]);
    expect(timeline.get("P1")).toEqual({
        personId: "P1",
        birthTime: "1980-01-01T00:00:00",
        deathTime: null,
        gender: "8507",
        ethnicity: "8527",
        episodes: [
            {
                episodeId: "V1",
                personId: "P1",
                encounterTime: "2020-01-01T09:30:00",
                dischargeTime: "2020-01-05T00:00:00",
                dischargeStatus: "alive",
                events: {},
            },
        ],
    });
});

test.each([
    ["2020-01-03", "deceased"],
    ["2020-01-05", "deceased"],
    ["2020-01-10", "alive"],
])("death on %s with visit ending 2020-01-05 is %s", async (deathDate, expected) => {
    const { timeline } = await assemble(source(
        [["P1", "1980", "1", "1", "8507", "8527"]],
        [["P1", "V1", "2020-01-01 00:00:00", "2020-01-01", "2020-01-05"]],
        [["P1", deathDate]],
    ));
    const person = timeline.get("P1");
    expect(person?.deathTime).toBe(`${deathDate}T00:00:00`);
    expect(person?.episodes[0].dischargeStatus).toBe(expected);
});

test("discharge status rule", () => {
    expect(dischargeStatus(null, "2020-01-05T00:00:00")).toBe("alive");
    expect(dischargeStatus("2020-01-05T00:00:00", "2020-01-05T00:00:00")).toBe("deceased");
    expect(dischargeStatus("2020-01-06T00:00:00", "2020-01-05T00:00:00")).toBe("alive");
    expect(dischargeStatus("2020-01-06T00:00:00", null)).toBe("deceased");
});

test("episodes are ordered by encounter time, not by id", async () => {
    const { timeline } = await assemble(source(
        [["P1", "1970", "6", "15", "8532", "8527"]],
        [
            ["P1", "V2", "2020-03-01 00:00:00", "2020-03-01", "2020-03-02"],
            ["P1", "V10", "2020-01-01 00:00:00", "2020-01-01", "2020-01-02"],
            ["P1", "V3", "2020-02-01 00:00:00", "2020-02-01", "2020-02-02"],
        ],
    ));
    expect(timeline.get("P1")?.episodes.map((e) => e.episodeId)).toEqual(["V10", "V3", "V2"]);
});

test("one person per distinct id; visits of unknown persons are ignored", async () => {
    const { timeline } = await assemble(source(
        [
            ["007", "1990", "", "", "8507", "8527"],
            ["P2", "1985", "2", "28", "8532", "8516"],
        ],
        [
            ["P2", "V5", "", "2021-05-01", "2021-05-03"],
            ["P9", "V9", "2021-05-01 00:00:00", "2021-05-01", "2021-05-03"],
        ],
    ));
    expect([...timeline.keys()]).toEqual(["007", "P2"]);
    expect(timeline.get("007")?.birthTime).toBe("1990-01-01T00:00:00");
    expect(timeline.get("007")?.episodes).toEqual([]);
    expect(timeline.get("P2")?.episodes[0].encounterTime).toBe("2021-05-01T00:00:00");
});

test("bad birth date fails the run by default", async () => {
    const src = source([["P1", "19x0", "1", "1", "8507", "8527"]], []);
    await expect(assemble(src)).rejects.toBeInstanceOf(ParseError);
});

test("isolated unit failures drop only the broken person", async () => {
    const { timeline, failures } = await assemble(source(
        [
            ["P1", "1980", "13", "1", "8507", "8527"],
            ["P2", "1981", "1", "1", "8507", "8527"],
        ],
        [],
    ), "isolate");
    expect([...timeline.keys()]).toEqual(["P2"]);
    expect(failures.map((f) => [f.stage, f.key])).toEqual([["basic_info", "P1"]]);
    expect(failures[0].error).toBeInstanceOf(ParseError);
});

test("an episode id shared by two persons is rejected", async () => {
    const src = source(
        [
            ["P1", "1980", "1", "1", "8507", "8527"],
            ["P2", "1981", "1", "1", "8507", "8527"],
        ],
        [
            ["P1", "V1", "2020-01-01 00:00:00", "2020-01-01", "2020-01-02"],
            ["P2", "V1", "2020-02-01 00:00:00", "2020-02-01", "2020-02-02"],
        ],
    );
    await expect(assemble(src)).rejects.toBeInstanceOf(SchemaError);
});

test("development mode caps the person table", async () => {
    const persons = Array.from({ length: 1005 }, (_, i) => [`P${String(i).padStart(4, "0")}`, "1980", "1", "1", "8507", "8527"]);
    const { timeline } = await assemble(source(persons, []), "fail", true);
    expect(timeline.size).toBe(1000);
    expect(timeline.has("P0999")).toBe(true);
    expect(timeline.has("P1000")).toBe(false);
});
