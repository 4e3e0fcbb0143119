import { readTable, groupRows, type ReadOptions, type Row, type TableRows } from "../adapters/csv/table-reader";
import type { TableSource } from "../adapters/source";
import { ParseError, SchemaError } from "../errors";
import { addEpisode, createPerson, type DischargeStatus, type Episode, type Person, type Timeline } from "./model";
import { DEATH_TABLE, DEV_PERSON_LIMIT, PERSON_ID, PERSON_TABLE, VISIT_ID, VISIT_TABLE } from "./tables";
import { formatTimestamp, toTimestamp, toTimestampOrNull, type Timestamp } from "./time";
import { fanOut, type OnUnitError, type UnitFailure } from "./units";

export interface BasicTables {
    person: TableRows;
    visit: TableRows;
    death: TableRows;
}

export interface BasicInfoResult {
    timeline: Timeline;
    failures: UnitFailure[];
}

export async function readBasicTables(source: TableSource, opts: ReadOptions, dev: boolean): Promise<BasicTables> {
    const full: ReadOptions = { delimiter: opts.delimiter, compressed: opts.compressed };
    const [person, visit, death] = await Promise.all([
        readTable(source, PERSON_TABLE, dev ? { ...full, limit: DEV_PERSON_LIMIT } : full),
        readTable(source, VISIT_TABLE, full),
        readTable(source, DEATH_TABLE, full),
    ]);
    return { person, visit, death };
}

/** Death strictly after the visit end means the patient left alive. */
export function dischargeStatus(deathTime: Timestamp | null, dischargeTime: Timestamp | null): DischargeStatus {
    if (deathTime === null) return "alive";
    if (dischargeTime !== null && deathTime > dischargeTime) return "alive";
    return "deceased";
}

function datePart(row: Row, column: string, fallback?: number): number {
    const raw = row[column];
    if (raw === undefined) {
        if (fallback !== undefined) return fallback;
        throw new ParseError(`Missing ${column} for person ${row[PERSON_ID]}`, { table: "person", column, personId: row[PERSON_ID] });
    }
    const n = Number(raw);
    if (!Number.isInteger(n)) {
        throw new ParseError(`Non-numeric ${column} "${raw}" for person ${row[PERSON_ID]}`, {
            table: "person",
            column,
            personId: row[PERSON_ID],
        });
    }
    return n;
}

/** No time of day in OMOP person rows; birth is taken at midnight. */
export function birthTime(row: Row): Timestamp {
    const year = datePart(row, "year_of_birth");
    const month = datePart(row, "month_of_birth", 1);
    const day = datePart(row, "day_of_birth", 1);
    try {
        return formatTimestamp(year, month, day);
    } catch (err) {
        throw new ParseError(`Invalid birth date ${year}-${month}-${day} for person ${row[PERSON_ID]}`, {
            table: "person",
            personId: row[PERSON_ID],
        }, { cause: err });
    }
}

function buildEpisode(personId: string, episodeId: string, visit: Row, deathTime: Timestamp | null): Episode {
    const start = visit["visit_start_datetime"] ?? visit["visit_start_date"];
    if (start === undefined) {
        throw new ParseError(`Visit ${episodeId} has no start time`, { table: "visit_occurrence", episodeId });
    }
    const dischargeTime = toTimestampOrNull(visit["visit_end_date"]);
    return {
        episodeId,
        personId,
        encounterTime: toTimestamp(start),
        dischargeTime,
        dischargeStatus: dischargeStatus(deathTime, dischargeTime),
        events: {},
    };
}

/** One unit of work: a person row, that person's visit rows, and an optional death row. */
export function buildPerson(personRow: Row, visits: readonly Row[], death: Row | undefined): Person {
    const personId = personRow[PERSON_ID];
    if (personId === undefined) throw new ParseError("Person row without person_id", { table: "person" });

    const deathTime = toTimestampOrNull(death?.["death_date"]);
    const person = createPerson({
        personId,
        birthTime: birthTime(personRow),
        deathTime,
        gender: personRow["gender_concept_id"] ?? null,
        ethnicity: personRow["race_concept_id"] ?? null,
    });

    for (const [episodeId, rows] of groupRows(visits, VISIT_ID)) {
        addEpisode(person, buildEpisode(personId, episodeId, rows[0], deathTime));
    }
    return person;
}

/**
 * person ⟕ visit_occurrence ⟕ death on person_id, one Person per person id.
 * Units run through the fan-out pool; the timeline is filled after the barrier.
 */
export async function assembleBasicInfo(tables: BasicTables, onUnitError: OnUnitError = "fail"): Promise<BasicInfoResult> {
    const persons = groupRows(tables.person.rows, PERSON_ID);
    const visits = groupRows(tables.visit.rows, PERSON_ID);
    const deaths = groupRows(tables.death.rows, PERSON_ID);

    const { results, failures } = await fanOut(
        "basic_info",
        persons,
        (personId, rows) => buildPerson(rows[0], visits.get(personId) ?? [], deaths.get(personId)?.[0]),
        onUnitError,
    );

    const timeline: Timeline = new Map();
    const owners = new Map<string, string>();
    for (const [personId, person] of results) {
        for (const episode of person.episodes) {
            const owner = owners.get(episode.episodeId);
            if (owner !== undefined) {
                throw new SchemaError(
                    VISIT_TABLE.table,
                    VISIT_ID,
                    `episode ${episode.episodeId} belongs to both ${owner} and ${personId}`,
                );
            }
            owners.set(episode.episodeId, personId);
        }
        timeline.set(personId, person);
    }
    return { timeline, failures };
}
