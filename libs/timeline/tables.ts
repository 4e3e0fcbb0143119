import type { TableSpec } from "../adapters/csv/table-reader";

// OMOP CDM v5.3 column names. Docs: http://ohdsi.github.io/CommonDataModel/cdm53.html

export const PERSON_ID = "person_id";
export const VISIT_ID = "visit_occurrence_id";

/** Always loaded; never listed by callers. */
export const BASIC_TABLES = ["person", "visit_occurrence", "death"] as const;
export type BasicTable = (typeof BASIC_TABLES)[number];

export function isBasicTable(table: string): table is BasicTable {
    return (BASIC_TABLES as readonly string[]).includes(table);
}

/** Person rows kept in development mode. */
export const DEV_PERSON_LIMIT = 1000;

export const PERSON_TABLE: TableSpec = {
    table: "person",
    required: [PERSON_ID, "year_of_birth", "month_of_birth", "day_of_birth", "gender_concept_id", "race_concept_id"],
    nonNull: [PERSON_ID],
    sortBy: [{ column: PERSON_ID, kind: "text" }],
};

export const VISIT_TABLE: TableSpec = {
    table: "visit_occurrence",
    required: [PERSON_ID, VISIT_ID, "visit_start_datetime", "visit_start_date", "visit_end_date"],
    nonNull: [PERSON_ID, VISIT_ID],
    sortBy: [
        { column: PERSON_ID, kind: "text" },
        { column: VISIT_ID, kind: "text" },
        { column: "visit_start_datetime", kind: "time" },
    ],
};

export const DEATH_TABLE: TableSpec = {
    table: "death",
    required: [PERSON_ID, "death_date"],
    nonNull: [PERSON_ID],
    sortBy: [{ column: PERSON_ID, kind: "text" }],
};

export interface EventTableDef {
    table: string;
    codeColumn: string;
    timestampColumn: string;
    vocabulary: string;
    /** Copied into event attributes when present. */
    extraColumns: readonly string[];
}

export const EVENT_TABLES: readonly EventTableDef[] = [
    {
        table: "condition_occurrence",
        codeColumn: "condition_concept_id",
        timestampColumn: "condition_start_datetime",
        vocabulary: "CONDITION_CONCEPT_ID",
        extraColumns: [],
    },
    {
        table: "procedure_occurrence",
        codeColumn: "procedure_concept_id",
        timestampColumn: "procedure_datetime",
        vocabulary: "PROCEDURE_CONCEPT_ID",
        extraColumns: [],
    },
    {
        table: "drug_exposure",
        codeColumn: "drug_concept_id",
        timestampColumn: "drug_exposure_start_datetime",
        vocabulary: "DRUG_CONCEPT_ID",
        extraColumns: ["quantity", "days_supply"],
    },
    {
        table: "measurement",
        codeColumn: "measurement_concept_id",
        timestampColumn: "measurement_datetime",
        vocabulary: "MEASUREMENT_CONCEPT_ID",
        extraColumns: ["value_as_number", "unit_source_value"],
    },
];

export function eventTableSpec(def: EventTableDef): TableSpec {
    return {
        table: def.table,
        required: [PERSON_ID, VISIT_ID, def.codeColumn, def.timestampColumn],
        nonNull: [PERSON_ID, VISIT_ID, def.codeColumn],
        sortBy: [
            { column: PERSON_ID, kind: "text" },
            { column: VISIT_ID, kind: "text" },
            { column: def.timestampColumn, kind: "time" },
        ],
    };
}
