import Ajv2020 from "ajv/dist/2020";
import addFormats from "ajv-formats";
import type { SchemaObject } from "ajv";
import { TimelineError } from "../../errors";

// Schemas
import timelineCacheJson from "../schemas/timeline.cache.v1.json";

const timelineCache: SchemaObject = timelineCacheJson;

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Compile validators once
const validators = {
  "timeline.cache.v1": ajv.compile(timelineCache),
};

export type ContractName = keyof typeof validators;

export class ContractViolation extends TimelineError {}

export function validate<T>(schemaName: ContractName, data: unknown): asserts data is T {
  const v = validators[schemaName];
  if (!v(data)) {
    const errors = v.errors ?? [];
    const messages = errors.slice(0, 5).map(e => `${e.instancePath || '/'} ${e.message}`).join("; ");
    throw new ContractViolation(`Schema validation failed for ${schemaName}: ${messages}`, { schema: schemaName, errors });
  }
}
