import { z } from "zod";
import { ConfigurationError } from "../errors";

export type Kwargs = Record<string, unknown>;

const KwargsSchema = z.record(z.string(), z.unknown());

/** Only these two keys are forwarded to the mapping service. */
export const MappingOptionsSchema = z
    .object({
        source_kwargs: KwargsSchema.optional(),
        target_kwargs: KwargsSchema.optional(),
    })
    .strict();

export const MappingTargetSchema = z.union([
    z.string().min(1),
    z.tuple([z.string().min(1), MappingOptionsSchema]),
]);

/** source vocabulary -> target vocabulary, or [target, { source_kwargs?, target_kwargs? }]. */
export const CodeMappingSchema = z.record(z.string().min(1), MappingTargetSchema);

export type MappingOptions = z.infer<typeof MappingOptionsSchema>;
export type MappingTarget = z.infer<typeof MappingTargetSchema>;
export type CodeMapping = z.infer<typeof CodeMappingSchema>;

export interface ResolvedMapping {
    source: string;
    target: string;
    sourceKwargs: Kwargs;
    targetKwargs: Kwargs;
}

export function parseCodeMapping(input: unknown): CodeMapping {
    const parsed = CodeMappingSchema.safeParse(input ?? {});
    if (!parsed.success) {
        const messages = parsed.error.issues.map((i) => `${i.path.join(".") || "/"} ${i.message}`).join("; ");
        throw new ConfigurationError(`Invalid code mapping: ${messages}`, { issues: parsed.error.issues });
    }
    return parsed.data;
}

export function resolveMapping(source: string, target: MappingTarget): ResolvedMapping {
    if (typeof target === "string") return { source, target, sourceKwargs: {}, targetKwargs: {} };
    const [vocabulary, options] = target;
    return {
        source,
        target: vocabulary,
        sourceKwargs: options.source_kwargs ?? {},
        targetKwargs: options.target_kwargs ?? {},
    };
}

export function resolveMappings(mapping: CodeMapping): Map<string, ResolvedMapping> {
    return new Map(Object.entries(mapping).map(([source, target]) => [source, resolveMapping(source, target)]));
}
