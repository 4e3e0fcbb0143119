import { MappingError, errorMessage } from "../errors";
import type { ClinicalEvent, Timeline } from "../timeline/model";
import { resolveMappings, type CodeMapping, type ResolvedMapping } from "./config";
import type { CrossMap, CrossMapFactory } from "./crossmap";

/** table -> vocabulary its events are currently in. */
export type VocabularyRegistry = Record<string, string>;

export interface VocabularyTransition {
    from: string;
    to: string;
}

/** Every registry change per table, in the order it happened. */
export type TransitionLog = Record<string, VocabularyTransition[]>;

export interface MappingResult {
    timeline: Timeline;
    /** Last mapping applied to each table wins. */
    registry: VocabularyRegistry;
    transitions: TransitionLog;
    mappedEvents: number;
    emittedEvents: number;
}

export interface BoundMapping extends ResolvedMapping {
    crossMap: CrossMap;
}

/** Builds one service per configured pair, keyed by source vocabulary. */
export async function bindCrossMaps(mapping: CodeMapping, factory: CrossMapFactory): Promise<Map<string, BoundMapping>> {
    const bound = new Map<string, BoundMapping>();
    for (const [source, resolved] of resolveMappings(mapping)) {
        bound.set(source, { ...resolved, crossMap: await factory(resolved.source, resolved.target) });
    }
    return bound;
}

async function lookup(binding: BoundMapping, event: ClinicalEvent): Promise<string[]> {
    try {
        return await binding.crossMap.map(event.code, binding.sourceKwargs, binding.targetKwargs);
    } catch (err) {
        throw new MappingError(
            `Mapping ${binding.source} -> ${binding.target} failed for code ${event.code}: ${errorMessage(err)}`,
            { source: binding.source, target: binding.target, code: event.code, table: event.table },
            { cause: err },
        );
    }
}

function rewrite(event: ClinicalEvent, code: string, vocabulary: string): ClinicalEvent {
    const copy: ClinicalEvent = { ...event, code, vocabulary };
    if (event.attributes) copy.attributes = { ...event.attributes };
    return copy;
}

/**
 * Replaces every event in a configured source vocabulary with one copy per
 * code the service returns (none when it returns nothing). Other events
 * pass through untouched. Episode lists are rewritten in place.
 */
export async function mapVocabularies(
    timeline: Timeline,
    bindings: Map<string, BoundMapping>,
    registry: VocabularyRegistry,
    transitions: TransitionLog = {},
): Promise<MappingResult> {
    const nextRegistry: VocabularyRegistry = { ...registry };
    const nextTransitions: TransitionLog = Object.fromEntries(
        Object.entries(transitions).map(([table, log]) => [table, [...log]]),
    );
    let mappedEvents = 0;
    let emittedEvents = 0;

    for (const person of timeline.values()) {
        for (const episode of person.episodes) {
            for (const [table, events] of Object.entries(episode.events)) {
                const out: ClinicalEvent[] = [];
                for (const event of events) {
                    const binding = bindings.get(event.vocabulary);
                    if (!binding) {
                        out.push(event);
                        continue;
                    }
                    const codes = await lookup(binding, event);
                    for (const code of codes) out.push(rewrite(event, code, binding.target));
                    mappedEvents++;
                    emittedEvents += codes.length;

                    if (nextRegistry[event.table] !== binding.target) {
                        (nextTransitions[event.table] ??= []).push({ from: binding.source, to: binding.target });
                        nextRegistry[event.table] = binding.target;
                    }
                }
                episode.events[table] = out;
            }
        }
    }

    return { timeline, registry: nextRegistry, transitions: nextTransitions, mappedEvents, emittedEvents };
}
