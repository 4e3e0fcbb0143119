import type { Person, Timeline } from "../timeline/model";
import type { VocabularyRegistry } from "../vocab/mapper";

/** Converts one person's timeline into zero or more flat samples. */
export type TaskFn<S> = (person: Person) => S[];

export interface SampleSet<S> {
    datasetName: string;
    taskName: string;
    samples: S[];
    vocabularies: VocabularyRegistry;
}

/**
 * Runs `taskFn` over every person in timeline order and concatenates the
 * results. A person returning no samples is left out of the task.
 */
export function setTask<S>(
    dataset: { datasetName: string; timeline: Timeline; registry: VocabularyRegistry },
    taskFn: TaskFn<S>,
    taskName?: string,
): SampleSet<S> {
    const samples: S[] = [];
    for (const person of dataset.timeline.values()) {
        for (const sample of taskFn(person)) samples.push(sample);
    }
    return {
        datasetName: dataset.datasetName,
        taskName: taskName ?? (taskFn.name || "task"),
        samples,
        vocabularies: { ...dataset.registry },
    };
}
