import { errorMessage } from "../errors";

export type OnUnitError = "fail" | "isolate";

export interface UnitFailure {
    stage: string;
    key: string;
    error: Error;
}

export interface FanOutResult<T> {
    results: Map<string, T>;
    failures: UnitFailure[];
}

/**
 * Runs one unit per group with no shared state, waits for every unit, and
 * only then hands back the results for a single-threaded merge. A failed
 * unit never cancels its siblings. With "fail" the first failure is
 * rethrown after the barrier; with "isolate" failures are returned.
 */
export async function fanOut<G, T>(
    stage: string,
    groups: Map<string, G>,
    unit: (key: string, group: G) => T | Promise<T>,
    onUnitError: OnUnitError = "fail",
): Promise<FanOutResult<T>> {
    const failures: UnitFailure[] = [];
    const settled = await Promise.all(
        [...groups].map(async ([key, group]): Promise<[string, T] | null> => {
            try {
                return [key, await unit(key, group)];
            } catch (err) {
                const error = err instanceof Error ? err : new Error(errorMessage(err));
                failures.push({ stage, key, error });
                console.error("unit-failed", { stage, key, error: error.message });
                return null;
            }
        }),
    );

    if (failures.length > 0 && onUnitError === "fail") throw failures[0].error;

    const results = new Map<string, T>();
    for (const entry of settled) {
        if (entry) results.set(entry[0], entry[1]);
    }
    return { results, failures };
}
