//
// Bounded parallelism shared between independent callers.
//
// A context owns a number of free slots; every running map is a participant and gets a chance to
// start new jobs whenever any job in the context finishes.
//

export interface ConcurrentRunContext {
    freeSlots: number;
    participants: Set<() => void>;
}

export function createConcurrentRunContext(maxJobs: number): ConcurrentRunContext {
    return {
        freeSlots: Number.isFinite(maxJobs) ? Math.max(1, Math.floor(maxJobs)) : 1,
        participants: new Set()
    };
}

export namespace ConcurrentRunContext {
    export function signal(context: ConcurrentRunContext) {
        context.participants.forEach(p => p());
    }
    export function addParticipant(context: ConcurrentRunContext, step: () => void) {
        context.participants.add(step);
    }
    export function removeParticipant(context: ConcurrentRunContext, step: () => void) {
        context.participants.delete(step);
    }
}

export type ItemOutcome<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Runs `fun` over all items, at most `context.freeSlots` at a time.
 *
 * Resolves with one outcome per item, `undefined` for items never started because `stopOnError`
 * was set and an earlier item failed. Never rejects.
 */
export function concurrentSettle<T, R>(
    input: T[],
    context: ConcurrentRunContext,
    fun: (x: T, idx: number) => Promise<R>,
    stopOnError: boolean = false
): Promise<Array<ItemOutcome<R> | undefined>> {
    return new Promise(resolve => {
        const outcomes: Array<ItemOutcome<R> | undefined> = input.map(() => undefined);

        let runningJobs = 0;
        let nextItemIndex = 0;
        let stopped = false;
        let finished = false;

        function step() {
            if (finished) {
                return;
            }
            if ((stopped || nextItemIndex === input.length) && runningJobs === 0) {
                finished = true;
                ConcurrentRunContext.removeParticipant(context, step);
                resolve(outcomes);
                ConcurrentRunContext.signal(context);
                return;
            }

            // Start as many jobs as we have slots free.
            while (!stopped && context.freeSlots > 0 && nextItemIndex < input.length) {
                const itemIndex = nextItemIndex++;
                context.freeSlots -= 1;
                runningJobs += 1;

                let itemPromise: Promise<R>;
                try {
                    itemPromise = fun(input[itemIndex], itemIndex);
                } catch (error) {
                    itemPromise = Promise.reject(error);
                }
                void itemPromise
                    .then(
                        value => {
                            outcomes[itemIndex] = { ok: true, value };
                        },
                        (error: unknown) => {
                            outcomes[itemIndex] = { ok: false, error };
                            if (stopOnError) {
                                // Don't start new jobs if something failed.
                                stopped = true;
                            }
                        }
                    )
                    .then(() => {
                        context.freeSlots += 1;
                        runningJobs -= 1;
                        ConcurrentRunContext.signal(context);
                    });
            }
        }
        ConcurrentRunContext.addParticipant(context, step);
        step();
    });
}

/**
 * Like `Promise.all` over `input.map(fun)`, but bounded by `context`.
 *
 * Stops starting new jobs after the first failure and rejects with it once running jobs are done.
 */
export async function concurrentMap<T, R>(
    input: T[],
    context: ConcurrentRunContext,
    fun: (x: T, idx: number) => Promise<R>
): Promise<R[]> {
    const outcomes = await concurrentSettle(input, context, fun, true);
    const result: R[] = [];
    for (const outcome of outcomes) {
        if (outcome === undefined) {
            continue;
        }
        if (!outcome.ok) {
            throw outcome.error;
        }
        result.push(outcome.value);
    }
    return result;
}
