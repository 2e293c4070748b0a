/**
 * Limits the concurrency of async operations.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk (function returning a promise) and executes it with concurrency limit
 */
export function pLimit(concurrency: number) {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    return async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async () => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };
}

/**
 * Run `fn` over every item with at most `limit` in flight, collecting one
 * settled result per item in input order. A rejection never stops the rest.
 */
export async function settleWithConcurrency<T, R>(
    items: T[],
    limit: number,
    fn: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    const limitFn = pLimit(limit);
    return Promise.allSettled(items.map(item => limitFn(() => fn(item))));
}
