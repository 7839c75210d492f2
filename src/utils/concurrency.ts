/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep input order. A rejection from `worker` rejects the whole call,
 * so callers that need isolation catch inside the worker.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    });

    await Promise.all(lanes);
    return results;
}
