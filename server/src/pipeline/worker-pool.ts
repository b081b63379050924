import { throwIfCancelled } from '../errors.js';

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order. The first rejection stops workers from taking new items.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    let failed = false;

    const worker = async () => {
        while (!failed && next < items.length) {
            throwIfCancelled(signal);
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                failed = true;
                throw error;
            }
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
    await Promise.all(workers);
    return results;
}
