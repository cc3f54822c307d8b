/** GetUserSummaries rejects requests naming more players than this. */
export const SUMMARIES_BATCH_LIMIT = 100;

/**
 * Splits ids into contiguous chunks of at most `limit` entries, keeping the
 * input order. An empty input gives no chunks.
 */
export function batchSteamIds(ids: readonly string[], limit: number = SUMMARIES_BATCH_LIMIT): string[][] {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new RangeError(`Batch limit must be a positive integer, got ${limit}`);
    }

    const batches: string[][] = [];
    for (let start = 0; start < ids.length; start += limit) {
        batches.push(ids.slice(start, start + limit));
    }
    return batches;
}

export function joinSteamIds(batch: readonly string[]): string {
    return batch.join(',');
}
