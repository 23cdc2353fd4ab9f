export interface IndexedSettledResults<R> {
	/** Resolved values with the index of the task that produced them, in index order */
	fulfilled: { index: number; value: R }[];
	/** Rejection reasons with the index of the failed task, in index order */
	rejected: { index: number; reason: unknown }[];
}

/**
 * Runs `count` tasks, waits for all of them to settle, and splits the outcomes by status.
 * Entries keep the index of their task, so ordering follows the task index rather than the completion order.
 */
export async function settleIndexed<R>(count: number, task: (index: number) => Promise<R>): Promise<IndexedSettledResults<R>> {
	const settled = await Promise.allSettled(Array.from({ length: count }, (_, index) => task(index)));

	const results: IndexedSettledResults<R> = { fulfilled: [], rejected: [] };
	settled.forEach((result, index) => {
		if (result.status === 'fulfilled') results.fulfilled.push({ index, value: result.value });
		else results.rejected.push({ index, reason: result.reason });
	});
	return results;
}
