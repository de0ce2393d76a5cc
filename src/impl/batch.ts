/**
 * Chunked, strictly sequential batch execution.
 *
 * Chunks never run concurrently: each one awaits the previous, so later
 * chunks observe the table state left by earlier ones. There is no rollback
 * across chunks; a failure leaves earlier chunks applied.
 */

/**
 * Split items into consecutive chunks of at most `size`.
 *
 * @throws RangeError if size is not a positive integer
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	if (!Number.isSafeInteger(size) || size < 1) {
		throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
	}
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

/**
 * Run `fn` over each chunk in order and concatenate the results.
 */
export async function eachChunk<T, R>(
	items: readonly T[],
	size: number,
	fn: (chunk: T[], index: number, total: number) => Promise<R[]>,
): Promise<R[]> {
	const chunks = chunk(items, size);
	const results: R[] = [];
	for (let index = 0; index < chunks.length; index++) {
		results.push(...(await fn(chunks[index], index, chunks.length)));
	}
	return results;
}
