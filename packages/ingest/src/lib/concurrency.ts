/**
 * Map `items` through `mapper` with at most `concurrency` calls in flight.
 * Items are pulled lazily from a single shared iterator; results are
 * stored by sequence index, so their order matches the input order no
 * matter which call finishes first. The first rejection rejects the whole
 * run.
 */
export async function mapWithConcurrency<T, R>(
	items: Iterable<T>,
	concurrency: number,
	mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	if (!Number.isInteger(concurrency) || concurrency <= 0) {
		throw new Error(`Invalid concurrency value: ${concurrency}`);
	}

	const iterator = items[Symbol.iterator]();
	const results: R[] = [];
	let nextIndex = 0;
	let done = false;

	const worker = async () => {
		while (!done) {
			const next = iterator.next();
			if (next.done) {
				done = true;
				return;
			}
			const currentIndex = nextIndex++;
			results[currentIndex] = await mapper(next.value, currentIndex);
		}
	};

	await Promise.all(Array.from({ length: concurrency }, () => worker()));

	return results;
}
