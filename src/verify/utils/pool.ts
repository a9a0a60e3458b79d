/**
 * Bounded worker pool. Results keep input order.
 */
export async function runPool<T, R>(
	inputs: readonly T[],
	concurrency: number,
	worker: (input: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results: R[] = new Array(inputs.length);
	let next = 0;

	const lane = async (): Promise<void> => {
		while (next < inputs.length) {
			const index = next++;
			results[index] = await worker(inputs[index], index);
		}
	};

	const lanes = Math.max(1, Math.min(concurrency, inputs.length));
	await Promise.all(Array.from({ length: lanes }, () => lane()));
	return results;
}
