/**
 * Bounded worker pool. Each worker owns a private tally; the caller merges
 * tallies after every worker has finished, so no counter is shared.
 */

export interface IPoolResult<TResult, TTally> {
  /** In input order */
  results: TResult[];
  /** One per worker */
  tallies: TTally[];
}

export async function runPool<TItem, TResult, TTally>(
  items: readonly TItem[],
  concurrency: number,
  createTally: () => TTally,
  work: (item: TItem, index: number, tally: TTally) => Promise<TResult>,
): Promise<IPoolResult<TResult, TTally>> {
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const indexed: Array<{ index: number; result: TResult }> = [];
  let cursor = 0;

  const worker = async (tally: TTally): Promise<TTally> => {
    while (cursor < items.length) {
      const index = cursor++;
      indexed.push({ index, result: await work(items[index], index, tally) });
    }
    return tally;
  };

  const tallies = await Promise.all(
    Array.from({ length: workerCount }, () => worker(createTally())),
  );

  return {
    results: indexed.sort((a, b) => a.index - b.index).map((entry) => entry.result),
    tallies,
  };
}
