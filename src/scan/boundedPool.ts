/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Lanes pull the next index from a shared cursor. Before each pull the lane
 * consults `shouldStart`; once it answers false no further item starts, and
 * calls already in flight run to completion. Results are stored by item index,
 * with `undefined` for items that never started.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStart: () => boolean = () => true
): Promise<Array<R | undefined>> {
  const results = new Array<R | undefined>(items.length).fill(undefined);
  let cursor = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length && shouldStart()) {
      const index = cursor++;
      results[index] = await worker(items[index], index);
    }
  };

  const bound = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : 1;
  const laneCount = Math.max(1, Math.min(bound, items.length));
  const lanes: Promise<void>[] = [];
  for (let i = 0; i < laneCount; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);

  return results;
}
