/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight.
 * Each result is written to the slot of its input index, so the returned
 * array is in input order regardless of completion order.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const slots = new Array<R>(items.length);
  const laneCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const lanes: Promise<void>[] = [];
  for (let lane = 0; lane < laneCount; lane += 1) {
    lanes.push((async () => {
      while (next < items.length) {
        const index = next;
        next += 1;
        slots[index] = await worker(items[index], index);
      }
    })());
  }

  await Promise.all(lanes);
  return slots;
}

export async function mapSequentially<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  for (let index = 0; index < items.length; index += 1) {
    results.push(await worker(items[index], index));
  }
  return results;
}
