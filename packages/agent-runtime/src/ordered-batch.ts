/**
 * Run `worker` over `items` with at most `limit` in flight. Results land
 * in a pre-sized slot array indexed by input position, so the output order
 * matches the input order whatever the completion order.
 */
export async function runOrdered<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const slots = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      slots[index] = await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
  return slots;
}
