/**
 * Bounded worker pool.
 *
 * `min(concurrency, items.length)` workers share one queue cursor; each
 * takes the next item as soon as its previous one settles, so a slow item
 * only holds up its own worker.
 */

export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (items.length === 0) return;

  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  }

  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: size }, () => drain()));
}
