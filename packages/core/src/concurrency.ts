/**
 * Map `items` through `processor` with at most `maxConcurrent` calls in flight.
 *
 * Results keep the input order. The first rejection stops workers from taking
 * new items and is rethrown once in-flight calls settle.
 */
export async function mapWithConcurrencyLimit<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  maxConcurrent: number,
): Promise<R[]> {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new Error(`maxConcurrent must be a positive integer, got ${String(maxConcurrent)}`);
  }

  const slots: ({ value: R } | undefined)[] = items.map(() => undefined);
  // Workers share one iterator, so each index is taken exactly once.
  const pending = items.entries();
  const state: { failure?: { error: unknown } } = {};

  async function worker(): Promise<void> {
    for (const [index, item] of pending) {
      if (state.failure !== undefined) return;

      try {
        slots[index] = { value: await processor(item, index) };
      } catch (error: unknown) {
        state.failure ??= { error };
        return;
      }
    }
  }

  const workerCount = Math.min(maxConcurrent, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure !== undefined) {
    throw state.failure.error;
  }

  return slots.map((slot, index) => {
    if (slot === undefined) {
      throw new Error(`Missing result for item ${String(index)}`);
    }
    return slot.value;
  });
}
