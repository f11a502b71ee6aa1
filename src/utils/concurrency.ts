export const MIN_PARSE_CONCURRENCY = 1;
export const MAX_PARSE_CONCURRENCY = 16;

export function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return MIN_PARSE_CONCURRENCY;
  }
  const rounded = Math.floor(value);
  if (rounded < MIN_PARSE_CONCURRENCY) {
    return MIN_PARSE_CONCURRENCY;
  }
  if (rounded > MAX_PARSE_CONCURRENCY) {
    return MAX_PARSE_CONCURRENCY;
  }
  return rounded;
}

/**
 * Maps `items` with at most `limit` tasks in flight. Results keep input order.
 * After the first rejection no new task starts; the call rejects with that error
 * once the tasks already in flight have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;
  const worker = async (): Promise<void> => {
    while (!failed && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      try {
        results[index] = await task(item, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };
  const workers = Array.from({ length: Math.min(clampConcurrency(limit), items.length) }, () =>
    worker(),
  );
  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }
  return results;
}
