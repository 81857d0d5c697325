/**
 * Timing summary for a batch of documents. All values are deterministic
 * aggregates of the measured per-document durations.
 */
export interface DurationSummary {
  /** Number of processed documents. */
  count: number;
  /** Sum of all measured durations in milliseconds. */
  totalMs: number;
  /** Arithmetic mean duration in milliseconds. */
  averageMs: number;
  /** Slowest observed document in milliseconds. */
  maxMs: number;
  /** 95th-percentile duration in milliseconds. */
  p95Ms: number;
}

/**
 * Execute asynchronous work with bounded concurrency while preserving the input
 * ordering in the returned result array.
 */
export async function runWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  requestedConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }

  const concurrency = normalizeConcurrency(requestedConcurrency, items.length);
  const results = new Array<TOutput>(items.length);
  // Workers pull from one shared iterator, so each item is taken exactly once.
  const queue = items.entries();

  async function runWorker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  }

  const workers = Array.from({ length: concurrency }, () => runWorker());
  await Promise.all(workers);
  return results;
}

/** Summarize per-document durations; negative and non-finite samples are ignored. */
export function summarizeDurations(durationsMs: readonly number[]): DurationSummary {
  const normalized = durationsMs.filter((value) => Number.isFinite(value) && value >= 0);
  if (normalized.length === 0) {
    return { count: 0, totalMs: 0, averageMs: 0, maxMs: 0, p95Ms: 0 };
  }

  const sorted = [...normalized].sort((left, right) => left - right);
  const totalMs = normalized.reduce((sum, value) => sum + value, 0);
  const maxMs = sorted[sorted.length - 1] ?? 0;
  const p95Index = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);

  return {
    count: normalized.length,
    totalMs,
    averageMs: totalMs / normalized.length,
    maxMs,
    p95Ms: sorted[p95Index] ?? maxMs
  };
}

/** Clamp caller-provided concurrency to a positive integer no larger than the item count. */
function normalizeConcurrency(requestedConcurrency: number, maxItems: number): number {
  const fallback = 1;
  if (!Number.isFinite(requestedConcurrency)) {
    return fallback;
  }

  const rounded = Math.floor(requestedConcurrency);
  if (rounded <= 0) {
    return fallback;
  }

  return Math.min(rounded, Math.max(1, maxItems));
}
