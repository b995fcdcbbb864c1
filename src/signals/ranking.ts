/**
 * Frequency counter that remembers first-encountered order, so that
 * ranking ties resolve the same way for the same input order.
 */
export class FrequencyCounter<T> {
  private readonly counts = new Map<T, number>();

  add(item: T, times: number = 1): void {
    this.counts.set(item, (this.counts.get(item) ?? 0) + times);
  }

  get size(): number {
    return this.counts.size;
  }

  get(item: T): number {
    return this.counts.get(item) ?? 0;
  }

  /** Items by descending count; Array#sort is stable, so ties keep insertion order. */
  top(limit: number = Infinity): T[] {
    return [...this.counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([item]) => item);
  }

  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const [item, count] of this.counts) {
      record[String(item)] = count;
    }
    return record;
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return roundTo((part / total) * 100, 2);
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
