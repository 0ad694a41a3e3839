export type MetricsSnapshot = {
  counters: Record<string, number>;
  // Token amounts, kept exact.
  totals: Record<string, bigint>;
};

export class Metrics {
  private readonly counters: Record<string, number> = Object.create(null);
  private readonly totals: Record<string, bigint> = Object.create(null);

  inc(name: string, by: number = 1): void {
    if (!Number.isFinite(by)) throw new Error('Metrics: increment must be finite');
    this.counters[name] = (this.counters[name] ?? 0) + by;
  }

  addAmount(name: string, amount: bigint): void {
    if (amount < 0n) throw new Error('Metrics: amount must be >= 0');
    this.totals[name] = (this.totals[name] ?? 0n) + amount;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: { ...this.counters },
      totals: { ...this.totals },
    };
  }
}
