import type { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      listings_crawled: this.getCounter("listings_crawled"),
      listings_failed: this.getCounter("listings_failed"),
      units_discovered: this.getCounter("units_discovered"),
      units_processed: this.getCounter("units_processed"),
      units_failed: this.getCounter("units_failed"),
      records_accepted: this.getCounter("records_accepted"),
      records_updated: this.getCounter("records_updated"),
      records_rejected: this.getCounter("records_rejected"),
      records_invalid: this.getCounter("records_invalid"),
      extract_attempts: this.getCounter("extract_attempts"),
      extract_retries: this.getCounter("extract_retries"),
      extract_exhausted: this.getCounter("extract_exhausted"),
      repairs_attempted: this.getCounter("repairs_attempted"),
      repairs_failed: this.getCounter("repairs_failed"),
      checkpoints_saved: this.getCounter("checkpoints_saved"),
      checkpoints_failed: this.getCounter("checkpoints_failed"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      listing_fetch_ms: this.summarize("listing_fetch_ms"),
      render_ms: this.summarize("render_ms"),
      extract_ms: this.summarize("extract_ms"),
      checkpoint_ms: this.summarize("checkpoint_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
