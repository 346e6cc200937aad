/**
 * Metrics for the delivery layer
 * Tracks sessions, catch-up volume, live fan-out, cursor writes and errors.
 */

type Labels = Record<string, string>;

export type TimerStats = {
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
};

const MAX_TIMER_SAMPLES = 1000;

function percentile(sorted: number[], fraction: number): number {
  return sorted[Math.floor(sorted.length * fraction)] ?? 0;
}

class MetricsCollector {
  private static instance: MetricsCollector | null = null;
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private timers: Map<string, number[]> = new Map();

  static getInstance(): MetricsCollector {
    if (!MetricsCollector.instance) {
      MetricsCollector.instance = new MetricsCollector();
    }
    return MetricsCollector.instance;
  }

  increment(name: string, labels?: Labels, by = 1): void {
    const key = this.getKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  setGauge(name: string, value: number, labels?: Labels): void {
    const key = this.getKey(name, labels);
    this.gauges.set(key, value);
  }

  /**
   * Record a duration in milliseconds
   */
  recordTimer(name: string, duration: number, labels?: Labels): void {
    const key = this.getKey(name, labels);
    const samples = this.timers.get(key) ?? [];
    samples.push(duration);
    if (samples.length > MAX_TIMER_SAMPLES) {
      samples.shift();
    }
    this.timers.set(key, samples);
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(this.getKey(name, labels)) ?? 0;
  }

  getGauge(name: string, labels?: Labels): number {
    return this.gauges.get(this.getKey(name, labels)) ?? 0;
  }

  getTimerStats(name: string, labels?: Labels): TimerStats {
    const samples = this.timers.get(this.getKey(name, labels)) ?? [];
    if (samples.length === 0) {
      return { count: 0, avg: 0, p50: 0, p95: 0, p99: 0, min: 0, max: 0 };
    }

    const sorted = [...samples].sort((a, b) => a - b);
    return {
      count: samples.length,
      avg: samples.reduce((a, b) => a + b, 0) / samples.length,
      p50: percentile(sorted, 0.5),
      p95: percentile(sorted, 0.95),
      p99: percentile(sorted, 0.99),
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
    };
  }

  getSummary(): {
    sessions: number;
    conversations: number;
    eventsReplayed: number;
    eventsLive: number;
    syncFailures: number;
    errors: number;
    catchUpLatency: TimerStats;
  } {
    return {
      sessions: this.getGauge('delivery.sessions.active'),
      conversations: this.getGauge('delivery.registry.conversations'),
      eventsReplayed: this.getCounter('delivery.catchup.events'),
      eventsLive: this.getCounter('delivery.live.events'),
      syncFailures: this.getCounter('delivery.sync.failed'),
      errors: this.getCounter('delivery.errors'),
      catchUpLatency: this.getTimerStats('delivery.catchup.latency'),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.timers.clear();
  }

  private getKey(name: string, labels?: Labels): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${labelStr}}`;
  }
}

export const metrics = MetricsCollector.getInstance();

export function incrementCounter(name: string, labels?: Labels, by?: number): void {
  metrics.increment(name, labels, by);
}

export function setGauge(name: string, value: number, labels?: Labels): void {
  metrics.setGauge(name, value, labels);
}

export function recordTimer(name: string, duration: number, labels?: Labels): void {
  metrics.recordTimer(name, duration, labels);
}

export function getMetricsSummary() {
  return metrics.getSummary();
}
