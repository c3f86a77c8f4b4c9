interface Counter {
  name: string;
  value: number;
  labels?: Record<string, string>;
}

interface Histogram {
  name: string;
  values: number[];
  labels?: Record<string, string>;
}

interface Gauge {
  name: string;
  value: number;
  labels?: Record<string, string>;
}

const HISTOGRAM_SAMPLES = 1000;

export interface HistogramSummary {
  name: string;
  labels: Record<string, string> | undefined;
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}

export interface MetricsReport {
  counters: Counter[];
  histograms: HistogramSummary[];
  gauges: Gauge[];
  timestamp: number;
}

/**
 * In-process counters, gauges and bounded histograms for pipeline health.
 */
export class MetricsRegistry {
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  counter(name: string, labels?: Record<string, string>): void {
    this.incrementCounter(name, 1, labels);
  }

  incrementCounter(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const existing = this.counters.get(key);

    if (existing) {
      existing.value += value;
    } else {
      this.counters.set(key, labels ? { name, value, labels } : { name, value });
    }
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const existing = this.histograms.get(key);

    if (existing) {
      existing.values.push(value);
      if (existing.values.length > HISTOGRAM_SAMPLES) {
        existing.values.shift();
      }
    } else {
      this.histograms.set(key, labels ? { name, values: [value], labels } : { name, values: [value] });
    }
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.gauges.set(key, labels ? { name, value, labels } : { name, value });
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }

  getMetrics(): MetricsReport {
    const histograms = Array.from(this.histograms.values()).map((h) => ({
      name: h.name,
      labels: h.labels,
      count: h.values.length,
      avg: h.values.length > 0 ? h.values.reduce((a, b) => a + b, 0) / h.values.length : 0,
      p50: this.percentile(h.values, 50),
      p95: this.percentile(h.values, 95),
      max: h.values.length > 0 ? Math.max(...h.values) : 0,
    }));

    return {
      counters: Array.from(this.counters.values(), (c) => ({ ...c })),
      histograms,
      gauges: Array.from(this.gauges.values(), (g) => ({ ...g })),
      timestamp: Date.now(),
    };
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  }
}
