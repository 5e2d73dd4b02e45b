const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000];

export interface MetricsSnapshot {
  counters: Record<string, number>;
  latency: {
    count: number;
    avg_ms: number;
    p50_ms_upper_bound: number;
    p95_ms_upper_bound: number;
    p99_ms_upper_bound: number;
    buckets_ms: number[];
    histogram: number[];
  };
}

export interface MetricsRecorder {
  /** Count one observation under each label and add its latency to the histogram. */
  record(labels: string[], latencyMs: number): void;
  snapshot(): MetricsSnapshot;
  reset(): void;
}

export function createMetricsRecorder(buckets: number[] = LATENCY_BUCKETS_MS): MetricsRecorder {
  const counters = new Map<string, number>();
  let latencyCount = 0;
  let latencySumMs = 0;
  const histogram = new Array<number>(buckets.length + 1).fill(0);

  function estimatePercentile(p: number): number {
    if (latencyCount <= 0) return 0;
    const target = Math.max(1, Math.ceil(latencyCount * p));
    let running = 0;
    for (let i = 0; i < histogram.length; i += 1) {
      running += histogram[i];
      if (running >= target) {
        return i < buckets.length ? buckets[i] : buckets[buckets.length - 1];
      }
    }
    return buckets[buckets.length - 1];
  }

  return {
    record(labels, latencyMs) {
      counters.set('total', (counters.get('total') ?? 0) + 1);
      for (const label of labels) {
        counters.set(label, (counters.get(label) ?? 0) + 1);
      }
      latencyCount += 1;
      latencySumMs += latencyMs;
      const idx = buckets.findIndex((limit) => latencyMs <= limit);
      histogram[idx >= 0 ? idx : buckets.length] += 1;
    },

    snapshot() {
      return {
        counters: Object.fromEntries([...counters.entries()].sort(([a], [b]) => a.localeCompare(b))),
        latency: {
          count: latencyCount,
          avg_ms: latencyCount > 0 ? Math.round((latencySumMs / latencyCount) * 100) / 100 : 0,
          p50_ms_upper_bound: estimatePercentile(0.5),
          p95_ms_upper_bound: estimatePercentile(0.95),
          p99_ms_upper_bound: estimatePercentile(0.99),
          buckets_ms: [...buckets],
          histogram: [...histogram],
        },
      };
    },

    reset() {
      counters.clear();
      latencyCount = 0;
      latencySumMs = 0;
      histogram.fill(0);
    },
  };
}

export function statusLabels(status: number): string[] {
  const labels: string[] = [];
  if (status >= 200 && status < 300) labels.push('status_2xx');
  else if (status >= 300 && status < 400) labels.push('status_3xx');
  else if (status >= 400 && status < 500) labels.push('status_4xx');
  else if (status >= 500) labels.push('status_5xx');

  if (status === 429 || status === 499 || status === 503 || status === 504) labels.push(`status_${status}`);
  return labels;
}

/** HTTP request outcomes. */
export const requestMetrics = createMetricsRecorder();

/** Individual model attempts made by the gateway, labelled by outcome. */
export const modelAttemptMetrics = createMetricsRecorder();
