export type CounterName =
  | "payment_initiated_total"
  | "payment_reconciled_total"
  | "payment_duplicate_settlement_total"
  | "payment_anomaly_total"
  | "gateway_retry_total"
  | "notification_dispatch_failed_total"
  | "booking_created_total"
  | "booking_cancelled_total";

type CounterMap = Partial<Record<CounterName, number>>;
type TimerStats = { count: number; totalMs: number; avgMs: number };

const counters = new Map<CounterName, number>();
const timers = new Map<string, TimerStats>();

export function incrementCounter(name: CounterName, value = 1): void {
  counters.set(name, (counters.get(name) ?? 0) + value);
}

export function recordTimer(name: string, durationMs: number): void {
  const current = timers.get(name) ?? { count: 0, totalMs: 0, avgMs: 0 };
  current.count += 1;
  current.totalMs += durationMs;
  current.avgMs = current.totalMs / current.count;
  timers.set(name, current);
}

export function getMetricsSnapshot(): {
  counters: CounterMap;
  timers: Record<string, TimerStats>;
} {
  const counterSnapshot: CounterMap = {};
  for (const [name, value] of counters) {
    counterSnapshot[name] = value;
  }
  return {
    counters: counterSnapshot,
    timers: Object.fromEntries(
      [...timers].map(([name, stats]) => [name, { ...stats }])
    ),
  };
}

export function getCounter(name: CounterName): number {
  return counters.get(name) ?? 0;
}

export function resetMetrics(): void {
  counters.clear();
  timers.clear();
}
