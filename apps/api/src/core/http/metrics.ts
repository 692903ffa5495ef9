import client from "prom-client";

const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const requestCounter = new client.Counter({
  name: "tripnest_requests_total",
  help: "Total HTTP requests received",
  labelNames: ["method", "route", "status"] as const,
});

export const requestDuration = new client.Histogram({
  name: "tripnest_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
});

register.registerMetric(requestCounter);
register.registerMetric(requestDuration);

export const metricsContentType = register.contentType;

export async function getMetrics(): Promise<string> {
  return register.metrics();
}
