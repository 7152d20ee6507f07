import client from "prom-client";

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const shortCodesAllocatedTotal = new client.Counter({
  name: "short_codes_allocated_total",
  help: "Short codes inserted into the store",
  registers: [registry],
});

// Counts every rejected candidate, whether caught by exists() or by the unique constraint.
export const shortCodeCollisionsTotal = new client.Counter({
  name: "short_code_collisions_total",
  help: "Candidate short codes that were already taken",
  registers: [registry],
});

export const redirectsTotal = new client.Counter({
  name: "redirects_total",
  help: "Short code lookups by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});
