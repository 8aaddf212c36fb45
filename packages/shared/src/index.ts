export { createLogger, redact } from "./log.js";
export type { LogLevel, LogMeta, LogSink, Logger } from "./log.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
