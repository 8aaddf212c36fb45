export type MetricLabels = Record<string, string | number | boolean>;

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
};

export type MetricsRegistry = {
  incCounter: (name: string, labels?: MetricLabels, delta?: number) => void;
  value: (name: string, labels?: MetricLabels) => number;
  render: () => string;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export const createMetricsRegistry = (baseLabels: MetricLabels = {}): MetricsRegistry => {
  const entries = new Map<string, MetricEntry>();

  const keyFor = (name: string, labels: MetricLabels) => {
    const merged = { ...baseLabels, ...labels };
    return { merged, key: `${name}:${JSON.stringify(normalizeLabels(merged))}` };
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const { merged, key } = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, { name, labels: merged, value: delta });
  };

  const value = (name: string, labels: MetricLabels = {}) =>
    entries.get(keyFor(name, labels).key)?.value ?? 0;

  const render = () => {
    const lines: string[] = [];
    const seenTypes = new Set<string>();
    for (const entry of entries.values()) {
      if (!seenTypes.has(entry.name)) {
        lines.push(`# TYPE ${entry.name} counter`);
        seenTypes.add(entry.name);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, value, render };
};
