import type { Measurement } from '../status/emitter.js';
import type { MetricKind } from '../status/specs.js';

export type PrometheusSample = {
  value: number;
  labels?: Record<string, string>;
};

export type PrometheusFamily = {
  name: string;
  help?: string;
  type: MetricKind;
  samples: PrometheusSample[];
};

export type RenderExpositionOptions = {
  onDuplicate?: (measurement: Measurement) => void;
};

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_:]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  if (!collapsed) {
    return 'metric';
  }
  if (/^[0-9]/.test(collapsed)) {
    return `_${collapsed}`;
  }
  return collapsed;
}

export function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  if (!collapsed) {
    return 'label';
  }
  if (/^[0-9]/.test(collapsed)) {
    return `_${collapsed}`;
  }
  return collapsed;
}

export function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

export function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

export function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

export function formatPrometheusValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Number.POSITIVE_INFINITY) {
    return '+Inf';
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return '-Inf';
  }
  if (value === 0) {
    return '0';
  }
  return String(value);
}

export function formatPrometheusFamily(family: PrometheusFamily): string {
  const metricName = sanitizePrometheusMetricName(family.name);
  const lines: string[] = [];
  if (family.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(family.help)}`);
  }
  lines.push(`# TYPE ${metricName} ${family.type}`);
  for (const sample of family.samples) {
    lines.push(
      `${metricName}${formatPrometheusLabels(sample.labels ?? {})} ${formatPrometheusValue(sample.value)}`
    );
  }
  return lines.join('\n');
}

export function measurementLabels(measurement: Measurement): Record<string, string> {
  const labels: Record<string, string> = {};
  measurement.descriptor.labelNames.forEach((name, index) => {
    labels[name] = measurement.labels[index] ?? '';
  });
  return labels;
}

/**
 * Renders measurements as one text exposition. Families keep the order in
 * which their first sample arrived; a second sample with the same name and
 * label values is dropped and reported through `onDuplicate`.
 */
export function renderExposition(
  measurements: Iterable<Measurement>,
  options: RenderExpositionOptions = {}
): string {
  const families = new Map<string, PrometheusFamily>();
  const seen = new Set<string>();

  for (const measurement of measurements) {
    const { descriptor } = measurement;
    const labels = measurementLabels(measurement);
    const identity = `${descriptor.name}${formatPrometheusLabels(labels)}`;
    if (seen.has(identity)) {
      options.onDuplicate?.(measurement);
      continue;
    }
    seen.add(identity);

    let family = families.get(descriptor.name);
    if (!family) {
      family = { name: descriptor.name, help: descriptor.help, type: measurement.kind, samples: [] };
      families.set(descriptor.name, family);
    }
    family.samples.push({ value: measurement.value, labels });
  }

  return joinFamilies(Array.from(families.values(), formatPrometheusFamily));
}

export function joinFamilies(blocks: string[]): string {
  const nonEmpty = blocks.filter(block => block.length > 0);
  return nonEmpty.length > 0 ? `${nonEmpty.join('\n')}\n` : '';
}
