import type { MetricDescriptor, MetricKind } from './specs.js';

export type Measurement = {
  readonly descriptor: MetricDescriptor;
  readonly kind: MetricKind;
  readonly value: number;
  readonly labels: readonly string[];
};

export interface MetricEmitter {
  emit(measurement: Measurement): void;
}

export function createMeasurement(
  descriptor: MetricDescriptor,
  value: number,
  labels: readonly string[]
): Measurement {
  if (labels.length !== descriptor.labelNames.length) {
    throw new Error(
      `${descriptor.name} expects ${descriptor.labelNames.length} labels, got ${labels.length}`
    );
  }
  return Object.freeze({
    descriptor,
    kind: descriptor.kind,
    value,
    labels: Object.freeze([...labels])
  });
}

/**
 * Holds measurements in memory until the caller decides to keep them.
 * One scan writes into its own buffer so a failed document leaves nothing
 * behind in the shared sink.
 */
export class MeasurementBuffer implements MetricEmitter {
  private readonly items: Measurement[] = [];

  emit(measurement: Measurement): void {
    this.items.push(measurement);
  }

  get size(): number {
    return this.items.length;
  }

  measurements(): Measurement[] {
    return [...this.items];
  }

  flushTo(target: MetricEmitter): void {
    for (const measurement of this.items) {
      target.emit(measurement);
    }
    this.items.length = 0;
  }
}
