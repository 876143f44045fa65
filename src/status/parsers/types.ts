import type { Logger } from 'pino';
import { buildLabelTuple, type ColumnValues } from '../columns.js';
import type { DedupTracker } from '../dedup.js';
import { createMeasurement, type MetricEmitter } from '../emitter.js';
import { InvalidNumericValueError } from '../errors.js';
import type { SectionSpec, StatusSpecs } from '../specs.js';
import { parseFloat64 } from '../values.js';

export type ScanContext = {
  /** Identifies the status source; becomes the first label of every measurement. */
  source: string;
  specs: StatusSpecs;
  emitter: MetricEmitter;
  log: Pick<Logger, 'debug'>;
};

/**
 * One grammar of status document. Implementations keep no state between
 * calls; headers and dedup history live for a single `parse`.
 */
export interface StatusParser {
  parse(lines: Iterable<string>, context: ScanContext): void;
}

/**
 * Splits a document into lines the way a line scanner does: `\n` separated,
 * a trailing `\r` dropped, and no empty line produced by a final newline.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function emitConnectedClients(context: ScanContext, count: number) {
  context.emitter.emit(createMeasurement(context.specs.connectedClients, count, [context.source]));
}

/**
 * Emits every metric field of `section` found in `columns`, skipping label
 * tuples the tracker has already seen for that field.
 */
export function emitSectionRow(
  context: ScanContext,
  dedup: DedupTracker,
  section: SectionSpec,
  columns: ColumnValues
) {
  const labels = buildLabelTuple(context.source, columns, section.labelColumns);

  for (const field of section.metrics) {
    const raw = columns.get(field.column);
    if (raw === undefined) {
      context.log.debug({ column: field.column }, 'Metric column not present in header');
      continue;
    }
    if (!dedup.admit(field, labels)) {
      context.log.debug(
        { column: field.column, labels },
        'Metric entry with same labels already emitted'
      );
      continue;
    }
    const value = parseFloat64(raw);
    if (value === null) {
      throw new InvalidNumericValueError(raw, field.column);
    }
    context.emitter.emit(createMeasurement(field.descriptor, value, labels));
  }
}
