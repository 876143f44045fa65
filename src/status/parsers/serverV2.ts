import { projectColumns } from '../columns.js';
import { DedupTracker } from '../dedup.js';
import { createMeasurement } from '../emitter.js';
import {
  HeaderArityMismatchError,
  InvalidTimestampError,
  MissingHeaderError,
  UnsupportedRecordTypeError
} from '../errors.js';
import { parseFloat64 } from '../values.js';
import { emitConnectedClients, emitSectionRow, type ScanContext, type StatusParser } from './types.js';

/**
 * Server status files written with `--status-version 2` (comma separated)
 * or `3` (tab separated). Every line starts with a record tag and table
 * rows are described by an earlier `HEADER` line.
 */
export class ServerStatusParser implements StatusParser {
  constructor(readonly separator: ',' | '\t') {}

  parse(lines: Iterable<string>, context: ScanContext): void {
    const headers = new Map<string, string[]>();
    const dedup = new DedupTracker();
    let connectedClients = 0;

    for (const line of lines) {
      const fields = line.split(this.separator);
      const [tag] = fields;

      if (tag === 'END' && fields.length === 1) {
        continue;
      }
      if (tag === 'GLOBAL_STATS') {
        continue;
      }
      if (tag === 'HEADER' && fields.length > 2) {
        headers.set(fields[1], fields.slice(2));
        continue;
      }
      if (tag === 'TIME' && fields.length === 3) {
        const updatedAt = parseFloat64(fields[2]);
        if (updatedAt === null) {
          throw new InvalidTimestampError(fields[2]);
        }
        context.emitter.emit(
          createMeasurement(context.specs.statusUpdateTime, updatedAt, [context.source])
        );
        continue;
      }
      if (tag === 'TITLE' && fields.length === 2) {
        continue;
      }

      const section = context.specs.sections.get(tag);
      if (!section) {
        throw new UnsupportedRecordTypeError(tag);
      }

      if (tag === 'CLIENT_LIST') {
        connectedClients += 1;
      }
      const header = headers.get(tag);
      if (!header) {
        throw new MissingHeaderError(tag);
      }
      if (fields.length !== header.length + 1) {
        throw new HeaderArityMismatchError(tag);
      }

      emitSectionRow(
        context,
        dedup,
        section,
        projectColumns(header, fields.slice(1), section.labelColumns)
      );
    }

    emitConnectedClients(context, connectedClients);
  }
}
