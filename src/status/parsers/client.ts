import { createMeasurement } from '../emitter.js';
import { InvalidNumericValueError, UnsupportedRecordTypeError } from '../errors.js';
import { parseWeekdayDateTime } from '../time.js';
import { parseFloat64 } from '../values.js';
import type { ScanContext, StatusParser } from './types.js';

/**
 * Client statistics: one `name,value` pair per line between the
 * `OpenVPN STATISTICS` banner and `END`.
 */
export class ClientStatusParser implements StatusParser {
  parse(lines: Iterable<string>, context: ScanContext): void {
    const { emitter, specs, source } = context;

    for (const line of lines) {
      const fields = line.split(',');
      const [key] = fields;

      if (key === 'END' && fields.length === 1) {
        continue;
      }
      if (key === 'OpenVPN STATISTICS' && fields.length === 1) {
        continue;
      }
      if (key === 'Updated' && fields.length === 2) {
        const updatedAt = parseWeekdayDateTime(fields[1]);
        emitter.emit(createMeasurement(specs.statusUpdateTime, updatedAt, [source]));
        continue;
      }

      const descriptor = specs.clientCounters.get(key);
      if (descriptor && fields.length === 2) {
        const value = parseFloat64(fields[1]);
        if (value === null) {
          throw new InvalidNumericValueError(fields[1], key);
        }
        emitter.emit(createMeasurement(descriptor, value, [source]));
        continue;
      }

      throw new UnsupportedRecordTypeError(key);
    }
  }
}
