import { projectColumns } from '../columns.js';
import { DedupTracker } from '../dedup.js';
import { createMeasurement } from '../emitter.js';
import type { SectionSpec } from '../specs.js';
import { parseIsoDateTime } from '../time.js';
import { emitConnectedClients, emitSectionRow, type ScanContext, type StatusParser } from './types.js';

type Section = 'CLIENT_LIST' | 'ROUTING_TABLE' | 'GLOBAL_STATS';

const SECTION_TITLES: ReadonlyMap<string, Section> = new Map([
  ['OpenVPN CLIENT LIST', 'CLIENT_LIST'],
  ['ROUTING TABLE', 'ROUTING_TABLE'],
  ['GLOBAL STATS', 'GLOBAL_STATS']
]);

/**
 * Server status files in the titled-section layout (`OpenVPN CLIENT LIST`,
 * `ROUTING TABLE`, `GLOBAL STATS`, `END`). Table headers are ordinary rows
 * recognised by their first column.
 *
 * Rows that arrive before their header are counted but yield no metrics.
 */
export class ServerV4StatusParser implements StatusParser {
  parse(lines: Iterable<string>, context: ScanContext): void {
    const headers = new Map<Section, string[]>();
    const dedup = new DedupTracker();
    let currentSection: Section | null = null;
    let connectedClients = 0;

    const emitRow = (section: Section, spec: SectionSpec | undefined, fields: string[]) => {
      if (!spec) {
        return;
      }
      const header = headers.get(section) ?? [];
      emitSectionRow(context, dedup, spec, projectColumns(header, fields, spec.labelColumns));
    };

    for (const line of lines) {
      if (line.length === 0) {
        continue;
      }

      if (!line.includes(',')) {
        if (line === 'END') {
          break;
        }
        const title = SECTION_TITLES.get(line);
        if (title) {
          currentSection = title;
          continue;
        }
      }

      const fields = line.split(',');

      if (currentSection === 'CLIENT_LIST') {
        if (line.startsWith('Updated,')) {
          const updatedAt = parseIsoDateTime(fields[1]);
          context.emitter.emit(
            createMeasurement(context.specs.statusUpdateTime, updatedAt, [context.source])
          );
        } else if (line.startsWith('Common Name,')) {
          headers.set('CLIENT_LIST', fields);
        } else {
          connectedClients += 1;
          emitRow('CLIENT_LIST', context.specs.sections.get('CLIENT_LIST'), fields);
        }
      } else if (currentSection === 'ROUTING_TABLE') {
        if (line.startsWith('Virtual Address,')) {
          headers.set('ROUTING_TABLE', fields);
        } else {
          emitRow('ROUTING_TABLE', context.specs.sections.get('ROUTING_TABLE'), fields);
        }
      }
    }

    emitConnectedClients(context, connectedClients);
  }
}
