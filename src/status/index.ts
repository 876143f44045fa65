import fs from 'node:fs';
import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import { detectDialect, type StatusDialect } from './detect.js';
import { MeasurementBuffer, type MetricEmitter } from './emitter.js';
import { ClientStatusParser } from './parsers/client.js';
import { ServerStatusParser } from './parsers/serverV2.js';
import { ServerV4StatusParser } from './parsers/serverV4.js';
import { splitLines, type StatusParser } from './parsers/types.js';
import type { StatusSpecs } from './specs.js';

export type CollectStatusOptions = {
  specs: StatusSpecs;
  emitter: MetricEmitter;
  logger?: Pick<Logger, 'debug'>;
};

export type StatusInput = AsyncIterable<Uint8Array | string>;

export function createStatusParser(dialect: StatusDialect): StatusParser {
  switch (dialect) {
    case 'server-v2':
      return new ServerStatusParser(',');
    case 'server-v3':
      return new ServerStatusParser('\t');
    case 'server-v4':
      return new ServerV4StatusParser();
    case 'client':
      return new ClientStatusParser();
  }
}

/**
 * Decodes one complete status document and hands its measurements to
 * `options.emitter`. Nothing is emitted unless the whole document parses.
 */
export function collectStatusFromBuffer(
  source: string,
  document: Uint8Array,
  options: CollectStatusOptions
): StatusDialect {
  const dialect = detectDialect(document);
  const buffer = new MeasurementBuffer();

  createStatusParser(dialect).parse(splitLines(Buffer.from(document).toString('utf8')), {
    source,
    specs: options.specs,
    emitter: buffer,
    log: options.logger ?? defaultLogger
  });

  buffer.flushTo(options.emitter);
  return dialect;
}

export async function readStatusInput(input: StatusInput): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export async function collectStatusFromStream(
  source: string,
  input: StatusInput,
  options: CollectStatusOptions
): Promise<StatusDialect> {
  const document = await readStatusInput(input);
  return collectStatusFromBuffer(source, document, options);
}

export async function collectStatusFromFile(
  statusPath: string,
  options: CollectStatusOptions
): Promise<StatusDialect> {
  return collectStatusFromStream(statusPath, fs.createReadStream(statusPath), options);
}

export { detectDialect, DETECTION_PREFIX_LENGTH, type StatusDialect } from './detect.js';
export { MeasurementBuffer, createMeasurement, type Measurement, type MetricEmitter } from './emitter.js';
export * from './errors.js';
export {
  createStatusSpecs,
  type MetricDescriptor,
  type MetricFieldSpec,
  type MetricKind,
  type SectionSpec,
  type StatusSpecs,
  type StatusSpecsOptions
} from './specs.js';
