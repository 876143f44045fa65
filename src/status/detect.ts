import { UnrecognizedFormatError } from './errors.js';

export type StatusDialect = 'server-v2' | 'server-v3' | 'server-v4' | 'client';

/** Bytes inspected by {@link detectDialect}. */
export const DETECTION_PREFIX_LENGTH = 18;

const PREFIXES: ReadonlyArray<[prefix: string, dialect: StatusDialect]> = [
  ['TITLE,', 'server-v2'],
  ['TITLE\t', 'server-v3'],
  ['OpenVPN STATISTICS', 'client'],
  ['OpenVPN CLIENT LIS', 'server-v4']
];

export function detectDialect(head: Uint8Array | string): StatusDialect {
  const text =
    typeof head === 'string'
      ? head.slice(0, DETECTION_PREFIX_LENGTH)
      : Buffer.from(head.subarray(0, DETECTION_PREFIX_LENGTH)).toString('latin1');

  for (const [prefix, dialect] of PREFIXES) {
    if (text.startsWith(prefix)) {
      return dialect;
    }
  }
  throw new UnrecognizedFormatError(text);
}
