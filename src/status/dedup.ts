import type { MetricFieldSpec } from './specs.js';

function containsRun(haystack: readonly string[], needle: readonly string[]): boolean {
  if (needle.length === 0) {
    return true;
  }
  const lastStart = haystack.length - needle.length;
  for (let start = 0; start <= lastStart; start += 1) {
    let offset = 0;
    while (offset < needle.length && haystack[start + offset] === needle[offset]) {
      offset += 1;
    }
    if (offset === needle.length) {
      return true;
    }
  }
  return false;
}

/**
 * Remembers which label tuples were already emitted for each metric field
 * during one document scan.
 *
 * History is the flat concatenation of admitted tuples and a candidate is
 * rejected when it appears as a contiguous run anywhere inside it, including
 * across the boundary of two earlier tuples. That can reject a tuple never
 * seen before; see DESIGN.md.
 */
export class DedupTracker {
  private readonly history = new Map<MetricFieldSpec, string[]>();

  admit(field: MetricFieldSpec, labels: readonly string[]): boolean {
    const seen = this.history.get(field);
    if (!seen) {
      this.history.set(field, [...labels]);
      return true;
    }
    if (containsRun(seen, labels)) {
      return false;
    }
    seen.push(...labels);
    return true;
  }
}
