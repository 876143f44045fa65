const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Strict float parsing for status values. Returns null when the text is not a
 * number; `Number()` alone would accept "", " 1" and "0x10".
 */
export function parseFloat64(text: string): number | null {
  if (DECIMAL_RE.test(text)) {
    const value = Number(text);
    // out of range, e.g. "1e400"
    return Number.isFinite(value) ? value : null;
  }

  const special = SPECIAL_RE.exec(text);
  if (!special) {
    return null;
  }
  const [, sign, word] = special;
  if (word.toLowerCase() === 'nan') {
    return Number.NaN;
  }
  return sign === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}
