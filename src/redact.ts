import type { HeaderPair } from './types';

export const REDACTED_VALUE = '[REDACTED]';

/**
 * Replaces the value of every header whose name is listed in `names`
 * (lowercase). Order and original name casing are kept.
 */
export function redactHeaders(headers: readonly HeaderPair[], names: readonly string[]): HeaderPair[] {
  if (names.length === 0) {
    return [...headers];
  }

  return headers.map((header) =>
    names.includes(header.name.toLowerCase())
      ? { name: header.name, value: REDACTED_VALUE }
      : header
  );
}
