/**
 * Code-point string ordering (locale independent, deterministic).
 */
export const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;
