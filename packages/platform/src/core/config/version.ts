/**
 * Server Versions
 *
 * Satellite versions are dotted numbers ("6.0", "6.1.2"). Missing trailing
 * segments count as zero, so "6.0" and "6.0.0" are equal.
 */

function segments(version: string): number[] {
  return version
    .trim()
    .split(".")
    .map((part) => {
      const value = Number.parseInt(part, 10);
      return Number.isNaN(value) ? 0 : value;
    });
}

/** Returns a negative number, zero or a positive number, like a sort comparator. */
export function compareVersions(a: string, b: string): number {
  const left = segments(a);
  const right = segments(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}
