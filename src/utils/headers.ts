/**
 * Lowercase all header keys for consistent access. Multi-value headers are
 * joined with ", " and missing values dropped.
 */
export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

/**
 * Merge header sets left to right; later keys win regardless of case.
 */
export function mergeHeaders(
  ...sets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const set of sets) {
    if (!set) continue;
    Object.assign(result, normalizeHeaders(set));
  }
  return result;
}
