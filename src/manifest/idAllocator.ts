/**
 * Smallest non-negative integer, as a decimal string, that is not already an ID.
 * IDs freed by a deletion are handed out again.
 */
export function nextId(existingIds: Iterable<string>): string {
  const taken = new Set(existingIds);
  let candidate = 0;
  while (taken.has(String(candidate))) {
    candidate++;
  }
  return String(candidate);
}
