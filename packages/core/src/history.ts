/**
 * Per-tab visited lists. A URL is recorded once per tab, at the position of
 * its first visit.
 */
export function recordVisit(visited: readonly string[], url: string): string[] {
  if (!url || visited.includes(url)) return [...visited];
  return [...visited, url];
}

export function recordVisits(visited: readonly string[], urls: readonly string[]): string[] {
  let next = [...visited];
  for (const url of urls) next = recordVisit(next, url);
  return next;
}

/** History menu order: most recently recorded first. */
export function historyMenuEntries(visited: readonly string[]): string[] {
  return [...visited].reverse();
}
