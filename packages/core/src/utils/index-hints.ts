// Column-name fragments worth a single-field index after ingestion.
const INDEX_HINTS = [
  'ship', 'date', 'status', 'cost', 'charge', 'ref',
  'tracking', 'origin', 'destination', 'to', 'from'
] as const;

export function indexCandidates(columns: string[]): string[] {
  return columns.filter((c) => {
    const lc = c.toLowerCase();
    return INDEX_HINTS.some((h) => lc.includes(h));
  });
}
