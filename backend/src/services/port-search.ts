import type { Protocol, ViewEntry } from '../models/types.js';

const RANGE_KEYWORDS: Record<'available' | 'virtual-hidden', string[]> = {
  available: ['available', 'unused', 'free'],
  'virtual-hidden': ['hidden', 'virtual-hidden', 'blocked'],
};

function searchableText(entry: ViewEntry): string {
  if (entry.kind === 'range') {
    return [`${entry.start}-${entry.end}`, entry.protocol, ...RANGE_KEYWORDS[entry.state]].join(' ').toLowerCase();
  }
  const { record } = entry;
  return [
    String(record.port),
    record.protocol,
    record.containerName ?? '',
    record.serviceName ?? '',
    record.processName ?? '',
    record.image ?? '',
  ]
    .join(' ')
    .toLowerCase();
}

/**
 * Case-insensitive filter over a classified listing.
 * A numeric query also matches every range that contains that port.
 */
export function filterEntries(entries: ViewEntry[], query: string): ViewEntry[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return entries;
  const port = /^\d+$/.test(needle) ? parseInt(needle, 10) : null;

  return entries.filter((entry) => {
    if (port !== null && entry.kind === 'range' && port >= entry.start && port <= entry.end) {
      return true;
    }
    return searchableText(entry).includes(needle);
  });
}

export function filterByProtocol(entries: ViewEntry[], protocol: Protocol): ViewEntry[] {
  return entries.filter((entry) => (entry.kind === 'range' ? entry.protocol : entry.record.protocol) === protocol);
}
