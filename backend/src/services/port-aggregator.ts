import {
  CONFIDENCE,
  PROTOCOLS,
  type GapRange,
  type LayoutEntry,
  type ListeningSocket,
  type PortCandidate,
  type PortLayout,
  type PortRecord,
  type Protocol,
} from '../models/types.js';

export function systemCandidates(sockets: ListeningSocket[]): PortCandidate[] {
  return sockets.map((socket): PortCandidate => ({
    port: socket.port,
    protocol: socket.protocol,
    source: 'system',
    detectionMethod: 'system-scan',
    ...(socket.processName !== null ? { processName: socket.processName } : {}),
    ...(socket.pid !== null ? { pid: socket.pid } : {}),
  }));
}

function protocolOrder(a: Protocol, b: Protocol): number {
  return PROTOCOLS.indexOf(a) - PROTOCOLS.indexOf(b);
}

/**
 * Rank two candidates for the same port and protocol; negative when `a` wins.
 * Confidence first, then container over system, then names so the winner never depends on input order.
 */
export function compareCandidates(a: PortCandidate, b: PortCandidate): number {
  const byConfidence = CONFIDENCE[b.detectionMethod] - CONFIDENCE[a.detectionMethod];
  if (byConfidence !== 0) return byConfidence;
  if (a.source !== b.source) return a.source === 'container' ? -1 : 1;
  return (
    compareOptional(a.containerName, b.containerName) ||
    compareOptional(a.processName, b.processName)
  );
}

// Absent names sort last
function compareOptional(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}

/**
 * Collapse candidates to one record per (port, protocol), sorted by port then protocol.
 */
export function mergeCandidates(
  candidates: PortCandidate[],
  resolveServiceName: (candidate: PortCandidate) => string | null = () => null,
): PortRecord[] {
  const winners = new Map<string, PortCandidate>();

  for (const candidate of candidates) {
    const key = `${candidate.protocol}/${candidate.port}`;
    const current = winners.get(key);
    if (!current || compareCandidates(candidate, current) < 0) {
      winners.set(key, candidate);
    }
  }

  return Array.from(winners.values())
    .sort((a, b) => a.port - b.port || protocolOrder(a.protocol, b.protocol))
    .map((winner): PortRecord => ({
      ...winner,
      state: 'used',
      confidence: CONFIDENCE[winner.detectionMethod],
      serviceName: resolveServiceName(winner),
    }));
}

/**
 * Maximal runs of unused ports strictly between the lowest and highest used port.
 * Ports below the first or above the last used port are never materialized.
 */
export function computeGaps(usedPorts: number[], protocol: Protocol): GapRange[] {
  const sorted = Array.from(new Set(usedPorts)).sort((a, b) => a - b);
  const gaps: GapRange[] = [];

  for (let i = 1; i < sorted.length; i++) {
    const start = sorted[i - 1] + 1;
    const end = sorted[i] - 1;
    if (end >= start) {
      gaps.push({ protocol, start, end, count: end - start + 1 });
    }
  }

  return gaps;
}

function entryStart(entry: LayoutEntry): number {
  return entry.kind === 'port' ? entry.record.port : entry.gap.start;
}

function entryProtocol(entry: LayoutEntry): Protocol {
  return entry.kind === 'port' ? entry.record.protocol : entry.gap.protocol;
}

export function compareLayoutEntries(a: LayoutEntry, b: LayoutEntry): number {
  return (
    entryStart(a) - entryStart(b) ||
    protocolOrder(entryProtocol(a), entryProtocol(b)) ||
    (a.kind === b.kind ? 0 : a.kind === 'port' ? -1 : 1)
  );
}

/**
 * Merge, sort and compute gaps for one aggregation pass.
 */
export function aggregate(
  candidates: PortCandidate[],
  resolveServiceName?: (candidate: PortCandidate) => string | null,
): PortLayout {
  const used = mergeCandidates(candidates, resolveServiceName);

  const gaps = PROTOCOLS.flatMap((protocol) =>
    computeGaps(
      used.filter((record) => record.protocol === protocol).map((record) => record.port),
      protocol,
    ),
  );

  const entries: LayoutEntry[] = [
    ...used.map((record): LayoutEntry => ({ kind: 'port', record })),
    ...gaps.map((gap): LayoutEntry => ({ kind: 'gap', gap })),
  ].sort(compareLayoutEntries);

  return { used, gaps, entries };
}
