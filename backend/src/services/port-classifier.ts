import {
  PORT_SPACE_SIZE,
  PROTOCOLS,
  isValidPort,
  type HiddenPortEntry,
  type PortLayout,
  type PortRange,
  type PortRecord,
  type PortState,
  type PortView,
  type Protocol,
  type StateCounts,
  type ViewEntry,
} from '../models/types.js';
import { InvalidPortError } from '../models/errors.js';
import { countHiddenPorts, normalizeEntries } from './hidden-port-store.js';

function range(
  protocol: Protocol,
  state: PortRange['state'],
  start: number,
  end: number,
): PortRange {
  return { kind: 'range', protocol, state, start, end, count: end - start + 1 };
}

/**
 * Split [start, end] into available and virtual-hidden segments.
 * `hidden` must be normalized and of the same protocol.
 */
export function splitByHidden(
  protocol: Protocol,
  start: number,
  end: number,
  hidden: HiddenPortEntry[],
): PortRange[] {
  const segments: PortRange[] = [];
  let cursor = start;

  for (const entry of hidden) {
    if (entry.end < cursor || entry.start > end) continue;
    const hiddenStart = Math.max(entry.start, cursor);
    const hiddenEnd = Math.min(entry.end, end);
    if (hiddenStart > cursor) segments.push(range(protocol, 'available', cursor, hiddenStart - 1));
    segments.push(range(protocol, 'virtual-hidden', hiddenStart, hiddenEnd));
    cursor = hiddenEnd + 1;
  }

  if (cursor <= end) segments.push(range(protocol, 'available', cursor, end));
  return segments;
}

/** Parts of [start, end] not equal to any of the sorted `points` */
function splitAround(start: number, end: number, points: number[]): Array<[number, number]> {
  const parts: Array<[number, number]> = [];
  let cursor = start;
  for (const point of points) {
    if (point < cursor || point > end) continue;
    if (point > cursor) parts.push([cursor, point - 1]);
    cursor = point + 1;
  }
  if (cursor <= end) parts.push([cursor, end]);
  return parts;
}

/**
 * Overlays one hidden-port snapshot onto one aggregation layout.
 * Both inputs are fixed at construction, so every answer comes from the same pair.
 */
export class PortClassifier {
  private usedByKey = new Map<string, PortRecord>();
  private hiddenByProtocol: Record<Protocol, HiddenPortEntry[]> = { tcp: [], udp: [] };

  constructor(
    private layout: PortLayout,
    hiddenEntries: HiddenPortEntry[],
  ) {
    for (const record of layout.used) {
      this.usedByKey.set(`${record.protocol}/${record.port}`, record);
    }
    for (const entry of normalizeEntries(hiddenEntries)) {
      this.hiddenByProtocol[entry.protocol].push(entry);
    }
  }

  isHidden(port: number, protocol: Protocol): boolean {
    return this.hiddenByProtocol[protocol].some((entry) => port >= entry.start && port <= entry.end);
  }

  /** State of any port, including ports outside the used span */
  stateOf(port: number, protocol: Protocol): PortState {
    if (!isValidPort(port)) {
      throw new InvalidPortError([{ index: null, value: port, reason: 'must be between 1 and 65535' }]);
    }
    const used = this.usedByKey.has(`${protocol}/${port}`);
    const hidden = this.isHidden(port, protocol);
    if (used) return hidden ? 'hidden' : 'used';
    return hidden ? 'virtual-hidden' : 'available';
  }

  view(): PortView {
    const entries: ViewEntry[] = [];
    const hidden: PortRecord[] = [];

    for (const entry of this.layout.entries) {
      if (entry.kind === 'port') {
        const { record } = entry;
        if (this.isHidden(record.port, record.protocol)) {
          hidden.push({ ...record, state: 'hidden' });
        } else {
          entries.push({ kind: 'port', record: { ...record, state: 'used' } });
        }
      } else {
        const { gap } = entry;
        entries.push(...splitByHidden(gap.protocol, gap.start, gap.end, this.hiddenByProtocol[gap.protocol]));
      }
    }

    return { entries, hidden, virtualHidden: this.virtualHiddenRanges() };
  }

  /** Hidden ranges minus the ports actually in use, across the whole port space */
  virtualHiddenRanges(): PortRange[] {
    return PROTOCOLS.flatMap((protocol) => {
      const usedPorts = this.layout.used
        .filter((record) => record.protocol === protocol)
        .map((record) => record.port);
      return this.hiddenByProtocol[protocol].flatMap((entry) =>
        splitAround(entry.start, entry.end, usedPorts).map(([start, end]) =>
          range(protocol, 'virtual-hidden', start, end),
        ),
      );
    });
  }

  /** Partition of the full port space for one protocol; the counts sum to 65535 */
  countByState(protocol: Protocol): StateCounts {
    let used = 0;
    let hiddenUsed = 0;
    for (const record of this.layout.used) {
      if (record.protocol !== protocol) continue;
      if (this.isHidden(record.port, protocol)) hiddenUsed++;
      else used++;
    }
    const virtualHidden = countHiddenPorts(this.hiddenByProtocol[protocol]) - hiddenUsed;

    return {
      used,
      hidden: hiddenUsed,
      'virtual-hidden': virtualHidden,
      available: PORT_SPACE_SIZE - used - hiddenUsed - virtualHidden,
    };
  }
}
