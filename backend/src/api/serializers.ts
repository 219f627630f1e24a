import type { HiddenPortEntry, PortRecord, PortScan, ViewEntry } from '../models/types.js';

export function serializeRecord(record: PortRecord) {
  return {
    kind: 'port' as const,
    port: record.port,
    protocol: record.protocol,
    state: record.state,
    source: record.source,
    container_name: record.containerName ?? null,
    container_id: record.containerId ?? null,
    container_internal_port: record.containerInternalPort ?? null,
    image: record.image ?? null,
    detection_method: record.detectionMethod,
    confidence: record.confidence,
    service_name: record.serviceName,
    process_name: record.processName ?? null,
    pid: record.pid ?? null,
  };
}

export function serializeEntry(entry: ViewEntry) {
  if (entry.kind === 'port') return serializeRecord(entry.record);
  return {
    kind: 'range' as const,
    protocol: entry.protocol,
    state: entry.state,
    source: 'none' as const,
    start: entry.start,
    end: entry.end,
    count: entry.count,
  };
}

export function serializeHiddenEntries(entries: HiddenPortEntry[]) {
  return entries.map((entry) => ({
    protocol: entry.protocol,
    start: entry.start,
    end: entry.end,
    count: entry.end - entry.start + 1,
  }));
}

export function serializeScan(scan: PortScan, entries: ViewEntry[] = scan.entries) {
  const { summary } = scan;
  return {
    entries: entries.map(serializeEntry),
    hidden: scan.hidden.map(serializeRecord),
    virtual_hidden: scan.virtualHidden.map(serializeEntry),
    total_used: summary.totalUsed,
    total_available: summary.totalAvailable,
    docker_containers: summary.dockerContainers,
    by_protocol: {
      tcp: summary.byProtocol.tcp,
      udp: summary.byProtocol.udp,
    },
    degraded: scan.degraded,
    warnings: scan.warnings,
    scanned_at: scan.scannedAt,
  };
}
