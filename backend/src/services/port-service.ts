import {
  PORT_SPACE_SIZE,
  type ContainerMetadata,
  type ListeningSocket,
  type PortCandidate,
  type PortScan,
  type SourceWarning,
} from '../models/types.js';
import { RuntimeUnavailableError, ScanUnavailableError } from '../models/errors.js';
import { explicitBindings, type ContainerPortSource } from '../worker/container-inspector.js';
import type { SystemPortSource } from '../worker/port-scanner.js';
import type { HiddenPortStore } from './hidden-port-store.js';
import type { ServiceNameRegistry, ServiceNameResolver } from './service-names.js';
import { aggregate, systemCandidates } from './port-aggregator.js';
import { inferContainerPorts } from './port-heuristics.js';
import { PortClassifier } from './port-classifier.js';
import { createScanLogger } from './logger.js';

export interface PortServiceOptions {
  containers: ContainerPortSource;
  system: SystemPortSource;
  hiddenPorts: HiddenPortStore;
  serviceNames?: ServiceNameRegistry;
  sourceTimeoutMs?: number;
}

const DEFAULT_SOURCE_TIMEOUT_MS = 5000;

/** Reject with `onTimeout()` unless `promise` settles within `ms` */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

export function containerCandidates(containers: ContainerMetadata[]): PortCandidate[] {
  return containers.flatMap((container) => [...explicitBindings(container), ...inferContainerPorts(container)]);
}

/**
 * Runs one aggregation pass per request: both sources in parallel, then the
 * hidden-port overlay. Nothing is cached between passes.
 */
export class PortService {
  private sourceTimeoutMs: number;

  constructor(private options: PortServiceOptions) {
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
  }

  async scan(): Promise<PortScan> {
    const log = createScanLogger();
    const ms = this.sourceTimeoutMs;

    const [containerResult, systemResult] = await Promise.allSettled([
      withTimeout<ContainerMetadata[]>(
        this.options.containers.listContainers(),
        ms,
        () => new RuntimeUnavailableError(`Container runtime did not answer within ${ms}ms`),
      ),
      withTimeout<ListeningSocket[]>(
        this.options.system.scan(),
        ms,
        () => new ScanUnavailableError(`Socket scan did not finish within ${ms}ms`),
      ),
    ]);

    const warnings: SourceWarning[] = [];
    const candidates: PortCandidate[] = [];

    if (containerResult.status === 'fulfilled') {
      candidates.push(...containerCandidates(containerResult.value));
      log.debug({ containers: containerResult.value.length }, 'container source answered');
    } else {
      warnings.push({ source: 'container', error: 'RuntimeUnavailable', message: errorMessage(containerResult.reason) });
      log.warn({ err: containerResult.reason }, 'container source unavailable, continuing with system data');
    }

    if (systemResult.status === 'fulfilled') {
      candidates.push(...systemCandidates(systemResult.value));
      log.debug({ sockets: systemResult.value.length }, 'system source answered');
    } else {
      warnings.push({ source: 'system', error: 'ScanUnavailable', message: errorMessage(systemResult.reason) });
      log.warn({ err: systemResult.reason }, 'system source unavailable, continuing with container data');
    }

    const noNames: ServiceNameResolver = () => null;
    const [hidden, resolveName] = await Promise.all([
      this.options.hiddenPorts.list(),
      this.options.serviceNames ? this.options.serviceNames.resolver() : Promise.resolve(noNames),
    ]);

    const layout = aggregate(candidates, resolveName);
    const classifier = new PortClassifier(layout, hidden);
    const view = classifier.view();

    const usedPortNumbers = new Set(layout.used.map((record) => record.port)).size;
    const containerNames = new Set(
      layout.used.flatMap((record) => (record.source === 'container' && record.containerName ? [record.containerName] : [])),
    );

    const scan: PortScan = {
      ...view,
      summary: {
        totalUsed: usedPortNumbers,
        totalAvailable: PORT_SPACE_SIZE - usedPortNumbers,
        dockerContainers: containerNames.size,
        byProtocol: {
          tcp: classifier.countByState('tcp'),
          udp: classifier.countByState('udp'),
        },
      },
      degraded: warnings.length > 0,
      warnings,
      scannedAt: new Date().toISOString(),
    };

    log.info(
      { used: layout.used.length, gaps: layout.gaps.length, hidden: view.hidden.length, degraded: scan.degraded },
      'port scan complete',
    );
    return scan;
  }
}
