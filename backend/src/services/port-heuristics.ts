import {
  isValidPort,
  type ContainerMetadata,
  type DetectionMethod,
  type PortCandidate,
  type Protocol,
} from '../models/types.js';
import { parsePortKey } from '../worker/container-inspector.js';

/**
 * A pure port extractor over container metadata.
 * Each one returns the ports it can read from a single config field, deduplicated.
 */
export type PortExtractor = (container: ContainerMetadata) => PortCandidate[];

function candidates(
  container: ContainerMetadata,
  method: DetectionMethod,
  found: Array<{ port: number; protocol: Protocol }>,
): PortCandidate[] {
  const seen = new Set<string>();
  const result: PortCandidate[] = [];
  for (const { port, protocol } of found) {
    const key = `${protocol}/${port}`;
    if (!isValidPort(port) || seen.has(key)) continue;
    seen.add(key);
    result.push({
      port,
      protocol,
      source: 'container',
      detectionMethod: method,
      containerName: container.name,
      containerId: container.id.slice(0, 12),
      containerInternalPort: port,
      image: container.image,
    });
  }
  return result;
}

function tcp(ports: number[]): Array<{ port: number; protocol: Protocol }> {
  return ports.map((port) => ({ port, protocol: 'tcp' }));
}

// `:N` after a loopback or wildcard host, or after anything but another colon (`::1` is an address).
// A dot after the digits makes it a version tag such as `python:3.11`.
const HOST_PORT_PATTERN = /(?:localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1?\]|(?<!:)):(\d{1,5})(?![\d.])/g;

function hostPortMatches(text: string): number[] {
  return Array.from(text.matchAll(HOST_PORT_PATTERN), (m) => parseInt(m[1], 10));
}

export const fromExposedPorts: PortExtractor = (container) => {
  const found = container.exposedPorts
    .map((key) => parsePortKey(key))
    .filter((parsed): parsed is { port: number; protocol: Protocol } => parsed !== null);
  return candidates(container, 'exposed-ports-config', found);
};

const HEALTHCHECK_MARKERS = new Set(['CMD', 'CMD-SHELL']);

export const fromHealthcheck: PortExtractor = (container) => {
  const [marker, ...rest] = container.healthcheck;
  if (marker === undefined || marker === 'NONE') return [];
  const words = HEALTHCHECK_MARKERS.has(marker) ? rest : container.healthcheck;
  return candidates(container, 'healthcheck-parse', tcp(hostPortMatches(words.join(' '))));
};

const PORT_FLAGS = new Set(['--port', '-p', '--listen', '--bind']);

function portFromFlagValue(value: string): number | null {
  const match = value.match(/^(?:.*:)?(\d{1,5})$/);
  return match ? parseInt(match[1], 10) : null;
}

export const fromEntrypoint: PortExtractor = (container) => {
  const tokens = [...container.entrypoint, ...container.cmd]
    .flatMap((arg) => arg.split(/\s+/))
    .filter(Boolean);
  const ports: number[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const inline = token.match(/^(--port|-p|--listen|--bind)=(.+)$/);
    if (inline) {
      const port = portFromFlagValue(inline[2]);
      if (port !== null) ports.push(port);
      continue;
    }
    if (PORT_FLAGS.has(token) && i + 1 < tokens.length) {
      const port = portFromFlagValue(tokens[i + 1]);
      if (port !== null) {
        ports.push(port);
        i++;
        continue;
      }
    }
    ports.push(...hostPortMatches(token));
  }

  return candidates(container, 'entrypoint-parse', tcp(ports));
};

export const fromEnvironment: PortExtractor = (container) => {
  const ports: number[] = [];
  for (const entry of container.env) {
    const eq = entry.indexOf('=');
    if (eq <= 0) continue;
    const name = entry.slice(0, eq);
    const value = entry.slice(eq + 1).trim();
    if (!/port/i.test(name) || !/^\d{1,5}$/.test(value)) continue;
    ports.push(parseInt(value, 10));
  }
  return candidates(container, 'env-var-scan', tcp(ports));
};

/** Extractors in descending confidence */
export const PORT_EXTRACTORS: readonly PortExtractor[] = [
  fromExposedPorts,
  fromHealthcheck,
  fromEntrypoint,
  fromEnvironment,
];

export function isHostNetwork(container: ContainerMetadata): boolean {
  return container.networkMode === 'host';
}

/**
 * Infer listening ports of a host-network container.
 * Containers on other network modes publish their ports through explicit bindings and yield nothing here.
 */
export function inferContainerPorts(
  container: ContainerMetadata,
  extractors: readonly PortExtractor[] = PORT_EXTRACTORS,
): PortCandidate[] {
  if (!isHostNetwork(container)) return [];
  return extractors.flatMap((extract) => extract(container));
}
