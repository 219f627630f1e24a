import {
  isValidPort,
  type ContainerMetadata,
  type PortBinding,
  type PortCandidate,
  type Protocol,
} from '../models/types.js';
import { RuntimeUnavailableError } from '../models/errors.js';
import { logger } from '../services/logger.js';
import { CommandError, runCommand } from './run-command.js';

export interface ContainerPortSource {
  listContainers(): Promise<ContainerMetadata[]>;
}

export interface ContainerInspectorOptions {
  /** CLI of the container runtime, `docker` or `podman` */
  runtime?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

export class ContainerInspector implements ContainerPortSource {
  private runtime: string;
  private timeoutMs: number;

  constructor(options: ContainerInspectorOptions = {}) {
    this.runtime = options.runtime ?? 'docker';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getRuntime(): string {
    return this.runtime;
  }

  /**
   * List running containers with their bindings and the config fields port heuristics need.
   */
  async listContainers(): Promise<ContainerMetadata[]> {
    let ids: string[];
    try {
      const { stdout } = await runCommand(this.runtime, ['ps', '-q', '--no-trunc'], this.timeoutMs);
      ids = stdout.split('\n').map((id) => id.trim()).filter(Boolean);
    } catch (err) {
      throw this.unavailable(err);
    }

    if (ids.length === 0) return [];

    const parsed = await this.inspect(ids);
    const containers = parseInspectOutput(parsed);
    logger.debug({ runtime: this.runtime, count: containers.length }, 'inspected running containers');
    return containers;
  }

  /**
   * Inspect the listed ids. A container that stops after `ps` makes inspect exit non-zero,
   * but the others are still printed; that partial array is used.
   */
  private async inspect(ids: string[]): Promise<unknown[]> {
    let stdout: string;
    try {
      ({ stdout } = await runCommand(this.runtime, ['inspect', ...ids], this.timeoutMs));
    } catch (err) {
      if (err instanceof CommandError && err.reason === 'exit') {
        const partial = parseJsonArray(err.stdout);
        if (partial) {
          logger.warn({ runtime: this.runtime, stderr: err.stderr.trim() }, 'some containers could not be inspected');
          return partial;
        }
      }
      throw this.unavailable(err);
    }

    try {
      const parsed: unknown = JSON.parse(stdout);
      if (!Array.isArray(parsed)) throw new Error('inspect output is not a JSON array');
      return parsed;
    } catch (err) {
      throw this.unavailable(err);
    }
  }

  private unavailable(err: unknown): RuntimeUnavailableError {
    const message = err instanceof Error ? err.message : String(err);
    return new RuntimeUnavailableError(`Container runtime unavailable (${this.runtime}): ${message}`, { cause: err });
  }
}

// --- inspect JSON mapping ---

function parseJsonArray(text: string): unknown[] | null {
  if (!text.trim()) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

// Entrypoint and Cmd may be an array, a single shell string or null
function asStringList(value: unknown): string[] {
  if (typeof value === 'string') return value ? [value] : [];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/** Split a port key such as `80/tcp` into its number and protocol */
export function parsePortKey(key: string): { port: number; protocol: Protocol } | null {
  const match = key.trim().match(/^(\d+)(?:\/(tcp|udp))?$/i);
  if (!match) return null;
  const port = parseInt(match[1], 10);
  if (!isValidPort(port)) return null;
  return { port, protocol: match[2]?.toLowerCase() === 'udp' ? 'udp' : 'tcp' };
}

function parseBindings(ports: unknown): PortBinding[] {
  if (!isRecord(ports)) return [];
  const bindings: PortBinding[] = [];

  for (const [key, hostBindings] of Object.entries(ports)) {
    const containerSide = parsePortKey(key);
    if (!containerSide || !Array.isArray(hostBindings)) continue;

    for (const binding of hostBindings) {
      const hostPort = parseInt(asString(field(binding, 'HostPort')), 10);
      if (!isValidPort(hostPort)) continue;
      bindings.push({
        hostIp: asString(field(binding, 'HostIp')),
        hostPort,
        containerPort: containerSide.port,
        protocol: containerSide.protocol,
      });
    }
  }

  return bindings;
}

/**
 * Map `docker inspect` / `podman inspect` output to container metadata.
 * Missing or malformed fields become empty values.
 */
export function parseInspectOutput(json: unknown): ContainerMetadata[] {
  if (!Array.isArray(json)) return [];

  return json.filter(isRecord).map((raw) => {
    const config = field(raw, 'Config');
    const exposed = field(config, 'ExposedPorts');
    const id = asString(raw.Id);

    return {
      id,
      name: asString(raw.Name).replace(/^\//, '') || id.slice(0, 12),
      image: asString(field(config, 'Image')),
      networkMode: asString(field(field(raw, 'HostConfig'), 'NetworkMode')),
      bindings: parseBindings(field(field(raw, 'NetworkSettings'), 'Ports')),
      exposedPorts: isRecord(exposed) ? Object.keys(exposed) : [],
      healthcheck: asStringList(field(field(config, 'Healthcheck'), 'Test')),
      entrypoint: asStringList(field(config, 'Entrypoint')),
      cmd: asStringList(field(config, 'Cmd')),
      env: asStringList(field(config, 'Env')),
    };
  });
}

/**
 * One explicit-binding candidate per distinct host port and protocol.
 * IPv4 and IPv6 bindings of the same port collapse to one.
 */
export function explicitBindings(container: ContainerMetadata): PortCandidate[] {
  const seen = new Set<string>();
  const candidates: PortCandidate[] = [];

  for (const binding of container.bindings) {
    const key = `${binding.protocol}/${binding.hostPort}`;
    if (seen.has(key)) continue;
    seen.add(key);
    candidates.push({
      port: binding.hostPort,
      protocol: binding.protocol,
      source: 'container',
      detectionMethod: 'explicit-binding',
      containerName: container.name,
      containerId: container.id.slice(0, 12),
      containerInternalPort: binding.containerPort,
      image: container.image,
    });
  }

  return candidates;
}
