import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isValidPort, type PortCandidate } from '../models/types.js';
import { InvalidPortError, PersistenceError } from '../models/errors.js';
import { readJsonFile, SerialQueue, writeJsonFileAtomic, type JsonReadResult } from './json-file.js';
import { logger } from './logger.js';

const WELL_KNOWN_PORTS_FILE = fileURLToPath(new URL('../../data/well-known-ports.json', import.meta.url));

export type ServiceNameResolver = (candidate: PortCandidate) => string | null;

/** Keep `"<port>": "<name>"` pairs with a valid port and a non-empty name */
function toNameMap(value: unknown): Map<number, string> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const names = new Map<number, string>();
  for (const [key, name] of Object.entries(value)) {
    const port = Number(key);
    if (isValidPort(port) && typeof name === 'string' && name.trim()) {
      names.set(port, name.trim());
    }
  }
  return names;
}

export function loadWellKnownPorts(file = WELL_KNOWN_PORTS_FILE): Map<number, string> {
  try {
    return toNameMap(JSON.parse(fs.readFileSync(file, 'utf-8'))) ?? new Map();
  } catch (err) {
    logger.warn({ err, file }, 'well-known port table unavailable');
    return new Map();
  }
}

/**
 * Display names for ports: operator overrides from a JSON file, then the
 * container name for container-sourced ports, then the well-known table.
 */
export class ServiceNameRegistry {
  private queue = new SerialQueue();

  constructor(
    private file: string,
    private wellKnown: Map<number, string> = loadWellKnownPorts(),
  ) {}

  async overrides(): Promise<Map<number, string>> {
    let result: JsonReadResult;
    try {
      result = await readJsonFile(this.file);
    } catch (err) {
      throw new PersistenceError(`Failed to read service names from ${this.file}`, { cause: err });
    }
    if (!result.found) return new Map();
    const names = toNameMap(result.value);
    if (!names) throw new PersistenceError(`Service names file ${this.file} is malformed`);
    return names;
  }

  async resolver(): Promise<ServiceNameResolver> {
    const overrides = await this.overrides();
    return (candidate) =>
      overrides.get(candidate.port) ??
      (candidate.source === 'container' ? candidate.containerName : undefined) ??
      this.wellKnown.get(candidate.port) ??
      null;
  }

  async setName(port: number, name: string): Promise<Map<number, string>> {
    this.assertPort(port);
    return this.update((names) => names.set(port, name.trim()));
  }

  async removeName(port: number): Promise<Map<number, string>> {
    this.assertPort(port);
    return this.update((names) => names.delete(port));
  }

  private assertPort(port: unknown): void {
    if (!isValidPort(port)) {
      throw new InvalidPortError([{ index: null, value: port, reason: 'must be an integer between 1 and 65535' }]);
    }
  }

  private update(change: (names: Map<number, string>) => void): Promise<Map<number, string>> {
    return this.queue.run(async () => {
      const names = await this.overrides();
      change(names);
      const sorted = Array.from(names.entries()).sort(([a], [b]) => a - b);
      try {
        await writeJsonFileAtomic(this.file, Object.fromEntries(sorted.map(([port, name]) => [String(port), name])));
      } catch (err) {
        throw new PersistenceError(`Failed to write service names to ${this.file}`, { cause: err });
      }
      logger.info({ file: this.file, count: names.size }, 'service names updated');
      return new Map(sorted);
    });
  }
}
