import {
  PROTOCOLS,
  isProtocol,
  isValidPort,
  MAX_PORT,
  MIN_PORT,
  type HiddenPortEntry,
  type HiddenPortMutation,
  type HidePortTarget,
  type Protocol,
} from '../models/types.js';
import type { Logger } from 'pino';
import { InvalidPortError, PersistenceError, type InvalidPortInput } from '../models/errors.js';
import { readJsonFile, SerialQueue, writeJsonFileAtomic, type JsonReadResult } from './json-file.js';
import { createStoreLogger } from './logger.js';

const FILE_VERSION = 1;

// --- pure set operations ---

function byProtocolThenStart(a: HiddenPortEntry, b: HiddenPortEntry): number {
  return PROTOCOLS.indexOf(a.protocol) - PROTOCOLS.indexOf(b.protocol) || a.start - b.start;
}

/**
 * Coalesce overlapping and adjacent entries of the same protocol.
 * Output is sorted by protocol (tcp first) then start.
 */
export function normalizeEntries(entries: HiddenPortEntry[]): HiddenPortEntry[] {
  const sorted = entries.map((entry) => ({ ...entry })).sort(byProtocolThenStart);
  const result: HiddenPortEntry[] = [];

  for (const entry of sorted) {
    const last = result[result.length - 1];
    if (last && last.protocol === entry.protocol && entry.start <= last.end + 1) {
      last.end = Math.max(last.end, entry.end);
    } else {
      result.push(entry);
    }
  }

  return result;
}

/** Remove [start, end] of one protocol, splitting entries that straddle it */
export function subtractRange(
  entries: HiddenPortEntry[],
  protocol: Protocol,
  start: number,
  end: number,
): HiddenPortEntry[] {
  const result: HiddenPortEntry[] = [];
  for (const entry of entries) {
    if (entry.protocol !== protocol || entry.end < start || entry.start > end) {
      result.push(entry);
      continue;
    }
    if (entry.start < start) result.push({ protocol, start: entry.start, end: start - 1 });
    if (entry.end > end) result.push({ protocol, start: end + 1, end: entry.end });
  }
  return result;
}

export function countHiddenPorts(entries: HiddenPortEntry[]): number {
  return entries.reduce((sum, entry) => sum + (entry.end - entry.start + 1), 0);
}

function expandTarget(target: HidePortTarget): HiddenPortEntry[] {
  const protocols = target.protocol ? [target.protocol] : PROTOCOLS;
  return protocols.map((protocol) => ({ protocol, start: target.start, end: target.end }));
}

export function applyHide(entries: HiddenPortEntry[], targets: HidePortTarget[]): HiddenPortEntry[] {
  return normalizeEntries([...entries, ...targets.flatMap(expandTarget)]);
}

export function applyUnhide(entries: HiddenPortEntry[], targets: HidePortTarget[]): HiddenPortEntry[] {
  let result = entries;
  for (const removal of targets.flatMap(expandTarget)) {
    result = subtractRange(result, removal.protocol, removal.start, removal.end);
  }
  return normalizeEntries(result);
}

// --- input validation ---

export type HiddenPortInput =
  | number
  | { port?: unknown; start?: unknown; end?: unknown; protocol?: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function portProblem(value: unknown): string | null {
  if (typeof value !== 'number' || !Number.isInteger(value)) return 'must be an integer';
  if (!isValidPort(value)) return `must be between ${MIN_PORT} and ${MAX_PORT}`;
  return null;
}

function parseTarget(input: unknown, defaultProtocol: unknown): HidePortTarget | string {
  let start: unknown;
  let end: unknown;
  let protocol: unknown = defaultProtocol;

  if (isRecord(input)) {
    if (input.port !== undefined) {
      start = input.port;
      end = input.port;
    } else if (input.start !== undefined || input.end !== undefined) {
      start = input.start;
      end = input.end ?? input.start;
    } else {
      return 'must include port or start/end';
    }
    if (input.protocol !== undefined) protocol = input.protocol;
  } else {
    start = input;
    end = input;
  }

  const startProblem = portProblem(start);
  if (startProblem) return startProblem;
  const endProblem = portProblem(end);
  if (endProblem) return `end ${endProblem}`;
  if (!isValidPort(start) || !isValidPort(end)) return 'must be a port number';
  if (start > end) return 'start must not exceed end';

  if (protocol !== undefined && protocol !== null && !isProtocol(protocol)) {
    return 'protocol must be tcp or udp';
  }

  return isProtocol(protocol) ? { start, end, protocol } : { start, end };
}

/**
 * Validate every input; throws InvalidPortError naming each invalid one so nothing is applied.
 */
export function parseTargets(
  inputs: unknown[],
  defaultProtocol?: unknown,
  indexed = true,
): HidePortTarget[] {
  const targets: HidePortTarget[] = [];
  const invalid: InvalidPortInput[] = [];

  inputs.forEach((input, index) => {
    const parsed = parseTarget(input, defaultProtocol);
    if (typeof parsed === 'string') {
      invalid.push({ index: indexed ? index : null, value: input, reason: parsed });
    } else {
      targets.push(parsed);
    }
  });

  if (invalid.length > 0) throw new InvalidPortError(invalid);
  return targets;
}

// --- file format ---

function parseStoredEntry(value: unknown): HiddenPortEntry | null {
  if (!isRecord(value)) return null;
  const { protocol, start, end } = value;
  if (!isProtocol(protocol) || !isValidPort(start) || !isValidPort(end) || start > end) return null;
  return { protocol, start, end };
}

function decodeFile(value: unknown): HiddenPortEntry[] | null {
  // Legacy format: a bare array of port numbers hidden on every protocol
  if (Array.isArray(value)) {
    if (!value.every(isValidPort)) return null;
    return value.flatMap((port) => expandTarget({ start: port, end: port }));
  }

  if (!isRecord(value) || !Array.isArray(value.entries)) return null;
  const entries: HiddenPortEntry[] = [];
  for (const raw of value.entries) {
    const entry = parseStoredEntry(raw);
    if (!entry) return null;
    entries.push(entry);
  }
  return entries;
}

/**
 * Persistent set of hidden port ranges.
 *
 * The file is re-read on every access so external edits are picked up.
 * Mutations are serialized and each one is written with an atomic rename;
 * a failed write leaves the previous file in place.
 */
export class HiddenPortStore {
  private queue = new SerialQueue();
  private log: Logger;

  constructor(private file: string) {
    this.log = createStoreLogger(file);
  }

  get path(): string {
    return this.file;
  }

  async list(): Promise<HiddenPortEntry[]> {
    return this.load();
  }

  async hide(target: HiddenPortInput, protocol?: Protocol): Promise<HiddenPortMutation> {
    return this.mutate('hide', parseTargets([target], protocol, false));
  }

  async unhide(target: HiddenPortInput, protocol?: Protocol): Promise<HiddenPortMutation> {
    return this.mutate('unhide', parseTargets([target], protocol, false));
  }

  async hideBatch(targets: HiddenPortInput[], protocol?: Protocol): Promise<HiddenPortMutation> {
    return this.mutate('hide', parseTargets(targets, protocol));
  }

  async unhideBatch(targets: HiddenPortInput[], protocol?: Protocol): Promise<HiddenPortMutation> {
    return this.mutate('unhide', parseTargets(targets, protocol));
  }

  private mutate(op: 'hide' | 'unhide', targets: HidePortTarget[]): Promise<HiddenPortMutation> {
    return this.queue.run(async () => {
      const current = await this.load();
      const next = op === 'hide' ? applyHide(current, targets) : applyUnhide(current, targets);
      const changed = Math.abs(countHiddenPorts(next) - countHiddenPorts(current));

      if (changed > 0) {
        await this.persist(next);
      }

      this.log.info({ op, targets, changed }, `hidden ports ${op === 'hide' ? 'hidden' : 'unhidden'}`);
      return { entries: next, changed };
    });
  }

  private async load(): Promise<HiddenPortEntry[]> {
    let result: JsonReadResult;
    try {
      result = await readJsonFile(this.file);
    } catch (err) {
      throw new PersistenceError(`Failed to read hidden ports from ${this.file}`, { cause: err });
    }
    if (!result.found) return [];

    const entries = decodeFile(result.value);
    if (!entries) {
      throw new PersistenceError(`Hidden ports file ${this.file} is malformed`);
    }
    return normalizeEntries(entries);
  }

  private async persist(entries: HiddenPortEntry[]): Promise<void> {
    try {
      await writeJsonFileAtomic(this.file, { version: FILE_VERSION, entries });
    } catch (err) {
      this.log.error({ err }, 'failed to persist hidden ports');
      throw new PersistenceError(`Failed to write hidden ports to ${this.file}`, { cause: err });
    }
  }
}
