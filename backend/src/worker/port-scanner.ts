import { isValidPort, type ListeningSocket, type Protocol } from '../models/types.js';
import { ScanUnavailableError } from '../models/errors.js';
import { logger } from '../services/logger.js';
import { CommandError, runCommand } from './run-command.js';

export interface SystemPortSource {
  scan(): Promise<ListeningSocket[]>;
}

export interface SystemPortScannerOptions {
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Lists listening TCP/UDP sockets on the host.
 * Prefers netstat (net-tools) and falls back to ss (iproute2) when netstat is not installed.
 */
export class SystemPortScanner implements SystemPortSource {
  private timeoutMs: number;

  constructor(options: SystemPortScannerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async scan(): Promise<ListeningSocket[]> {
    try {
      const { stdout } = await runCommand('netstat', ['-tulnp'], this.timeoutMs);
      return parseNetstatOutput(stdout);
    } catch (err) {
      if (!(err instanceof CommandError) || err.reason !== 'not-found') {
        throw toScanUnavailable(err);
      }
      logger.debug('netstat not installed, falling back to ss');
    }

    try {
      const { stdout } = await runCommand('ss', ['-tulnp'], this.timeoutMs);
      return parseSsOutput(stdout);
    } catch (err) {
      if (err instanceof CommandError && err.reason === 'not-found') {
        throw new ScanUnavailableError('Neither netstat nor ss is installed', { cause: err });
      }
      throw toScanUnavailable(err);
    }
  }
}

function toScanUnavailable(err: unknown): ScanUnavailableError {
  const message = err instanceof Error ? err.message : String(err);
  return new ScanUnavailableError(`Socket scan failed: ${message}`, { cause: err });
}

function normalizeProtocol(column: string): Protocol | null {
  const match = column.toLowerCase().match(/^(tcp|udp)6?$/);
  if (!match) return null;
  return match[1] === 'tcp' ? 'tcp' : 'udp';
}

/** Port of a local address such as 0.0.0.0:22, :::80, [::]:443 or 127.0.0.53%lo:53 */
export function portFromAddress(address: string): number | null {
  const idx = address.lastIndexOf(':');
  if (idx === -1) return null;
  const tail = address.slice(idx + 1);
  if (!/^\d+$/.test(tail)) return null;
  const port = parseInt(tail, 10);
  return isValidPort(port) ? port : null;
}

function collect(sockets: ListeningSocket[]): ListeningSocket[] {
  const byKey = new Map<string, ListeningSocket>();
  for (const socket of sockets) {
    const key = `${socket.protocol}/${socket.port}`;
    const existing = byKey.get(key);
    // Keep the first entry unless a later one knows the owning process
    if (!existing || (existing.processName === null && socket.processName !== null)) {
      byKey.set(key, socket);
    }
  }
  return Array.from(byKey.values()).sort(
    (a, b) => a.port - b.port || a.protocol.localeCompare(b.protocol),
  );
}

/**
 * Parse `netstat -tulnp` output.
 * The owner column reads `812/sshd: /usr/sbin` when visible and `-` when the caller lacks privileges.
 */
export function parseNetstatOutput(text: string): ListeningSocket[] {
  const sockets: ListeningSocket[] = [];

  for (const line of text.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 4) continue;

    const protocol = normalizeProtocol(parts[0]);
    if (!protocol) continue;

    const address = parts[3];
    const port = portFromAddress(address);
    if (port === null) continue;

    let rest = parts.slice(5);
    if (protocol === 'tcp') {
      if (rest[0] !== 'LISTEN') continue;
      rest = rest.slice(1);
    } else if (rest.length > 0 && /^[A-Z_]+$/.test(rest[0])) {
      rest = rest.slice(1);
    }

    let processName: string | null = null;
    let pid: number | null = null;
    const owner = rest.join(' ').match(/^(\d+)\/(\S+)/);
    if (owner) {
      pid = parseInt(owner[1], 10);
      processName = owner[2].replace(/:$/, '');
    }

    sockets.push({ port, protocol, address, processName, pid });
  }

  return collect(sockets);
}

/**
 * Parse `ss -tulnp` output.
 * The process column reads `users:(("sshd",pid=812,fd=3))` when visible.
 */
export function parseSsOutput(text: string): ListeningSocket[] {
  const sockets: ListeningSocket[] = [];

  for (const line of text.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 5) continue;

    const protocol = normalizeProtocol(parts[0]);
    if (!protocol) continue;
    if (protocol === 'tcp' && parts[1] !== 'LISTEN') continue;

    const address = parts[4];
    const port = portFromAddress(address);
    if (port === null) continue;

    let processName: string | null = null;
    let pid: number | null = null;
    const owner = parts.slice(6).join(' ').match(/users:\(\("([^"]+)",pid=(\d+)/);
    if (owner) {
      processName = owner[1];
      pid = parseInt(owner[2], 10);
    }

    sockets.push({ port, protocol, address, processName, pid });
  }

  return collect(sockets);
}
