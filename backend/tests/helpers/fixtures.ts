import type { ContainerMetadata, ListeningSocket } from '../../src/models/types.js';
import type { ContainerPortSource } from '../../src/worker/container-inspector.js';
import type { SystemPortSource } from '../../src/worker/port-scanner.js';

export function makeContainer(overrides: Partial<ContainerMetadata> = {}): ContainerMetadata {
  return {
    id: '0123456789abcdef0123456789abcdef',
    name: 'web',
    image: 'nginx:latest',
    networkMode: 'bridge',
    bindings: [],
    exposedPorts: [],
    healthcheck: [],
    entrypoint: [],
    cmd: [],
    env: [],
    ...overrides,
  };
}

export function makeSocket(port: number, overrides: Partial<ListeningSocket> = {}): ListeningSocket {
  return {
    port,
    protocol: 'tcp',
    address: `0.0.0.0:${port}`,
    processName: null,
    pid: null,
    ...overrides,
  };
}

export class FakeContainerSource implements ContainerPortSource {
  calls = 0;

  constructor(private result: ContainerMetadata[] | Error | 'hang') {}

  async listContainers(): Promise<ContainerMetadata[]> {
    this.calls++;
    if (this.result === 'hang') return new Promise<ContainerMetadata[]>(() => {});
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export class FakeSystemSource implements SystemPortSource {
  calls = 0;

  constructor(private result: ListeningSocket[] | Error | 'hang') {}

  async scan(): Promise<ListeningSocket[]> {
    this.calls++;
    if (this.result === 'hang') return new Promise<ListeningSocket[]>(() => {});
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}
