import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type express from 'express';
import { createApp } from '../../src/server.js';
import { PortService } from '../../src/services/port-service.js';
import { HiddenPortStore } from '../../src/services/hidden-port-store.js';
import { ServiceNameRegistry } from '../../src/services/service-names.js';
import type { ContainerPortSource } from '../../src/worker/container-inspector.js';
import type { SystemPortSource } from '../../src/worker/port-scanner.js';
import { FakeContainerSource, FakeSystemSource } from './fixtures.js';

export interface TestApp {
  app: express.Express;
  configDir: string;
  hiddenPortsFile: string;
  cleanup(): void;
}

/**
 * Full app over fake port sources and a temporary config directory.
 * The well-known table only knows port 22.
 */
export function createTestApp(
  sources: { containers?: ContainerPortSource; system?: SystemPortSource } = {},
): TestApp {
  const configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockports-api-test-'));
  const hiddenPortsFile = path.join(configDir, 'hidden_ports.json');
  const hiddenPorts = new HiddenPortStore(hiddenPortsFile);
  const serviceNames = new ServiceNameRegistry(path.join(configDir, 'service-names.json'), new Map([[22, 'SSH']]));
  const portService = new PortService({
    containers: sources.containers ?? new FakeContainerSource([]),
    system: sources.system ?? new FakeSystemSource([]),
    hiddenPorts,
    serviceNames,
  });

  return {
    app: createApp({ portService, hiddenPorts, serviceNames }),
    configDir,
    hiddenPortsFile,
    cleanup: () => fs.rmSync(configDir, { recursive: true, force: true }),
  };
}
