import express from 'express';
import http from 'node:http';
import { resolveConfig, hiddenPortsFile, serviceNamesFile, type AppConfig } from './config.js';
import { ContainerInspector } from './worker/container-inspector.js';
import { SystemPortScanner } from './worker/port-scanner.js';
import { HiddenPortStore } from './services/hidden-port-store.js';
import { ServiceNameRegistry } from './services/service-names.js';
import { PortService } from './services/port-service.js';
import { checkPrerequisites } from './services/prerequisites.js';
import { createPortsRouter } from './api/routes/ports.js';
import { createHiddenPortsRouter } from './api/routes/hidden-ports.js';
import { createConfigRouter } from './api/routes/config.js';
import { createHealthRouter } from './api/routes/health.js';
import { requestLogger, errorHandler } from './api/middleware.js';
import { logger } from './services/logger.js';

export interface AppServices {
  portService: PortService;
  hiddenPorts: HiddenPortStore;
  serviceNames: ServiceNameRegistry;
}

export function createServices(config: AppConfig): AppServices {
  const hiddenPorts = new HiddenPortStore(hiddenPortsFile(config));
  const serviceNames = new ServiceNameRegistry(serviceNamesFile(config));
  const portService = new PortService({
    containers: new ContainerInspector({ runtime: config.runtime, timeoutMs: config.sourceTimeoutMs }),
    system: new SystemPortScanner({ timeoutMs: config.sourceTimeoutMs }),
    hiddenPorts,
    serviceNames,
    sourceTimeoutMs: config.sourceTimeoutMs,
  });
  return { portService, hiddenPorts, serviceNames };
}

export function createApp(services: AppServices): express.Express {
  const app = express();
  app.use(express.json());

  // Security headers
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  app.use(requestLogger);

  app.use('/api/health', createHealthRouter());
  app.use('/api', createPortsRouter(services.portService));
  app.use('/api/hidden-ports', createHiddenPortsRouter(services.hiddenPorts));
  app.use('/api/config', createConfigRouter(services.serviceNames));

  app.use(errorHandler);
  return app;
}

export async function startServer(overrides: Partial<AppConfig> = {}): Promise<http.Server> {
  const config = resolveConfig(overrides);

  checkPrerequisites(config.runtime);

  const services = createServices(config);
  // Fail fast on an unreadable hidden-ports file instead of on the first request
  const hidden = await services.hiddenPorts.list();
  logger.info({ file: services.hiddenPorts.path, entries: hidden.length }, 'hidden ports loaded');

  const server = http.createServer(createApp(services));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info(
    { port: config.port, host: config.host, runtime: config.runtime, configDir: config.configDir },
    `DockPorts started on http://${config.host}:${config.port}`,
  );

  // Graceful shutdown
  const shutdown = () => {
    logger.info('shutting down...');
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}

// Direct execution (when run as server.ts directly)
const isDirectExecution = process.argv[1]?.endsWith('server.js') ||
  process.argv[1]?.endsWith('server.ts');
if (isDirectExecution) {
  startServer().catch((err: unknown) => {
    logger.error({ err }, 'failed to start server');
    process.exit(1);
  });
}
