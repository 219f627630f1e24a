import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  try {
    const pkg = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
    return pkg.version || '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dockports')
    .description('DockPorts: container and host port usage in one view')
    .version(getVersion());

  // dockports start
  program
    .command('start')
    .description('Start the DockPorts HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: $PORT or 7577)', parseInteger)
    .option('-H, --host <host>', 'Host to bind to (default: $HOST or 0.0.0.0)')
    .option('-c, --config-dir <dir>', 'Directory holding hidden_ports.json and service-names.json')
    .option('-r, --runtime <cli>', 'Container runtime CLI (docker or podman)')
    .option('-t, --timeout <ms>', 'Timeout for each port source in milliseconds', parseInteger)
    .action(async (opts: { port?: number; host?: string; configDir?: string; runtime?: string; timeout?: number }) => {
      const { startServer } = await import('./server.js');
      await startServer({
        port: opts.port,
        host: opts.host,
        configDir: opts.configDir,
        runtime: opts.runtime,
        sourceTimeoutMs: opts.timeout,
      });
    });

  // dockports scan
  program
    .command('scan')
    .description('Run one aggregation pass and print the used ports')
    .option('-c, --config-dir <dir>', 'Directory holding hidden_ports.json and service-names.json')
    .option('-r, --runtime <cli>', 'Container runtime CLI (docker or podman)')
    .option('-t, --timeout <ms>', 'Timeout for each port source in milliseconds', parseInteger)
    .option('--json', 'Print the full listing as JSON', false)
    .action(async (opts: { configDir?: string; runtime?: string; timeout?: number; json: boolean }) => {
      const { resolveConfig } = await import('./config.js');
      const { createServices } = await import('./server.js');
      const { serializeScan } = await import('./api/serializers.js');
      const { formatScan } = await import('./format.js');

      const config = resolveConfig({ configDir: opts.configDir, runtime: opts.runtime, sourceTimeoutMs: opts.timeout });
      const scan = await createServices(config).portService.scan();
      console.log(opts.json ? JSON.stringify(serializeScan(scan), null, 2) : formatScan(scan));
    });

  return program;
}
