import { describe, it, expect } from 'vitest';
import {
  fromEntrypoint,
  fromEnvironment,
  fromExposedPorts,
  fromHealthcheck,
  inferContainerPorts,
  isHostNetwork,
} from '../../src/services/port-heuristics.js';
import { makeContainer } from '../helpers/fixtures.js';

const ports = (list: Array<{ port: number }>) => list.map((c) => c.port);

describe('port-heuristics', () => {
  describe('fromExposedPorts', () => {
    it('reads exposed port keys with their protocol', () => {
      const container = makeContainer({ exposedPorts: ['8080/tcp', '53/udp', '9000', 'bad/key', '8080/tcp'] });

      expect(fromExposedPorts(container)).toEqual([
        {
          port: 8080,
          protocol: 'tcp',
          source: 'container',
          detectionMethod: 'exposed-ports-config',
          containerName: 'web',
          containerId: '0123456789ab',
          containerInternalPort: 8080,
          image: 'nginx:latest',
        },
        {
          port: 53,
          protocol: 'udp',
          source: 'container',
          detectionMethod: 'exposed-ports-config',
          containerName: 'web',
          containerId: '0123456789ab',
          containerInternalPort: 53,
          image: 'nginx:latest',
        },
        {
          port: 9000,
          protocol: 'tcp',
          source: 'container',
          detectionMethod: 'exposed-ports-config',
          containerName: 'web',
          containerId: '0123456789ab',
          containerInternalPort: 9000,
          image: 'nginx:latest',
        },
      ]);
    });
  });

  describe('fromHealthcheck', () => {
    it('finds the port in a shell healthcheck URL', () => {
      const container = makeContainer({
        healthcheck: ['CMD-SHELL', 'curl -f http://localhost:9090/health || exit 1'],
      });
      const found = fromHealthcheck(container);

      expect(ports(found)).toEqual([9090]);
      expect(found[0].detectionMethod).toBe('healthcheck-parse');
      expect(found[0].protocol).toBe('tcp');
    });

    it('reads exec-form healthchecks', () => {
      const container = makeContainer({ healthcheck: ['CMD', 'wget', '-q', '--spider', 'http://127.0.0.1:3000'] });
      expect(ports(fromHealthcheck(container))).toEqual([3000]);
    });

    it('reads a healthcheck without a CMD marker', () => {
      const container = makeContainer({ healthcheck: ['curl http://localhost:81'] });
      expect(ports(fromHealthcheck(container))).toEqual([81]);
    });

    it('ignores disabled and missing healthchecks', () => {
      expect(fromHealthcheck(makeContainer({ healthcheck: ['NONE'] }))).toEqual([]);
      expect(fromHealthcheck(makeContainer({ healthcheck: [] }))).toEqual([]);
    });

    it('ignores numbers that are too long to be ports', () => {
      const container = makeContainer({ healthcheck: ['CMD-SHELL', 'check --addr :123456'] });
      expect(fromHealthcheck(container)).toEqual([]);
    });

    it('reads wildcard and bracketed IPv6 loopback hosts', () => {
      expect(ports(fromHealthcheck(makeContainer({ healthcheck: ['CMD-SHELL', 'nc -z 0.0.0.0:6000'] })))).toEqual([6000]);
      expect(ports(fromHealthcheck(makeContainer({ healthcheck: ['CMD', 'curl', 'http://[::1]:6001/'] })))).toEqual([6001]);
    });

    it('does not read a port out of a bare IPv6 address', () => {
      const container = makeContainer({ healthcheck: ['CMD', 'nc', '-z', '::1', '8080'] });
      expect(fromHealthcheck(container)).toEqual([]);
    });
  });

  describe('fromEntrypoint', () => {
    it('reads the value after a port flag', () => {
      const container = makeContainer({
        entrypoint: ['uvicorn'],
        cmd: ['main:app', '--host', '0.0.0.0', '--port', '8000'],
      });
      const found = fromEntrypoint(container);

      expect(ports(found)).toEqual([8000]);
      expect(found[0].detectionMethod).toBe('entrypoint-parse');
    });

    it('reads inline flag values with a host part', () => {
      const container = makeContainer({ cmd: ['server', '--listen=0.0.0.0:7000'] });
      expect(ports(fromEntrypoint(container))).toEqual([7000]);
    });

    it('splits shell-form commands into words', () => {
      const container = makeContainer({ cmd: ['redis-server --port 6380'] });
      expect(ports(fromEntrypoint(container))).toEqual([6380]);
    });

    it('reads bare :port arguments', () => {
      const container = makeContainer({ cmd: ['gunicorn', '-b', ':5000', 'app:server'] });
      expect(ports(fromEntrypoint(container))).toEqual([5000]);
    });

    it('skips a port flag whose value is not a port', () => {
      const container = makeContainer({ cmd: ['tool', '-p', 'profile'] });
      expect(fromEntrypoint(container)).toEqual([]);
    });

    it('reads the short flag inline and as a separate word', () => {
      expect(ports(fromEntrypoint(makeContainer({ cmd: ['app', '-p=3000'] })))).toEqual([3000]);
      expect(ports(fromEntrypoint(makeContainer({ cmd: ['app', '-p', '3001'] })))).toEqual([3001]);
    });

    it('reads --bind with a host part inline and as a separate word', () => {
      expect(ports(fromEntrypoint(makeContainer({ cmd: ['app', '--bind=0.0.0.0:4000'] })))).toEqual([4000]);
      expect(ports(fromEntrypoint(makeContainer({ cmd: ['app', '--bind', '127.0.0.1:4001'] })))).toEqual([4001]);
    });

    it('ignores a bare IPv6 host argument', () => {
      const container = makeContainer({ cmd: ['app', '--host', '::1', '--port', '8080'] });
      expect(ports(fromEntrypoint(container))).toEqual([8080]);
    });

    it('ignores image version tags', () => {
      const container = makeContainer({ cmd: ['run', 'python:3.11'] });
      expect(fromEntrypoint(container)).toEqual([]);
    });
  });

  describe('fromEnvironment', () => {
    it('reads numeric values of variables named like a port', () => {
      const container = makeContainer({
        env: ['PORT=3000', 'HTTP_PORT=8080', 'DB_HOST=db', 'SUPPORT_EMAIL=ops@example.test', 'API_PORT=abc', 'METRICS_PORT=70000', '=5'],
      });
      const found = fromEnvironment(container);

      expect(ports(found)).toEqual([3000, 8080]);
      expect(found.every((c) => c.detectionMethod === 'env-var-scan')).toBe(true);
    });

    it('deduplicates repeated values', () => {
      const container = makeContainer({ env: ['PORT=3000', 'APP_PORT=3000'] });
      expect(ports(fromEnvironment(container))).toEqual([3000]);
    });
  });

  describe('inferContainerPorts', () => {
    const configured = {
      exposedPorts: ['8080/tcp'],
      healthcheck: ['CMD', 'curl', 'http://localhost:8081/ping'],
      cmd: ['app', '--port', '8082'],
      env: ['PORT=8080'],
    };

    it('only infers ports for host-network containers', () => {
      expect(isHostNetwork(makeContainer({ networkMode: 'bridge' }))).toBe(false);
      expect(inferContainerPorts(makeContainer({ ...configured, networkMode: 'bridge' }))).toEqual([]);
    });

    it('runs every extractor in descending confidence', () => {
      const found = inferContainerPorts(makeContainer({ ...configured, networkMode: 'host' }));

      expect(found.map((c) => [c.port, c.detectionMethod])).toEqual([
        [8080, 'exposed-ports-config'],
        [8081, 'healthcheck-parse'],
        [8082, 'entrypoint-parse'],
        [8080, 'env-var-scan'],
      ]);
    });

    it('accepts a custom extractor list', () => {
      const found = inferContainerPorts(makeContainer({ ...configured, networkMode: 'host' }), [fromEnvironment]);
      expect(ports(found)).toEqual([8080]);
    });
  });
});
