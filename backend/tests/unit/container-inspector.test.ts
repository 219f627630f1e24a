import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  execFile: mockExecFile,
}));

import {
  ContainerInspector,
  explicitBindings,
  parseInspectOutput,
  parsePortKey,
} from '../../src/worker/container-inspector.js';
import { RuntimeUnavailableError } from '../../src/models/errors.js';
import { makeContainer } from '../helpers/fixtures.js';
import { exitedWith, fakeExecFile } from '../helpers/exec-mock.js';

const WEB_ID = 'a1b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f60718293a4b5c6d7e8f90';
const WORKER_ID = 'ffeeddccbbaa99887766554433221100ffeeddccbbaa99887766554433221100';

const INSPECT = [
  {
    Id: WEB_ID,
    Name: '/web',
    Config: {
      Image: 'nginx:1.25',
      ExposedPorts: { '80/tcp': {} },
      Healthcheck: { Test: ['CMD-SHELL', 'curl -f http://localhost:80/ || exit 1'] },
      Entrypoint: ['/docker-entrypoint.sh'],
      Cmd: ['nginx', '-g', 'daemon off;'],
      Env: ['PATH=/usr/bin', 'NGINX_PORT=80'],
    },
    HostConfig: { NetworkMode: 'bridge' },
    NetworkSettings: {
      Ports: {
        '80/tcp': [
          { HostIp: '0.0.0.0', HostPort: '8080' },
          { HostIp: '::', HostPort: '8080' },
        ],
        '443/tcp': null,
        '53/udp': [{ HostIp: '0.0.0.0', HostPort: '5353' }],
      },
    },
  },
  {
    Id: WORKER_ID,
    Name: '',
    Config: {
      Image: 'python:3.12',
      Entrypoint: null,
      Cmd: 'python app.py',
    },
    HostConfig: { NetworkMode: 'host' },
    NetworkSettings: { Ports: {} },
  },
];

describe('container-inspector', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('parsePortKey', () => {
    it('splits port and protocol', () => {
      expect(parsePortKey('80/tcp')).toEqual({ port: 80, protocol: 'tcp' });
      expect(parsePortKey('53/UDP')).toEqual({ port: 53, protocol: 'udp' });
    });

    it('defaults a bare port to tcp', () => {
      expect(parsePortKey('9000')).toEqual({ port: 9000, protocol: 'tcp' });
    });

    it('rejects unknown protocols and out-of-range ports', () => {
      expect(parsePortKey('80/sctp')).toBeNull();
      expect(parsePortKey('0/tcp')).toBeNull();
      expect(parsePortKey('70000/tcp')).toBeNull();
      expect(parsePortKey('http')).toBeNull();
    });
  });

  describe('parseInspectOutput', () => {
    it('maps inspect fields to container metadata', () => {
      const [web] = parseInspectOutput(INSPECT);
      expect(web).toEqual({
        id: WEB_ID,
        name: 'web',
        image: 'nginx:1.25',
        networkMode: 'bridge',
        bindings: [
          { hostIp: '0.0.0.0', hostPort: 8080, containerPort: 80, protocol: 'tcp' },
          { hostIp: '::', hostPort: 8080, containerPort: 80, protocol: 'tcp' },
          { hostIp: '0.0.0.0', hostPort: 5353, containerPort: 53, protocol: 'udp' },
        ],
        exposedPorts: ['80/tcp'],
        healthcheck: ['CMD-SHELL', 'curl -f http://localhost:80/ || exit 1'],
        entrypoint: ['/docker-entrypoint.sh'],
        cmd: ['nginx', '-g', 'daemon off;'],
        env: ['PATH=/usr/bin', 'NGINX_PORT=80'],
      });
    });

    it('fills missing fields with empty values and names unnamed containers by short id', () => {
      const [, worker] = parseInspectOutput(INSPECT);
      expect(worker).toEqual({
        id: WORKER_ID,
        name: 'ffeeddccbbaa',
        image: 'python:3.12',
        networkMode: 'host',
        bindings: [],
        exposedPorts: [],
        healthcheck: [],
        entrypoint: [],
        cmd: ['python app.py'],
        env: [],
      });
    });

    it('returns an empty list for non-array input', () => {
      expect(parseInspectOutput({})).toEqual([]);
      expect(parseInspectOutput(null)).toEqual([]);
    });
  });

  describe('explicitBindings', () => {
    it('emits one candidate per host port and protocol', () => {
      const [web] = parseInspectOutput(INSPECT);
      expect(explicitBindings(web)).toEqual([
        {
          port: 8080,
          protocol: 'tcp',
          source: 'container',
          detectionMethod: 'explicit-binding',
          containerName: 'web',
          containerId: 'a1b2c3d4e5f6',
          containerInternalPort: 80,
          image: 'nginx:1.25',
        },
        {
          port: 5353,
          protocol: 'udp',
          source: 'container',
          detectionMethod: 'explicit-binding',
          containerName: 'web',
          containerId: 'a1b2c3d4e5f6',
          containerInternalPort: 53,
          image: 'nginx:1.25',
        },
      ]);
    });

    it('returns nothing for a container without bindings', () => {
      expect(explicitBindings(makeContainer())).toEqual([]);
    });
  });

  describe('ContainerInspector', () => {
    it('lists running containers through ps and inspect', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': { stdout: `${WEB_ID}\n${WORKER_ID}\n` },
          'docker inspect': { stdout: JSON.stringify(INSPECT) },
        }),
      );

      const containers = await new ContainerInspector().listContainers();

      expect(containers.map((c) => c.name)).toEqual(['web', 'ffeeddccbbaa']);
      expect(mockExecFile.mock.calls[0][1]).toEqual(['ps', '-q', '--no-trunc']);
      expect(mockExecFile.mock.calls[1][1]).toEqual(['inspect', WEB_ID, WORKER_ID]);
    });

    it('skips inspect when nothing is running', async () => {
      mockExecFile.mockImplementation(fakeExecFile({ 'docker ps': { stdout: '\n' } }));

      await expect(new ContainerInspector().listContainers()).resolves.toEqual([]);
      expect(mockExecFile).toHaveBeenCalledOnce();
    });

    it('invokes the configured runtime', async () => {
      mockExecFile.mockImplementation(fakeExecFile({ 'podman ps': { stdout: '' } }));

      const inspector = new ContainerInspector({ runtime: 'podman' });
      await inspector.listContainers();

      expect(inspector.getRuntime()).toBe('podman');
      expect(mockExecFile.mock.calls[0][0]).toBe('podman');
    });

    it('raises RuntimeUnavailable when the runtime CLI is missing', async () => {
      mockExecFile.mockImplementation(fakeExecFile({}));

      const listing = new ContainerInspector().listContainers();

      await expect(listing).rejects.toBeInstanceOf(RuntimeUnavailableError);
      await expect(listing).rejects.toThrow('Container runtime unavailable (docker): docker ps -q --no-trunc not found');
    });

    it('raises RuntimeUnavailable when the daemon is unreachable', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': {
            error: exitedWith(1, 'docker'),
            stderr: 'Cannot connect to the Docker daemon\n',
          },
        }),
      );

      await expect(new ContainerInspector().listContainers()).rejects.toThrow(
        'Container runtime unavailable (docker): docker ps -q --no-trunc failed: Cannot connect to the Docker daemon',
      );
    });

    it('raises RuntimeUnavailable on unparseable inspect output', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': { stdout: `${WEB_ID}\n` },
          'docker inspect': { stdout: 'not json' },
        }),
      );

      await expect(new ContainerInspector().listContainers()).rejects.toBeInstanceOf(RuntimeUnavailableError);
    });

    it('keeps the containers inspect printed when another one stopped after ps', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': { stdout: `${WEB_ID}\n${WORKER_ID}\n` },
          'docker inspect': {
            error: exitedWith(1, 'docker'),
            stdout: JSON.stringify([INSPECT[0]]),
            stderr: `Error: No such object: ${WORKER_ID}\n`,
          },
        }),
      );

      const containers = await new ContainerInspector().listContainers();

      expect(containers.map((c) => c.name)).toEqual(['web']);
      expect(explicitBindings(containers[0]).map((c) => c.port)).toEqual([8080, 5353]);
    });

    it('raises RuntimeUnavailable when a failed inspect printed nothing usable', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': { stdout: `${WEB_ID}\n` },
          'docker inspect': { error: exitedWith(1, 'docker'), stdout: '', stderr: `Error: No such object: ${WEB_ID}\n` },
        }),
      );

      await expect(new ContainerInspector().listContainers()).rejects.toThrow(
        `Container runtime unavailable (docker): docker inspect ${WEB_ID} failed: Error: No such object: ${WEB_ID}`,
      );
    });

    it('raises RuntimeUnavailable when inspect prints something other than an array', async () => {
      mockExecFile.mockImplementation(
        fakeExecFile({
          'docker ps': { stdout: `${WEB_ID}\n` },
          'docker inspect': { stdout: '{}' },
        }),
      );

      await expect(new ContainerInspector().listContainers()).rejects.toThrow(
        'Container runtime unavailable (docker): inspect output is not a JSON array',
      );
    });
  });
});
