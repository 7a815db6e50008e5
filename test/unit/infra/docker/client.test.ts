import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { Readable } from 'node:stream';
import Docker from 'dockerode';
import { createContainerRuntime, type ContainerRuntime } from '@/infra/docker/client';
import { createSilentLogger } from '../../../__support__/utilities/fake-environment';
import { FakeCommandRunner } from '../../../__support__/utilities/fake-runner';

const mockDockerApi = {
  version: jest.fn<() => Promise<unknown>>(),
  getContainer: jest.fn<(id: string) => unknown>(),
  getNetwork: jest.fn<(id: string) => unknown>(),
};

jest.mock('dockerode', () => jest.fn().mockImplementation(() => mockDockerApi));

function engineError(message: string, statusCode: number): Error {
  return Object.assign(new Error(`(HTTP code ${statusCode}) ${message}`), {
    statusCode,
    json: { message },
  });
}

describe('container runtime', () => {
  let runtime: ContainerRuntime;

  beforeEach(() => {
    jest.mocked(Docker).mockClear();
    mockDockerApi.version.mockReset();
    mockDockerApi.getContainer.mockReset();
    mockDockerApi.getNetwork.mockReset();
    runtime = createContainerRuntime(createSilentLogger(), new FakeCommandRunner());
  });

  describe('engine connection', () => {
    it('should let dockerode resolve DOCKER_HOST when no socket is configured', () => {
      expect(jest.mocked(Docker)).toHaveBeenCalledTimes(1);
      expect(jest.mocked(Docker)).toHaveBeenCalledWith();
    });

    it('should use an explicit socket path', () => {
      createContainerRuntime(createSilentLogger(), new FakeCommandRunner(), {
        socketPath: '/run/user/1000/docker.sock',
      });

      expect(jest.mocked(Docker)).toHaveBeenLastCalledWith({ socketPath: '/run/user/1000/docker.sock' });
    });

    it('should report the engine version on ping', async () => {
      mockDockerApi.version.mockResolvedValue({ Version: '27.1.1' });

      expect(await runtime.ping()).toEqual({ ok: true, value: '27.1.1' });
    });
  });

  describe('connectToNetwork', () => {
    it('should treat an existing endpoint as already connected', async () => {
      mockDockerApi.getNetwork.mockReturnValue({
        connect: async () => {
          throw engineError('endpoint with name docker-frontend-1 already exists in network kind', 403);
        },
      });

      expect(await runtime.connectToNetwork('kind', 'docker-frontend-1')).toEqual({
        ok: true,
        value: 'already-connected',
      });
      expect(mockDockerApi.getNetwork).toHaveBeenCalledWith('kind');
    });

    it('should fail for a missing container', async () => {
      mockDockerApi.getNetwork.mockReturnValue({
        connect: async () => {
          throw engineError('No such container: docker-worker-1', 404);
        },
      });

      const result = await runtime.connectToNetwork('kind', 'docker-worker-1');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(
          'Failed to connect docker-worker-1 to kind: Docker object not found: No such container: docker-worker-1',
        );
      }
    });
  });

  describe('exec', () => {
    const execWithExitCode = (exitCode: number) => ({
      exec: async () => ({
        start: async () => Readable.from([]),
        inspect: async () => ({ ExitCode: exitCode }),
      }),
    });

    it('should succeed when the command exits with zero', async () => {
      mockDockerApi.getContainer.mockReturnValue(execWithExitCode(0));

      expect(await runtime.exec('cube-studio-control-plane', ['mkdir', '-p', '/data/k8s'])).toEqual({
        ok: true,
        value: undefined,
      });
    });

    it('should fail when the command exits non-zero', async () => {
      mockDockerApi.getContainer.mockReturnValue(execWithExitCode(1));

      const result = await runtime.exec('cube-studio-control-plane', ['mkdir', '-p', '/data/k8s']);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(
          'Command exited with code 1 in cube-studio-control-plane: mkdir -p /data/k8s',
        );
      }
    });
  });

  describe('containerState', () => {
    it('should map the health status', async () => {
      mockDockerApi.getContainer.mockReturnValue({
        inspect: async () => ({
          State: { Status: 'running', Running: true, Health: { Status: 'healthy' } },
        }),
      });

      expect(await runtime.containerState('docker-mysql-1')).toEqual({
        status: 'running',
        running: true,
        health: 'healthy',
      });
    });

    it('should omit health for containers without a health check', async () => {
      mockDockerApi.getContainer.mockReturnValue({
        inspect: async () => ({ State: { Status: 'exited', Running: false } }),
      });

      expect(await runtime.containerState('docker-myapp-1')).toEqual({
        status: 'exited',
        running: false,
      });
    });

    it('should return null for a missing container', async () => {
      mockDockerApi.getContainer.mockReturnValue({
        inspect: async () => {
          throw engineError('No such container: docker-beat-1', 404);
        },
      });

      expect(await runtime.containerState('docker-beat-1')).toBeNull();
    });
  });

  describe('getNetworkMemberAddress', () => {
    it('should read the member address from the network', async () => {
      mockDockerApi.getNetwork.mockReturnValue({
        inspect: async () => ({
          Name: 'kind',
          Containers: {
            abc123: { Name: 'cube-studio-control-plane', IPv4Address: '172.18.0.2/16' },
          },
        }),
      });

      expect(await runtime.getNetworkMemberAddress('kind', 'cube-studio-control-plane')).toBe(
        '172.18.0.2',
      );
    });

    it('should return null when the network cannot be inspected', async () => {
      mockDockerApi.getNetwork.mockReturnValue({
        inspect: async () => {
          throw engineError('network kind not found', 404);
        },
      });

      expect(await runtime.getNetworkMemberAddress('kind', 'cube-studio-control-plane')).toBeNull();
    });
  });
});
