import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type Docker from 'dockerode';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RuntimeError } from '../src/core/errors';
import { DockerRuntime } from '../src/infra/runtime/docker.runtime';
import { makeTempDir, quietLogger, removeTempDir, testConfig } from './helpers/config';

type BuildEvent = { stream?: string; error?: string; errorDetail?: { message?: string } };

const engineError = (statusCode: number, message = `engine returned ${statusCode}`) =>
  Object.assign(new Error(message), { statusCode });

const buildRequest = (contextDir: string) => ({
  contextDir,
  dockerfile: 'Dockerfile',
  tag: 'localhost:5000/text-classifier:1.0.0',
  buildArgs: { WORKER_PROCESSES: '1' },
  caps: { memoryBytes: 1024 * 1024 * 1024, cpus: 1.5 },
});

describe('DockerRuntime', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const createRuntime = (docker: Partial<Docker>) =>
    new DockerRuntime(testConfig(dir), quietLogger(), docker as Docker);

  describe('stop', () => {
    it('stops and removes a running container', async () => {
      const container = { stop: vi.fn().mockResolvedValue(undefined), remove: vi.fn().mockResolvedValue(undefined) };
      const docker = { getContainer: vi.fn().mockReturnValue(container) };

      const outcome = await createRuntime(docker).stop('text-classifier', 30);

      expect(outcome).toBe('stopped');
      expect(docker.getContainer).toHaveBeenCalledWith('text-classifier');
      expect(container.stop).toHaveBeenCalledWith({ t: 30 });
      expect(container.remove).toHaveBeenCalledWith({ force: true });
    });

    it.each([304, 404, 409])('treats status %i from stop as already stopped', async (statusCode) => {
      const container = {
        stop: vi.fn().mockRejectedValueOnce(engineError(statusCode)),
        remove: vi.fn().mockRejectedValueOnce(engineError(404)),
      };

      const outcome = await createRuntime({ getContainer: vi.fn().mockReturnValue(container) }).stop('text-classifier');

      expect(outcome).toBe('already_stopped');
      expect(container.remove).toHaveBeenCalledTimes(1);
    });

    it('surfaces other engine failures as stop_failed', async () => {
      const container = {
        stop: vi.fn().mockRejectedValueOnce(engineError(500, 'driver failed')),
        remove: vi.fn(),
      };

      const result = createRuntime({ getContainer: vi.fn().mockReturnValue(container) }).stop('text-classifier');

      await expect(result).rejects.toBeInstanceOf(RuntimeError);
      await expect(result).rejects.toMatchObject({ code: 'stop_failed', statusCode: 500, message: 'driver failed' });
      expect(container.remove).not.toHaveBeenCalled();
    });
  });

  describe('buildImage', () => {
    const progressOf =
      (events: BuildEvent[]) =>
      (_stream: unknown, onFinished: (err: Error | null) => void, onProgress: (event: BuildEvent) => void) => {
        for (const event of events) onProgress(event);
        onFinished(null);
      };

    it('returns the artifact reference and forwards progress lines', async () => {
      await writeFile(path.join(dir, 'Dockerfile'), 'FROM python:3.11-slim\n');
      await writeFile(path.join(dir, 'serve.py'), 'print("ok")\n');
      const inspect = vi.fn().mockResolvedValue({ Id: 'sha256:feedface', Size: 2048, Created: '2024-03-01T10:00:00Z' });
      const docker = {
        buildImage: vi.fn().mockResolvedValue({}),
        getImage: vi.fn().mockReturnValue({ inspect }),
        modem: { followProgress: vi.fn(progressOf([{ stream: 'Step 1/2 : FROM python:3.11-slim\n' }, { stream: '\n' }])) },
      };
      const lines: string[] = [];

      const artifact = await createRuntime(docker).buildImage(buildRequest(dir), (line) => lines.push(line));

      expect(artifact).toEqual({
        tag: 'localhost:5000/text-classifier:1.0.0',
        imageId: 'sha256:feedface',
        sizeBytes: 2048,
        builtAt: '2024-03-01T10:00:00Z',
      });
      expect(lines).toEqual(['Step 1/2 : FROM python:3.11-slim']);
      expect(docker.buildImage).toHaveBeenCalledWith(
        { context: dir, src: ['Dockerfile', 'serve.py'] },
        expect.objectContaining({ t: 'localhost:5000/text-classifier:1.0.0', memory: 1073741824, cpuquota: 150000 }),
      );
      expect(docker.getImage).toHaveBeenCalledWith('localhost:5000/text-classifier:1.0.0');
    });

    it('turns an errorDetail event into a build_failed error', async () => {
      await writeFile(path.join(dir, 'Dockerfile'), 'FROM python:3.11-slim\n');
      const docker = {
        buildImage: vi.fn().mockResolvedValue({}),
        getImage: vi.fn(),
        modem: {
          followProgress: vi.fn(
            progressOf([
              { stream: 'Step 2/2 : COPY models /app/models\n' },
              { error: 'COPY failed', errorDetail: { message: 'COPY failed: no source files were specified\n' } },
            ]),
          ),
        },
      };

      const result = createRuntime(docker).buildImage(buildRequest(dir));

      await expect(result).rejects.toMatchObject({
        name: 'RuntimeError',
        code: 'build_failed',
        message: 'COPY failed: no source files were specified',
      });
      expect(docker.getImage).not.toHaveBeenCalled();
    });
  });

  describe('prune', () => {
    it('reports each failing step and keeps going', async () => {
      const docker = {
        pruneContainers: vi.fn().mockResolvedValue({ ContainersDeleted: ['a1', 'b2'], SpaceReclaimed: 100 }),
        pruneNetworks: vi.fn().mockRejectedValue(new Error('network app-network has active endpoints')),
        pruneVolumes: vi.fn().mockResolvedValue({ VolumesDeleted: [], SpaceReclaimed: 0 }),
        pruneImages: vi.fn().mockResolvedValue({ ImagesDeleted: [{ Deleted: 'sha256:old' }], SpaceReclaimed: 50 }),
      };

      const report = await createRuntime(docker).prune();

      expect(report).toEqual({
        containersDeleted: 2,
        networksDeleted: 0,
        volumesDeleted: 0,
        imagesDeleted: 1,
        spaceReclaimedBytes: 150,
        errors: ['networks: network app-network has active endpoints'],
      });
      expect(docker.pruneImages).toHaveBeenCalledTimes(1);
    });
  });

  describe('logs and status', () => {
    it('returns empty text for the logs of a missing container', async () => {
      const container = { logs: vi.fn().mockRejectedValue(engineError(404, 'no such container')) };

      const text = await createRuntime({ getContainer: vi.fn().mockReturnValue(container) }).tailLogs('text-classifier', 100);

      expect(text).toBe('');
      expect(container.logs).toHaveBeenCalledWith({ follow: false, stdout: true, stderr: true, tail: 100 });
    });

    it('decodes multiplexed log frames', async () => {
      const frame = (stream: number, text: string) => {
        const body = Buffer.from(text, 'utf8');
        const header = Buffer.alloc(8);
        header[0] = stream;
        header.writeUInt32BE(body.length, 4);
        return Buffer.concat([header, body]);
      };
      const payload = Buffer.concat([frame(1, 'booting\n'), frame(2, 'warning: slow disk\n')]);
      const container = { logs: vi.fn().mockResolvedValue(payload) };

      const text = await createRuntime({ getContainer: vi.fn().mockReturnValue(container) }).tailLogs('text-classifier', 2);

      expect(text).toBe('booting\nwarning: slow disk\n');
    });

    it('reports a missing container without throwing', async () => {
      const container = { inspect: vi.fn().mockRejectedValue(engineError(404)) };

      const status = await createRuntime({ getContainer: vi.fn().mockReturnValue(container) }).queryStatus('text-classifier');

      expect(status).toEqual({ name: 'text-classifier', exists: false, running: false, state: 'missing' });
    });
  });
});
