import { describe, it, expect } from '@jest/globals';
import {
  extractDockerErrorGuidance,
  isAlreadyConnectedError,
  isNotFoundError,
} from '@/infra/docker/errors';

describe('docker error classification', () => {
  it('should recognise existing network attachments', () => {
    expect(
      isAlreadyConnectedError('endpoint with name docker-frontend-1 already exists in network kind'),
    ).toBe(true);
    expect(isAlreadyConnectedError('No such container: docker-worker-1')).toBe(false);
  });

  it('should recognise missing objects by status code or message', () => {
    expect(isNotFoundError({ statusCode: 404, message: 'x' })).toBe(true);
    expect(isNotFoundError(new Error('No such container: docker-beat-1'))).toBe(true);
    expect(isNotFoundError(new Error('timeout'))).toBe(false);
  });

  it('should explain an unreachable daemon', () => {
    const error = Object.assign(new Error('connect ENOENT /var/run/docker.sock'), { code: 'ENOENT' });

    const guidance = extractDockerErrorGuidance(error);

    expect(guidance.message).toBe('Docker daemon is not reachable: connect ENOENT /var/run/docker.sock');
    expect(guidance.details).toEqual({ code: 'ENOENT' });
  });

  it('should prefer the engine message of an API error', () => {
    const error = Object.assign(new Error('(HTTP code 409) unexpected'), {
      statusCode: 409,
      json: { message: 'container is not running' },
    });

    const guidance = extractDockerErrorGuidance(error);

    expect(guidance.message).toBe('Docker conflict: container is not running');
    expect(guidance.details).toEqual({ statusCode: 409 });
  });

  it('should classify server errors', () => {
    expect(extractDockerErrorGuidance({ statusCode: 500, message: 'boom' }).message).toBe(
      'Docker engine error (500): boom',
    );
  });

  it('should fall back to the raw message', () => {
    expect(extractDockerErrorGuidance('weird').message).toBe('weird');
  });
});
