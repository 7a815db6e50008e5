/**
 * Classification of Docker engine errors into operator guidance.
 *
 * dockerode surfaces socket errors with a `code` (ECONNREFUSED, ENOENT, ...)
 * and API errors with a `statusCode` plus the engine's JSON `json.message`.
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

interface DockerErrorShape {
  code?: unknown;
  statusCode?: unknown;
  json?: unknown;
}

function readEngineMessage(error: DockerErrorShape): string | undefined {
  const json = error.json;
  if (json && typeof json === 'object' && 'message' in json && typeof json.message === 'string') {
    return json.message;
  }
  return undefined;
}

/**
 * Whether the engine reported that a container is already attached to a network.
 */
export function isAlreadyConnectedError(message: string): boolean {
  return /already exists|already attached|already connected|duplicate/i.test(message);
}

/**
 * Whether the engine reported a missing object.
 */
export function isNotFoundError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'statusCode' in error && error.statusCode === 404) {
    return true;
  }
  return /no such (container|network|object)|not found/i.test(extractErrorMessage(error));
}

export function extractDockerErrorGuidance(error: unknown): ErrorGuidance {
  const shape: DockerErrorShape = {};
  if (error && typeof error === 'object') {
    if ('code' in error) shape.code = error.code;
    if ('statusCode' in error) shape.statusCode = error.statusCode;
    if ('json' in error) shape.json = error.json;
  }
  const message = readEngineMessage(shape) ?? extractErrorMessage(error);
  const statusCode = typeof shape.statusCode === 'number' ? shape.statusCode : undefined;
  const code = typeof shape.code === 'string' ? shape.code : undefined;
  const details: Record<string, unknown> = {
    ...(statusCode !== undefined && { statusCode }),
    ...(code && { code }),
  };

  if (code === 'ECONNREFUSED' || code === 'ENOENT' || /connect.*docker\.sock/i.test(message)) {
    return {
      message: `Docker daemon is not reachable: ${message}`,
      hint: 'The Docker engine is not running or its socket is not at the expected path',
      resolution: 'Start Docker (or Docker Desktop) and check with `docker info`',
      details,
    };
  }

  if (code === 'EACCES' || /permission denied/i.test(message)) {
    return {
      message: `Permission denied talking to Docker: ${message}`,
      hint: 'The current user cannot access the Docker socket',
      resolution: 'Add the user to the docker group or run with sufficient privileges',
      details,
    };
  }

  if (statusCode === 404 || isNotFoundError(error)) {
    return {
      message: `Docker object not found: ${message}`,
      hint: 'The container or network does not exist',
      resolution: 'Check the Compose stack with `docker compose ps` and networks with `docker network ls`',
      details,
    };
  }

  if (statusCode === 409) {
    return {
      message: `Docker conflict: ${message}`,
      hint: 'The requested state conflicts with the current one',
      resolution: 'Inspect the object with `docker inspect` before retrying',
      details,
    };
  }

  if (statusCode !== undefined && statusCode >= 500) {
    return {
      message: `Docker engine error (${statusCode}): ${message}`,
      hint: 'The Docker daemon failed to process the request',
      resolution: 'Check the daemon logs and retry',
      details,
    };
  }

  return {
    message,
    hint: 'Docker returned an unexpected error',
    resolution: 'Re-run with LOG_LEVEL=debug for the full error',
    details,
  };
}
