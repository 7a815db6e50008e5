/**
 * HTTP endpoint probes used to report whether the environment is reachable.
 */

import { DEFAULT_TIMEOUTS } from '@/config/constants';

export interface ProbeOptions {
  timeoutMs?: number;
  /** Require this exact status instead of any 2xx/3xx */
  expectStatus?: number;
}

export interface ProbeResult {
  reachable: boolean;
  status?: number;
}

export type EndpointProbe = (url: string, options?: ProbeOptions) => Promise<ProbeResult>;

export const probeEndpoint: EndpointProbe = async (url, options = {}) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(
    () => controller.abort(),
    options.timeoutMs ?? DEFAULT_TIMEOUTS.healthCheck,
  );

  try {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'manual',
      signal: controller.signal,
      headers: {
        'User-Agent': 'cube-studio-bootstrap',
      },
    });

    const reachable =
      options.expectStatus !== undefined
        ? response.status === options.expectStatus
        : response.ok || (response.status >= 300 && response.status < 400);
    return { reachable, status: response.status };
  } catch {
    // Timeouts and connection errors both mean the endpoint is not reachable
    return { reachable: false };
  } finally {
    clearTimeout(timeoutId);
  }
};
