import { RealtimeLog, describeError } from './log';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Pick<Response, 'ok' | 'status'>>;

export interface AvailabilityProbeOptions {
  apiBaseUrl: string;
  enabled: boolean;
  timeoutMs: number;
  fetchImpl: FetchLike;
  log: RealtimeLog;
}

export type AvailabilityProbe = () => Promise<boolean>;

/**
 * Bounded GET against the gateway liveness endpoint.  Resolves false on
 * any non-2xx, network failure or timeout; never rejects.
 */
export async function probeAvailability(options: AvailabilityProbeOptions): Promise<boolean> {
  if (!options.enabled) {
    options.log('info', 'HEALTH_CHECK_SKIPPED');
    return true;
  }

  const url = `${options.apiBaseUrl}/api/health`;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await options.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });
    if (response.ok) {
      options.log('info', 'HEALTH_CHECK_OK', { url });
      return true;
    }
    options.log('warn', 'HEALTH_CHECK_FAILED', { url, status: response.status });
    return false;
  } catch (error) {
    if (controller.signal.aborted) {
      options.log('warn', 'HEALTH_CHECK_TIMEOUT', { url, timeoutMs: options.timeoutMs });
    } else {
      options.log('warn', 'HEALTH_CHECK_UNREACHABLE', { url, error: describeError(error) });
    }
    return false;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createAvailabilityProbe(options: AvailabilityProbeOptions): AvailabilityProbe {
  return () => probeAvailability(options);
}
