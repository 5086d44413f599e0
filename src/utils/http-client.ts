import nodeFetch from 'node-fetch';

export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'WeatherObservations/0.1 (+local collector)' };

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { headers?: Record<string, string>; signal?: AbortSignal },
) => Promise<FetchResponseLike>;

export type FetchWithTimeout = (
  url: string,
  options?: { headers?: Record<string, string>; signal?: AbortSignal },
  timeoutMs?: number,
) => Promise<FetchResponseLike>;

const defaultFetch: FetchLike =
  typeof globalThis.fetch === 'function' ? globalThis.fetch.bind(globalThis) : nodeFetch;

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchLike = defaultFetch): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
