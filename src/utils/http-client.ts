export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;

export interface TimedResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body: string;
}

// The deadline covers the headers and the whole body.
export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<TimedResponse>;

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'application/json',
  'Content-Type': 'application/json',
};

export const REDACTED = '***REDACTED***';

const secretForms = (secret: string): string[] => {
  const queryEncoded = new URLSearchParams({ value: secret }).toString().slice('value='.length);
  return [...new Set([secret, encodeURIComponent(secret), queryEncoded])].sort((a, b) => b.length - a.length);
};

// Secrets land in URLs percent-encoded, so every encoding of the value is masked.
export const redactSecret = (text: string, secret: string): string =>
  secret ? secretForms(secret).reduce((redacted, form) => redacted.split(form).join(REDACTED), text) : text;

const rejectOnAbort = (signal: AbortSignal): Promise<never> =>
  new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchImpl = globalThis.fetch.bind(globalThis)): FetchWithTimeout =>
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
    const timeout = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
    const aborted = rejectOnAbort(controller.signal);
    try {
      const response = await Promise.race([fetchImpl(url, { ...options, signal: controller.signal }), aborted]);
      const body = await Promise.race([response.text(), aborted]);
      return { ok: response.ok, status: response.status, statusText: response.statusText, body };
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
