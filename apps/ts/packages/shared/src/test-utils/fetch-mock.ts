import { vi } from 'vitest';

export function createMockResponse<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createMockTextResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
  });
}

export function createMockErrorResponse(message: string, status: number): Response {
  return new Response(JSON.stringify({ message }), {
    status,
    statusText: message,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createNetworkError(): TypeError {
  return new TypeError('fetch failed');
}

export function createTimeoutAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Replace global fetch for the current test; restored by `restoreMocks`
 */
export function stubFetch() {
  return vi.spyOn(globalThis, 'fetch');
}

/**
 * Build a fetch implementation that never settles until its signal aborts
 */
export function createHangingFetch(): typeof fetch {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) {
        reject(new Error('missing signal'));
        return;
      }
      if (signal.aborted) {
        reject(createTimeoutAbortError());
        return;
      }
      signal.addEventListener('abort', () => reject(createTimeoutAbortError()), { once: true });
    });
}
