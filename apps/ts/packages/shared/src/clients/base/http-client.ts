import { logger } from '../../utils/logger';

export type HttpRequestErrorKind = 'http' | 'network' | 'timeout';

interface HttpRequestErrorOptions {
  status?: number;
  statusText?: string;
  body?: unknown;
  cause?: unknown;
}

export class HttpRequestError extends Error {
  readonly kind: HttpRequestErrorKind;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: unknown;

  constructor(message: string, kind: HttpRequestErrorKind, options: HttpRequestErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HttpRequestError';
    this.kind = kind;
    this.status = options.status;
    this.statusText = options.statusText;
    this.body = options.body;
  }
}

export interface HttpRequestOptions extends RequestInit {
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function extractErrorMessage(body: unknown): string | undefined {
  if (isRecord(body)) {
    for (const field of ['message', 'error', 'detail']) {
      const value = body[field];
      if (typeof value === 'string' && value.trim().length > 0) {
        return value;
      }
    }

    // GraphQL servers report failures as { errors: [{ message }] }
    const errors = body.errors;
    if (Array.isArray(errors)) {
      const first: unknown = errors[0];
      if (isRecord(first)) {
        const message = first.message;
        if (typeof message === 'string' && message.trim().length > 0) {
          return message;
        }
      }
    }
  }

  if (typeof body === 'string' && body.trim().length > 0) {
    return body;
  }

  return undefined;
}

interface TimeoutSignalResult {
  signal?: AbortSignal;
  cleanup: () => void;
  didTimeout: () => boolean;
}

function createTimeoutSignal(inputSignal: AbortSignal | null | undefined, timeoutMs?: number): TimeoutSignalResult {
  if (!timeoutMs || timeoutMs <= 0) {
    return { signal: inputSignal ?? undefined, cleanup: () => {}, didTimeout: () => false };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (inputSignal) {
    if (inputSignal.aborted) {
      controller.abort();
    } else {
      inputSignal.addEventListener('abort', onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timeoutId);
      if (inputSignal) {
        inputSignal.removeEventListener('abort', onAbort);
      }
    },
    didTimeout: () => timedOut,
  };
}

async function throwHttpError(response: Response): Promise<never> {
  let errorBody: unknown;
  const rawResponse = response.clone();
  try {
    errorBody = await response.json();
  } catch (parseError) {
    try {
      const textBody = await rawResponse.text();
      errorBody = textBody.trim().length > 0 ? textBody : undefined;
    } catch (textError) {
      logger.warn('[http-client] Failed to read non-JSON error response body', {
        status: response.status,
        statusText: response.statusText,
        parseError: parseError instanceof Error ? parseError.message : String(parseError),
        textError: textError instanceof Error ? textError.message : String(textError),
      });
    }
  }

  const message = extractErrorMessage(errorBody) || response.statusText || `HTTP ${response.status}`;
  throw new HttpRequestError(message, 'http', {
    status: response.status,
    statusText: response.statusText,
    body: errorBody,
  });
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function toTransportError(error: unknown, timeout: TimeoutSignalResult, timeoutMs?: number): HttpRequestError {
  if (error instanceof HttpRequestError) {
    return error;
  }

  if (isAbortError(error) && timeout.didTimeout()) {
    return new HttpRequestError(`Request timed out after ${timeoutMs}ms`, 'timeout', { cause: error });
  }

  const message = error instanceof Error ? error.message : 'Network request failed';
  return new HttpRequestError(message, 'network', { cause: error });
}

/**
 * Issue a request and read its body while the deadline is still armed,
 * so a stalled body counts against the same timeout as the headers
 */
async function request<T>(
  url: string,
  options: HttpRequestOptions,
  readBody: (response: Response) => Promise<T>
): Promise<T> {
  const { timeoutMs, ...requestInit } = options;
  const timeout = createTimeoutSignal(requestInit.signal, timeoutMs);
  const init = timeout.signal ? { ...requestInit, signal: timeout.signal } : requestInit;

  try {
    const response = await fetch(url, init);

    if (!response.ok) {
      await throwHttpError(response);
    }

    return await readBody(response);
  } catch (error) {
    throw toTransportError(error, timeout, timeoutMs);
  } finally {
    timeout.cleanup();
  }
}

/**
 * Fetch a URL and return the full response body as text
 */
export function requestText(url: string, options: HttpRequestOptions = {}): Promise<string> {
  return request(url, options, (response) => response.text());
}

/**
 * Fetch a URL and return the full response body as raw bytes
 */
export function requestBuffer(url: string, options: HttpRequestOptions = {}): Promise<Buffer> {
  return request(url, options, async (response) => Buffer.from(await response.arrayBuffer()));
}
