import { describe, expect, it } from 'vitest';
import {
  createHangingFetch,
  createMockErrorResponse,
  createMockResponse,
  createMockTextResponse,
  createNetworkError,
  createTimeoutAbortError,
} from './fetch-mock';

describe('createMockResponse', () => {
  it('creates a 200 response with JSON data', async () => {
    const resp = createMockResponse({ key: 'value' });
    expect(resp.status).toBe(200);
    const data: unknown = await resp.json();
    expect(data).toEqual({ key: 'value' });
  });

  it('creates a custom status response', () => {
    const resp = createMockResponse({ error: true }, 404);
    expect(resp.status).toBe(404);
    expect(resp.ok).toBe(false);
  });
});

describe('createMockTextResponse', () => {
  it('keeps the body verbatim', async () => {
    const resp = createMockTextResponse('{ "a" : 1 }');
    expect(await resp.text()).toBe('{ "a" : 1 }');
  });
});

describe('createMockErrorResponse', () => {
  it('creates an error response', async () => {
    const resp = createMockErrorResponse('Not Found', 404);
    expect(resp.status).toBe(404);
    const data: unknown = await resp.json();
    expect(data).toEqual({ message: 'Not Found' });
  });
});

describe('createNetworkError', () => {
  it('creates a TypeError', () => {
    const err = createNetworkError();
    expect(err).toBeInstanceOf(TypeError);
    expect(err.message).toBe('fetch failed');
  });
});

describe('createTimeoutAbortError', () => {
  it('creates an AbortError', () => {
    expect(createTimeoutAbortError().name).toBe('AbortError');
  });
});

describe('createHangingFetch', () => {
  it('rejects once the signal aborts', async () => {
    const controller = new AbortController();
    const pending = createHangingFetch()('https://example.test', { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('rejects immediately without a signal', async () => {
    await expect(createHangingFetch()('https://example.test')).rejects.toThrow('missing signal');
  });
});
