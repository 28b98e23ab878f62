import { afterEach, describe, expect, it, vi } from 'vitest';
import { getConfig, resetConfig, setConfig } from '../index';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  describe('getConfig', () => {
    it('returns default values', () => {
      vi.stubEnv('KEYMIRROR_QUERY_ENDPOINT', '');
      vi.stubEnv('KEYMIRROR_METADATA_ENDPOINT', '');
      vi.stubEnv('KEYMIRROR_REQUEST_TIMEOUT_MS', '');
      vi.stubEnv('KEYMIRROR_STORE_PATH', '');
      const config = getConfig();
      expect(config.remote.queryEndpoint).toBe('https://oryx.zsa.io/graphql');
      expect(config.remote.metadataEndpoint).toBe('https://configure.zsa.io/metadata.json');
      expect(config.remote.requestTimeoutMs).toBe(30000);
      expect(config.store.defaultPath).toBe('~/.config/.keymapp/keymapp.sqlite3');
    });

    it('returns the same singleton instance', () => {
      const config1 = getConfig();
      const config2 = getConfig();
      expect(config1).toBe(config2);
    });

    it('reads endpoints and timeout from the environment', () => {
      vi.stubEnv('KEYMIRROR_QUERY_ENDPOINT', 'http://localhost:4000/graphql');
      vi.stubEnv('KEYMIRROR_METADATA_ENDPOINT', 'http://localhost:4000/metadata.json');
      vi.stubEnv('KEYMIRROR_REQUEST_TIMEOUT_MS', '5000');
      vi.stubEnv('KEYMIRROR_STORE_PATH', '/tmp/keymapp.sqlite3');
      const config = getConfig();
      expect(config.remote.queryEndpoint).toBe('http://localhost:4000/graphql');
      expect(config.remote.metadataEndpoint).toBe('http://localhost:4000/metadata.json');
      expect(config.remote.requestTimeoutMs).toBe(5000);
      expect(config.store.defaultPath).toBe('/tmp/keymapp.sqlite3');
    });

    it('falls back when the timeout is not a usable number', () => {
      vi.stubEnv('KEYMIRROR_REQUEST_TIMEOUT_MS', 'soon');
      expect(getConfig().remote.requestTimeoutMs).toBe(30000);
      resetConfig();
      vi.stubEnv('KEYMIRROR_REQUEST_TIMEOUT_MS', '-1');
      expect(getConfig().remote.requestTimeoutMs).toBe(30000);
    });

    it('accepts 0 to disable the request deadline', () => {
      vi.stubEnv('KEYMIRROR_REQUEST_TIMEOUT_MS', '0');
      expect(getConfig().remote.requestTimeoutMs).toBe(0);
    });

  });

  describe('resetConfig', () => {
    it('resets and reloads config', () => {
      const config1 = getConfig();
      resetConfig();
      const config2 = getConfig();
      // Different object reference after reset
      expect(config1).not.toBe(config2);
      // But same values
      expect(config2.remote).toEqual(config1.remote);
    });
  });

  describe('setConfig', () => {
    it('overrides specific values', () => {
      const before = getConfig().remote;
      setConfig({ store: { defaultPath: '/srv/keymapp.sqlite3' } });
      const config = getConfig();
      expect(config.store.defaultPath).toBe('/srv/keymapp.sqlite3');
      // Other values unchanged
      expect(config.remote).toEqual(before);
    });
  });
});
