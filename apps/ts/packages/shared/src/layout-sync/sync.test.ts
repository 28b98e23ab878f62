import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MetadataClient } from '../clients/layout/MetadataClient';
import { RevisionClient } from '../clients/layout/RevisionClient';
import type { MetadataFetcher, RevisionFetcher, RevisionPayload } from '../clients/layout/types';
import { DrizzleLayoutStore } from '../db/drizzle-layout-store';
import { FetchFailedError, InvalidAddressError, MalformedResponseError } from '../errors';
import { createMockTextResponse, stubFetch } from '../test-utils/fetch-mock';
import { SilentLogger } from '../utils/logger';
import { syncLayout } from './sync';
import type { LayoutStoreWriter, LayoutSyncStage } from './types';

const ADDRESS = 'https://configure.zsa.io/ErgoDox/layouts/abcd1234/efgh5678/';
const QUERY_ENDPOINT = 'https://layouts.example.test/graphql';
const METADATA_ENDPOINT = 'https://layouts.example.test/metadata.json';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'layout-sync-'));
}

function createRevisionFetcher(payload: RevisionPayload) {
  return { fetchRevision: vi.fn<RevisionFetcher['fetchRevision']>().mockResolvedValue(payload) };
}

function createMetadataFetcher(document = Buffer.from('{"version":1}')) {
  return { fetchMetadata: vi.fn<MetadataFetcher['fetchMetadata']>().mockResolvedValue(document) };
}

function readStore<T>(storePath: string, read: (store: DrizzleLayoutStore) => T): T {
  const store = new DrizzleLayoutStore(storePath);
  try {
    return read(store);
  } finally {
    store.close();
  }
}

describe('syncLayout', () => {
  let tempDir: string;
  let storePath: string;

  beforeEach(() => {
    tempDir = createTempDir();
    storePath = path.join(tempDir, 'nested', 'keymapp.sqlite3');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the store, seeds defaults, stores metadata and the revision', async () => {
    const revisionFetcher = createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{"a":1}') });
    const metadataFetcher = createMetadataFetcher(Buffer.from('{"version":1}'));

    const result = await syncLayout({ address: ADDRESS, storePath }, { revisionFetcher, metadataFetcher });

    expect(result).toEqual({
      address: { geometry: 'ErgoDox', layoutId: 'abcd1234', revisionId: 'efgh5678' },
      revisionId: 'efgh5678',
      revisionBytes: 7,
      metadataFetched: true,
      metadataBytes: 13,
      seededKeys: [
        'prompt_update_check',
        'update_check',
        'startup_minimized',
        'startup_autoconnect',
        'smart_layers_enabled',
        'api_enabled',
        'api_port',
      ],
      storePath,
    });
    expect(revisionFetcher.fetchRevision).toHaveBeenCalledWith({
      geometry: 'ErgoDox',
      layoutId: 'abcd1234',
      revisionId: 'efgh5678',
    });

    readStore(storePath, (store) => {
      expect(store.countTable('config')).toBe(7);
      expect(store.getMetadata()?.toString()).toBe('{"version":1}');
      expect(store.listRevisions()).toEqual([{ revisionId: 'efgh5678', size: 7 }]);
    });
  });

  it('skips the metadata fetch when metadata is already stored', async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    readStore(storePath, (store) => store.insertMetadata(Buffer.from('{"version":0}')));

    const revisionFetcher = createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{}') });
    const metadataFetcher = createMetadataFetcher();

    const result = await syncLayout({ address: ADDRESS, storePath }, { revisionFetcher, metadataFetcher });

    expect(metadataFetcher.fetchMetadata).toHaveBeenCalledTimes(0);
    expect(result.metadataFetched).toBe(false);
    expect(result.metadataBytes).toBe(0);
    readStore(storePath, (store) => {
      expect(store.countMetadata()).toBe(1);
      expect(store.getMetadata()?.toString()).toBe('{"version":0}');
    });
  });

  it('replaces the payload when the same revision is synced again', async () => {
    const metadataFetcher = createMetadataFetcher();

    await syncLayout(
      { address: ADDRESS, storePath },
      { revisionFetcher: createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{"v":1}') }), metadataFetcher }
    );
    const second = await syncLayout(
      { address: ADDRESS, storePath },
      { revisionFetcher: createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{"v":2}') }), metadataFetcher }
    );

    expect(second.seededKeys).toEqual([]);
    expect(metadataFetcher.fetchMetadata).toHaveBeenCalledTimes(1);
    readStore(storePath, (store) => {
      expect(store.countTable('revision')).toBe(1);
      expect(store.countTable('config')).toBe(7);
      expect(store.getRevision('efgh5678')?.toString()).toBe('{"v":2}');
    });
  });

  it('keys the row by the revision id the service reports', async () => {
    const revisionFetcher = createRevisionFetcher({ revisionId: 'latest-hash', data: Buffer.from('{}') });

    const result = await syncLayout(
      { address: 'https://configure.zsa.io/moonlander/layouts/abcd1234/latest/', storePath },
      { revisionFetcher, metadataFetcher: createMetadataFetcher() }
    );

    expect(result.address.revisionId).toBe('latest');
    expect(result.revisionId).toBe('latest-hash');
    readStore(storePath, (store) => {
      expect(store.getRevision('latest-hash')?.toString()).toBe('{}');
      expect(store.getRevision('latest')).toBeNull();
    });
  });

  it('rejects an invalid address before any remote call or store access', async () => {
    const revisionFetcher = createRevisionFetcher({ revisionId: 'x', data: Buffer.from('{}') });
    const openStore = vi.fn<(storePath: string) => LayoutStoreWriter>();

    await expect(
      syncLayout(
        { address: 'https://configure.zsa.io/ErgoDox/layouts/', storePath },
        { revisionFetcher, metadataFetcher: createMetadataFetcher(), openStore }
      )
    ).rejects.toBeInstanceOf(InvalidAddressError);

    expect(revisionFetcher.fetchRevision).not.toHaveBeenCalled();
    expect(openStore).not.toHaveBeenCalled();
    expect(fs.existsSync(path.dirname(storePath))).toBe(false);
  });

  it('does not create the store when the revision fetch fails', async () => {
    const revisionFetcher = {
      fetchRevision: vi
        .fn<RevisionFetcher['fetchRevision']>()
        .mockRejectedValue(new FetchFailedError('Failed to get revision data: fetch failed', QUERY_ENDPOINT)),
    };

    await expect(
      syncLayout({ address: ADDRESS, storePath }, { revisionFetcher, metadataFetcher: createMetadataFetcher() })
    ).rejects.toBeInstanceOf(FetchFailedError);

    expect(fs.existsSync(storePath)).toBe(false);
  });

  it('closes the store and skips the revision write when the metadata fetch fails', async () => {
    const close = vi.fn();
    const upsertRevision = vi.fn();
    const store: LayoutStoreWriter = {
      seedDefaultConfig: () => [],
      countMetadata: () => 0,
      insertMetadata: vi.fn(),
      upsertRevision,
      close,
    };
    const metadataFetcher = {
      fetchMetadata: vi
        .fn<MetadataFetcher['fetchMetadata']>()
        .mockRejectedValue(new FetchFailedError('Failed to get metadata: fetch failed', METADATA_ENDPOINT)),
    };

    await expect(
      syncLayout(
        { address: ADDRESS, storePath },
        {
          revisionFetcher: createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{}') }),
          metadataFetcher,
          openStore: () => store,
          ensureDirectory: () => undefined,
        }
      )
    ).rejects.toThrow('Failed to get metadata: fetch failed');

    expect(upsertRevision).not.toHaveBeenCalled();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('leaves directory creation to the caller when disabled', async () => {
    const ensureDirectory = vi.fn();
    const openStore = vi.fn<(storePath: string) => LayoutStoreWriter>().mockReturnValue({
      seedDefaultConfig: () => [],
      countMetadata: () => 1,
      insertMetadata: vi.fn(),
      upsertRevision: vi.fn(),
      close: vi.fn(),
    });

    await syncLayout(
      { address: ADDRESS, storePath, createDirectories: false },
      {
        revisionFetcher: createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{}') }),
        metadataFetcher: createMetadataFetcher(),
        openStore,
        ensureDirectory,
      }
    );

    expect(ensureDirectory).not.toHaveBeenCalled();
    expect(openStore).toHaveBeenCalledWith(storePath);
  });

  it('reports progress through every stage in order', async () => {
    const stages: LayoutSyncStage[] = [];

    await syncLayout(
      { address: ADDRESS, storePath },
      {
        revisionFetcher: createRevisionFetcher({ revisionId: 'efgh5678', data: Buffer.from('{}') }),
        metadataFetcher: createMetadataFetcher(),
        logger: new SilentLogger(),
        onProgress: (stage) => stages.push(stage),
      }
    );

    expect(stages).toEqual(['address', 'revision', 'store', 'config', 'metadata', 'save']);
  });

  describe('with the remote clients', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('mirrors a revision end to end', async () => {
      const revisionBody = JSON.stringify({
        data: { layout: { hashId: 'abcd1234', title: 'Test layout', revision: { hashId: 'efgh5678' } } },
      });
      const fetchSpy = stubFetch().mockImplementation((input) =>
        Promise.resolve(
          String(input) === QUERY_ENDPOINT
            ? createMockTextResponse(revisionBody)
            : createMockTextResponse('{"geometries":["ergodox"]}')
        )
      );
      const clientOptions = {
        queryEndpoint: QUERY_ENDPOINT,
        metadataEndpoint: METADATA_ENDPOINT,
        timeoutMs: 0,
        logger: new SilentLogger(),
      };

      const result = await syncLayout(
        { address: ADDRESS, storePath },
        {
          revisionFetcher: new RevisionClient(clientOptions),
          metadataFetcher: new MetadataClient(clientOptions),
        }
      );

      expect(result.revisionId).toBe('efgh5678');
      expect(fetchSpy).toHaveBeenCalledTimes(2);
      readStore(storePath, (store) => {
        expect(store.listRevisions().map((row) => row.revisionId)).toEqual(['efgh5678']);
        expect(store.getRevision('efgh5678')?.toString()).toBe(
          '{"layout":{"hashId":"abcd1234","title":"Test layout","revision":{"hashId":"efgh5678"}}}'
        );
        expect(store.getMetadata()?.toString()).toBe('{"geometries":["ergodox"]}');
      });
    });

    it('fails without touching the store when the response lacks a revision id', async () => {
      stubFetch().mockResolvedValue(createMockTextResponse('{"data":{"layout":null}}'));

      await expect(
        syncLayout(
          { address: ADDRESS, storePath },
          {
            revisionFetcher: new RevisionClient({ queryEndpoint: QUERY_ENDPOINT, logger: new SilentLogger() }),
            metadataFetcher: createMetadataFetcher(),
          }
        )
      ).rejects.toBeInstanceOf(MalformedResponseError);

      expect(fs.existsSync(storePath)).toBe(false);
    });
  });
});
