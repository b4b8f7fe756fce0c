/**
 * Dataset resources test suite
 * Tests listing, retrieval, upsert and delete against a faked dataset API
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  deleteDataset,
  deriveIdentifier,
  extractRecord,
  fetchDataset,
  listDatasetIdentifiers,
  normalizeListing,
  upsertDataset,
} from '@/lib/dataset-api/resources/datasets';
import { DeleteError, FetchError, ListingError, UpsertError } from '@/lib/dataset-api/errors';
import { DatasetHttpClient } from '@/lib/dataset-api/http/client';
import { installFakeApi, silenceLogs } from '../helpers/fake-api';

const TOKEN = 'test-token';

describe('normalizeListing', () => {
  it('should accept a bare array', () => {
    expect(normalizeListing(['A', 'B'])).toEqual(['A', 'B']);
  });

  it('should unwrap the known list keys', () => {
    expect(normalizeListing({ items: ['A'] })).toEqual(['A']);
    expect(normalizeListing({ datasets: ['B'] })).toEqual(['B']);
    expect(normalizeListing({ data: ['C'] })).toEqual(['C']);
  });

  it('should look inside a value envelope', () => {
    expect(normalizeListing({ value: { values: ['X1', 'X2'] } })).toEqual(['X1', 'X2']);
  });

  it('should treat any other shape as a single entry', () => {
    expect(normalizeListing({ code: 'Only' })).toEqual([{ code: 'Only' }]);
  });
});

describe('deriveIdentifier', () => {
  it('should use the first present identifier field', () => {
    expect(deriveIdentifier('Plain')).toBe('Plain');
    expect(deriveIdentifier({ code: 'A', id: 1 })).toBe('A');
    expect(deriveIdentifier({ datasetCode: 'B' })).toBe('B');
    expect(deriveIdentifier({ id: 7 })).toBe('7');
    expect(deriveIdentifier({ name: 'N' })).toBe('N');
  });

  it('should treat an identifier field holding null as present', () => {
    expect(deriveIdentifier({ code: null, name: 'N' })).toBe('null');
  });

  it('should serialize entries without an identifier field', () => {
    expect(deriveIdentifier({ other: 1 })).toBe('{"other":1}');
    expect(deriveIdentifier(42)).toBe('42');
  });
});

describe('extractRecord', () => {
  it('should read the record inside a value envelope', () => {
    expect(extractRecord({ value: { code: 'X', body: 'abc', inputs: null } }, 'X')).toEqual({
      code: 'X',
      body: 'abc',
      inputs: null,
    });
  });

  it('should fall back to the requested identifier for the code', () => {
    expect(extractRecord({ bodyMeta: { a: 1 } }, 'Requested')).toEqual({ code: 'Requested', bodyMeta: { a: 1 } });
  });
});

describe('dataset resources', () => {
  const client = new DatasetHttpClient();

  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('listDatasetIdentifiers', () => {
    it('should list identifiers from the first endpoint', async () => {
      const api = installFakeApi({
        'POST api.test/dataset/list': { status: 200, json: { value: { values: ['X1', 'X2'] } } },
      });

      expect(await listDatasetIdentifiers(client, TOKEN, 'api.test')).toEqual(['X1', 'X2']);
      expect(api.calls[0].headers.authorization).toBe('Bearer test-token');
    });

    it('should fall through to the next endpoint', async () => {
      const api = installFakeApi({
        'GET api.test/datasets': {
          status: 200,
          json: [{ code: 'A' }, { datasetCode: 'B' }, { id: 7 }, { name: 'N' }, { other: 1 }],
        },
      });

      expect(await listDatasetIdentifiers(client, TOKEN, 'api.test')).toEqual(['A', 'B', '7', 'N', '{"other":1}']);
      expect(api.calls.map(call => `${call.method} ${call.route}`)).toEqual([
        'POST api.test/dataset/list',
        'GET api.test/datasets',
      ]);
    });

    it('should stop on a success response that is not JSON', async () => {
      const api = installFakeApi({
        'POST api.test/dataset/list': { status: 200, text: '<html>maintenance</html>' },
      });

      const error = await listDatasetIdentifiers(client, TOKEN, 'api.test').catch(e => e);

      expect(error).toBeInstanceOf(ListingError);
      expect(error.message).toBe('Dataset listing returned invalid JSON.');
      expect(api.calls).toHaveLength(1);
    });

    it('should fail once every endpoint is exhausted', async () => {
      installFakeApi();

      const error = await listDatasetIdentifiers(client, TOKEN, 'api.test').catch(e => e);

      expect(error).toBeInstanceOf(ListingError);
      expect(error.message).toBe('Failed to fetch dataset codes from known endpoints.');
      expect(error.attempts).toHaveLength(4);
    });
  });

  describe('fetchDataset', () => {
    it('should retrieve a dataset from the first endpoint that returns an object', async () => {
      const api = installFakeApi({
        'GET api.test/dataset/get/ExampleCode1': { status: 200, json: 'not an object' },
        'GET api.test/datasets/ExampleCode1': {
          status: 200,
          json: { value: { code: 'ExampleCode1', bodyMeta: 'eyJhIjoyfQ==', body: 'eyJhIjoxfQ==' } },
        },
      });

      expect(await fetchDataset(client, TOKEN, 'api.test', 'ExampleCode1')).toEqual({
        code: 'ExampleCode1',
        bodyMeta: 'eyJhIjoyfQ==',
        body: 'eyJhIjoxfQ==',
      });
      expect(api.calls).toHaveLength(2);
    });

    it('should URL-encode the identifier in the path', async () => {
      const api = installFakeApi({
        'GET api.test/dataset/get/team%2Freport%201': { status: 200, json: { code: 'team/report 1' } },
      });

      await fetchDataset(client, TOKEN, 'api.test', 'team/report 1');

      expect(api.calls[0].url).toBe('https://api.test/dataset/get/team%2Freport%201');
    });

    it('should fail once every endpoint is exhausted', async () => {
      installFakeApi();

      const error = await fetchDataset(client, TOKEN, 'api.test', 'Missing').catch(e => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error.message).toBe("Failed to fetch dataset 'Missing' from API.");
      expect(error.attempts.map((attempt: { url: string }) => attempt.url)).toEqual([
        'https://api.test/dataset/get/Missing',
        'https://api.test/datasets/Missing',
        'https://api.test/data/datasets/Missing',
        'https://api.test/api/datasets/Missing',
      ]);
    });
  });

  describe('upsertDataset', () => {
    const record = { code: 'ExampleCode1', body: 'eyJhIjoxfQ==' };

    it('should send the record to the first endpoint', async () => {
      const api = installFakeApi({
        'PUT api.test/datasets/ExampleCode1': { status: 200, json: { saved: true } },
      });

      const result = await upsertDataset(client, TOKEN, 'api.test', 'ExampleCode1', record);

      expect(result).toEqual({
        identifier: 'ExampleCode1',
        method: 'PUT',
        url: 'https://api.test/datasets/ExampleCode1',
        status: 200,
        response: { saved: true },
      });
      expect(api.calls[0].body).toEqual(record);
    });

    it('should keep a non-JSON response as status text', async () => {
      installFakeApi({
        'POST api.test/datasets': { status: 201, text: ' Created \n' },
      });

      const result = await upsertDataset(client, TOKEN, 'api.test', 'ExampleCode1', record);

      expect(result.method).toBe('POST');
      expect(result.status).toBe(201);
      expect(result.response).toEqual({ statusText: 'Created' });
    });

    it('should record exactly one attempt per candidate when all are rejected', async () => {
      const api = installFakeApi({
        'PUT api.test/datasets/ExampleCode1': { status: 500, text: 'server error' },
        'POST api.test/datasets': { status: 409, text: 'conflict' },
        'POST api.test/datasets/ExampleCode1/upsert': { networkError: 'socket hang up' },
      });

      const error = await upsertDataset(client, TOKEN, 'api.test', 'ExampleCode1', record).catch(e => e);

      expect(error).toBeInstanceOf(UpsertError);
      expect(error.attempts).toEqual([
        { method: 'PUT', url: 'https://api.test/datasets/ExampleCode1', status: 500, detail: 'server error' },
        { method: 'POST', url: 'https://api.test/datasets', status: 409, detail: 'conflict' },
        { method: 'POST', url: 'https://api.test/datasets/ExampleCode1/upsert', status: 'error', detail: 'socket hang up' },
      ]);
      expect(api.calls).toHaveLength(3);
    });
  });

  describe('deleteDataset', () => {
    it('should accept 204', async () => {
      const api = installFakeApi({
        'DELETE api.test/datasets/ExampleCode1': { status: 204 },
      });

      expect(await deleteDataset(client, TOKEN, 'api.test', 'ExampleCode1')).toEqual({
        status: 'deleted',
        code: 'ExampleCode1',
      });
      expect(api.calls[0].body).toBeUndefined();
    });

    it('should report the status and body of a rejected delete', async () => {
      installFakeApi();

      const error = await deleteDataset(client, TOKEN, 'api.test', 'ExampleCode1').catch(e => e);

      expect(error).toBeInstanceOf(DeleteError);
      expect(error.message).toBe('Delete failed (404): Not Found');
      expect(error.statusCode).toBe(404);
    });
  });
});

describe('DatasetHttpClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should send the token in a custom header when configured', async () => {
    silenceLogs();
    const api = installFakeApi({ 'GET api.test/datasets': { status: 200, json: [] } });
    const headerClient = new DatasetHttpClient({ tokenHeader: { kind: 'header', name: 'X-KSYS-TOKEN' } });

    await headerClient.request('https://api.test/datasets', { token: TOKEN });

    expect(api.calls[0].headers['x-ksys-token']).toBe('test-token');
    expect(api.calls[0].headers.authorization).toBeUndefined();
  });
});
