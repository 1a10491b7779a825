/**
 * Comtrade Client Unit Tests
 *
 * Token resolution, parameter allow-lists, envelope checks and bulk archives,
 * all against a mocked transport.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { strToU8, zipSync } from 'fflate';
import type { HttpTransport, Logger, RawHttpResponse } from '@comtrade/http-core';
import { ComtradeClient, createComtradeClient } from '../comtradeClient';
import type {
  BulkDownloadParams,
  BulkViewParams,
  ComtradeClientConfig,
  TradeQueryParams,
  ViewParams,
} from '../types';
import { ComtradeConfigError, ComtradeParameterError, ComtradeQueryError } from '../types';

const TOKEN = 'a'.repeat(152);
const BASE_URL = 'https://comtrade.test/api/';

const bytesResponse = (body: Uint8Array, status = 200, url?: string): RawHttpResponse => ({
  status,
  headers: {},
  body,
  url,
});

const jsonResponse = (body: unknown, status = 200, url?: string): RawHttpResponse =>
  bytesResponse(new TextEncoder().encode(JSON.stringify(body)), status, url);

const textResponse = (text: string, status = 200): RawHttpResponse =>
  bytesResponse(new TextEncoder().encode(text), status);

const tradeEnvelope = {
  validation: { status: { name: 'Ok', value: 0 }, count: { value: 2 } },
  dataset: [
    { rtCode: 842, ptCode: 0, rgDesc: 'Export', TradeValue: 1500 },
    { rtCode: 842, ptCode: 0, rgDesc: 'Import', TradeValue: 2500 },
  ],
};

describe('ComtradeClient', () => {
  let logger: Logger;
  let transport: Mock<HttpTransport>;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    transport = vi.fn<HttpTransport>();
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.unstubAllEnvs();
  });

  const createClient = (overrides: Partial<ComtradeClientConfig> = {}) =>
    new ComtradeClient({
      baseUrl: BASE_URL,
      token: TOKEN,
      transport,
      logger,
      baseRetryDelayMs: 0,
      ...overrides,
    });

  const requestedUrl = (call = 0): string | undefined => transport.mock.calls[call]?.[0].url;

  describe('token resolution', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await mkdtemp(path.join(os.tmpdir(), 'comtrade-token-'));
    });

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true });
    });

    it('keeps a token of exactly 152 characters', () => {
      const client = createClient();

      expect(client.token).toBe(TOKEN);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('truncates long tokens to 152 characters with a warning', () => {
      const client = createClient({ token: 'b'.repeat(200) });

      expect(client.token).toBe('b'.repeat(152));
      expect(logger.warn).toHaveBeenCalledWith('API token too long, using first 152 characters', {
        source: 'explicit',
        length: 200,
      });
    });

    it('rejects short tokens at construction', () => {
      expect(() => createClient({ token: 'short-token' })).toThrow(ComtradeConfigError);
      expect(() => createClient({ token: 'short-token' })).toThrow(
        'API token from explicit is too short (11 characters). Should be 152 chars',
      );
      expect(transport).not.toHaveBeenCalled();
    });

    it('reads the token from the environment when none is given', () => {
      const client = createClient({ token: undefined, env: { COMTRADE_TOKEN: TOKEN } });

      expect(client.token).toBe(TOKEN);
    });

    it('truncates long tokens taken from the environment', () => {
      const client = createClient({ token: undefined, env: { COMTRADE_TOKEN: 'c'.repeat(160) } });

      expect(client.token).toBe('c'.repeat(152));
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('prefers the explicit token over the environment', () => {
      const client = createClient({ token: TOKEN, env: { COMTRADE_TOKEN: 'e'.repeat(152) } });

      expect(client.token).toBe(TOKEN);
    });

    it('truncates long tokens read from the token file', async () => {
      const tokenFile = path.join(tmpDir, '.comtraderc');
      await writeFile(tokenFile, `${'d'.repeat(170)}\n`, 'utf-8');

      const client = createClient({ token: undefined, env: {}, tokenFile });

      expect(client.token).toBe('d'.repeat(152));
      expect(logger.warn).toHaveBeenCalledWith('API token too long, using first 152 characters', {
        source: 'file',
        length: 170,
      });
    });

    it('falls back to the trimmed contents of the token file', async () => {
      const tokenFile = path.join(tmpDir, '.comtraderc');
      await writeFile(tokenFile, `  ${TOKEN}\n`, 'utf-8');

      const client = createClient({ token: undefined, env: {}, tokenFile });

      expect(client.token).toBe(TOKEN);
    });

    it('prefers the environment over the token file', async () => {
      const tokenFile = path.join(tmpDir, '.comtraderc');
      await writeFile(tokenFile, 'f'.repeat(152), 'utf-8');

      const client = createClient({
        token: undefined,
        env: { COMTRADE_TOKEN: TOKEN },
        tokenFile,
      });

      expect(client.token).toBe(TOKEN);
    });

    it('warns and continues without a token when no source has one', () => {
      const client = createClient({
        token: undefined,
        env: {},
        tokenFile: path.join(tmpDir, 'missing'),
      });

      expect(client.token).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Comtrade token not detected, usage may be limited.');
    });
  });

  describe('parameter allow-lists', () => {
    it('rejects unknown get parameters before any request', async () => {
      const client = createClient();
      const params: TradeQueryParams & { bogus: string } = { r: '842', bogus: '1' };

      await expect(client.get(params)).rejects.toThrow('Argument bogus not allowed for method get');
      expect(transport).not.toHaveBeenCalled();
    });

    it('rejects trade-only parameters on view', async () => {
      const client = createClient();
      const params: ViewParams & { cc: string } = { r: 842, cc: 'TOTAL' };

      const error = await client.view(params).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ComtradeParameterError);
      expect(error).toMatchObject({ method: 'view', parameter: 'cc' });
      expect(transport).not.toHaveBeenCalled();
    });

    it('rejects unknown viewBulk parameters before any request', async () => {
      const client = createClient();
      const params: BulkViewParams & { rg: number } = { r: 842, rg: 1 };

      await expect(client.viewBulk(params)).rejects.toThrow('Argument rg not allowed for method viewBulk');
      expect(transport).not.toHaveBeenCalled();
    });

    it('rejects unknown getBulk parameters before any request', async () => {
      const client = createClient();
      const params: BulkDownloadParams & { max: number } = {
        type: 'C',
        freq: 'A',
        ps: 2014,
        r: 842,
        px: 'HS',
        max: 10,
      };

      await expect(client.getBulk(params)).rejects.toThrow('Argument max not allowed for method getBulk');
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('get', () => {
    it('returns the dataset as a table with the resolved URL', async () => {
      transport.mockResolvedValueOnce(jsonResponse(tradeEnvelope));
      const client = createClient();

      const result = await client.get({ r: 842, ps: 2014 });

      expect(requestedUrl()).toBe(`${BASE_URL}get?r=842&ps=2014&token=${TOKEN}`);
      expect(result.url).toBe(`${BASE_URL}get?r=842&ps=2014&token=${TOKEN}`);
      expect(result.validation).toEqual(tradeEnvelope.validation);
      expect(result.dataset.rowCount).toBe(2);
      expect(result.dataset.columns).toEqual(['rtCode', 'ptCode', 'rgDesc', 'TradeValue']);
      expect(result.dataset.column('TradeValue')).toEqual([1500, 2500]);
    });

    it('reports the URL the transport ended up at', async () => {
      transport.mockResolvedValueOnce(
        jsonResponse(tradeEnvelope, 200, 'https://mirror.comtrade.test/api/get?r=842'),
      );
      const client = createClient();

      const result = await client.get({ r: 842 });

      expect(result.url).toBe('https://mirror.comtrade.test/api/get?r=842');
    });

    it('sends a caller-supplied token instead of the stored one', async () => {
      transport.mockResolvedValueOnce(jsonResponse(tradeEnvelope));
      const client = createClient();

      await client.get({ r: 842, token: 'other-token' });

      expect(requestedUrl()).toBe(`${BASE_URL}get?r=842&token=other-token`);
    });

    it('omits the token parameter when the client has none', async () => {
      transport.mockResolvedValueOnce(jsonResponse(tradeEnvelope));
      const client = createClient({ token: undefined });

      await client.get({ r: 842 });

      expect(requestedUrl()).toBe(`${BASE_URL}get?r=842`);
    });

    it('treats an empty dataset as a query error', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ validation: {}, dataset: [] }));
      const client = createClient();

      const error = await client.get({ r: 842 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ComtradeQueryError);
      expect(error).toMatchObject({
        message: 'Query indicates success, but the dataset is empty',
        status: 200,
      });
    });

    it('fails when the envelope has no validation', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ dataset: tradeEnvelope.dataset }));
      const client = createClient();

      await expect(client.get({ r: 842 })).rejects.toThrow(
        "Query indicates success, but doesn't contain validation",
      );
    });

    it('fails when the envelope has no dataset', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ validation: {} }));
      const client = createClient();

      await expect(client.get({ r: 842 })).rejects.toThrow(
        "Query indicates success, but doesn't contain dataset",
      );
    });

    it('fails on non-200 statuses with the server response', async () => {
      transport.mockResolvedValueOnce(textResponse('boom', 500));
      const client = createClient();

      const error = await client.get({ r: 842 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ComtradeQueryError);
      expect(error).toMatchObject({
        message: 'Query failed with status code 500. Response from server was\nboom',
        status: 500,
      });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('fails on 200 responses that are not JSON', async () => {
      transport.mockResolvedValueOnce(textResponse('<html>maintenance</html>'));
      const client = createClient();

      await expect(client.get({ r: 842 })).rejects.toThrow(
        /^Query indicates success, but the response is not valid JSON/,
      );
    });

    it('retries connection failures', async () => {
      transport
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce(jsonResponse(tradeEnvelope));
      const client = createClient({ maxRetries: 3 });

      const result = await client.get({ r: 842 });

      expect(result.dataset.rowCount).toBe(2);
      expect(transport).toHaveBeenCalledTimes(3);
    });

    it('gives up after maxRetries connection failures', async () => {
      transport.mockRejectedValue(new Error('ECONNREFUSED'));
      const client = createClient({ maxRetries: 1 });

      await expect(client.get({ r: 842 })).rejects.toThrow('ECONNREFUSED');
      expect(transport).toHaveBeenCalledTimes(2);
    });
  });

  describe('view and viewBulk', () => {
    it('queries refs/da/view', async () => {
      transport.mockResolvedValueOnce(
        jsonResponse({ validation: null, dataset: [{ r: '842', px: 'HS', ps: '2014' }] }),
      );
      const client = createClient();

      const result = await client.view({ r: 842, px: 'HS' });

      expect(requestedUrl()).toBe(`${BASE_URL}refs/da/view?r=842&px=HS&token=${TOKEN}`);
      expect(result.validation).toBeNull();
      expect(result.dataset.row(0)).toEqual({ r: '842', px: 'HS', ps: '2014' });
    });

    it('queries refs/da/bulk with a publication date', async () => {
      transport.mockResolvedValueOnce(
        jsonResponse({ validation: null, dataset: [{ name: 'C_A_842_2014_HS.zip' }] }),
      );
      const client = createClient();

      await client.viewBulk({ type: 'C', from: '2020-01-01' });

      expect(requestedUrl()).toBe(`${BASE_URL}refs/da/bulk?type=C&from=2020-01-01&token=${TOKEN}`);
    });
  });

  describe('getBulk', () => {
    const bulkParams: BulkDownloadParams = { type: 'C', freq: 'A', ps: 2014, r: 842, px: 'HS' };

    it('reads the first archive entry as CSV', async () => {
      const archive = zipSync({ 'type-C_r-842_ps-2014.csv': strToU8('a,b\n1,x\n2,y\n') });
      transport.mockResolvedValueOnce(bytesResponse(archive));
      const client = createClient();

      const result = await client.getBulk(bulkParams);

      expect(requestedUrl()).toBe(`${BASE_URL}get/bulk/C/A/2014/842/HS?token=${TOKEN}`);
      expect(result.url).toBe(`${BASE_URL}get/bulk/C/A/2014/842/HS?token=${TOKEN}`);
      expect(result.validation).toEqual({});
      expect(result.dataset.columns).toEqual(['a', 'b']);
      expect(result.dataset.rowCount).toBe(2);
      expect(result.dataset.toRecords()).toEqual([
        { a: '1', b: 'x' },
        { a: '2', b: 'y' },
      ]);
    });

    it('fails for an archive without files', async () => {
      transport.mockResolvedValueOnce(bytesResponse(zipSync({})));
      const client = createClient();

      await expect(client.getBulk(bulkParams)).rejects.toThrow('Bulk download archive contains no files');
    });

    it('fails for an archive whose entry has a header but no rows', async () => {
      transport.mockResolvedValueOnce(bytesResponse(zipSync({ 'trade.csv': strToU8('a,b\n') })));
      const client = createClient();

      const error = await client.getBulk(bulkParams).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ComtradeQueryError);
      expect(error).toMatchObject({ message: 'Bulk download archive entry contains no rows' });
    });

    it('fails for an archive whose entry is empty', async () => {
      transport.mockResolvedValueOnce(bytesResponse(zipSync({ 'trade.csv': new Uint8Array(0) })));
      const client = createClient();

      await expect(client.getBulk(bulkParams)).rejects.toThrow('Bulk download archive entry contains no rows');
    });

    it('fails for a body that is not an archive', async () => {
      transport.mockResolvedValueOnce(textResponse('not an archive'));
      const client = createClient();

      const error = await client.getBulk(bulkParams).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ComtradeQueryError);
      expect(error).toMatchObject({ message: expect.stringMatching(/^Bulk download is not a readable ZIP archive/) });
    });
  });

  describe('tokens and user info', () => {
    it('returns the sub-user token', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ token: 'sub-user-token' }));
      const client = createClient();

      await expect(client.getSubUserToken('analyst@example.com')).resolves.toBe('sub-user-token');
      expect(requestedUrl()).toBe(`${BASE_URL}getSubUserToken?email=analyst%40example.com`);
    });

    it('fails when the token field is missing', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ message: 'unknown email' }));
      const client = createClient();

      await expect(client.getSubUserToken('analyst@example.com')).rejects.toThrow(
        'Query failed to return a valid token',
      );
    });

    it('requests an auth token with username and password', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ token: 'auth-token' }));
      const client = createClient();

      await expect(client.getAuthToken('analyst', 'test-password')).resolves.toBe('auth-token');
      expect(requestedUrl()).toBe(`${BASE_URL}getAuthToken?username=analyst&password=test-password`);
    });

    it('falls back to the stored token for user info', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ user: 'analyst', ip: '127.0.0.1' }));
      const client = createClient();

      await expect(client.getUserInfo()).resolves.toEqual({ user: 'analyst', ip: '127.0.0.1' });
      expect(requestedUrl()).toBe(`${BASE_URL}getUserInfo?token=${TOKEN}`);
    });

    it('fails for user info without any token before any request', async () => {
      const client = createClient({ token: undefined });

      await expect(client.getUserInfo()).rejects.toThrow(ComtradeParameterError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('saves the sub-user token to the token file', async () => {
      const tmpDir = await mkdtemp(path.join(os.tmpdir(), 'comtrade-save-'));
      const tokenFile = path.join(tmpDir, '.comtraderc');
      transport.mockResolvedValueOnce(jsonResponse({ token: 'sub-user-token' }));
      const client = createClient({ tokenFile });

      try {
        await client.saveSubUserToken('analyst@example.com');

        await expect(readFile(tokenFile, 'utf-8')).resolves.toBe('sub-user-token');
        expect(logger.info).toHaveBeenCalledWith(`Token saved to ${tokenFile}`);
      } finally {
        await rm(tmpDir, { recursive: true, force: true });
      }
    });

    it('refuses to save a token without a token file', async () => {
      const client = createClient();

      await expect(client.saveSubUserToken('analyst@example.com')).rejects.toThrow('No token file configured');
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe('createComtradeClient', () => {
    it('reads token and base URL from the environment', () => {
      vi.stubEnv('COMTRADE_TOKEN', TOKEN);
      vi.stubEnv('COMTRADE_API_BASE', 'https://env.comtrade.test/api/');

      const client = createComtradeClient({ transport, logger });

      expect(client.token).toBe(TOKEN);
      expect(client.baseUrl).toBe('https://env.comtrade.test/api/');
    });
  });
});
