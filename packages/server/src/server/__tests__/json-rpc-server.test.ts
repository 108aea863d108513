import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { JsonRpcError, JsonRpcResponse } from '@parmlens/types';
import { JsonRpcServer, JSON_RPC_ERROR_CODES } from '../json-rpc-server.js';
import { ParmLensService } from '../parmlens-service.js';
import { MINI_PARM7_PATH, testConfig } from '../../__tests__/helpers.js';

function errorOf(response: JsonRpcResponse): JsonRpcError {
  if (!('error' in response)) {
    throw new Error(`Expected error response: ${JSON.stringify(response)}`);
  }
  return response.error;
}

function resultOf(response: JsonRpcResponse): unknown {
  if ('error' in response) {
    throw new Error(`Unexpected error response: ${response.error.message}`);
  }
  return response.result;
}

describe('JsonRpcServer', () => {
  let server: JsonRpcServer;
  let nextId = 1;

  const call = (method: string, params?: unknown): Promise<JsonRpcResponse> =>
    server.dispatch({ jsonrpc: '2.0', id: nextId++, method, params });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    server = new JsonRpcServer(new ParmLensService(testConfig()), 'localhost', 0);
    nextId = 1;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('リクエスト検証', () => {
    it('jsonrpc が無いリクエストは Invalid Request', async () => {
      const response = await server.dispatch({ id: 1, method: 'getStatus' });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: JSON_RPC_ERROR_CODES.INVALID_REQUEST, message: 'Invalid Request' },
      });
    });

    it('オブジェクトでないボディは Invalid Request', async () => {
      const response = await server.dispatch('getStatus');
      expect(errorOf(response).code).toBe(-32600);
    });

    it('未知のメソッドは Method not found', async () => {
      const response = await call('foo');

      expect(response.id).toBe(1);
      expect(errorOf(response)).toEqual({ code: -32601, message: 'Method not found: foo' });
    });

    it('パラメータ不正は Invalid params', async () => {
      const response = await call('getAtom', { serial: 0 });
      const error = errorOf(response);

      expect(error.code).toBe(-32602);
      expect(error.message).toBe('Invalid params');
      expect(Array.isArray(error.data)).toBe(true);
    });

    it('未知のテーブル名は Invalid params', async () => {
      const response = await call('getTable', { table: 'residues' });
      expect(errorOf(response).code).toBe(-32602);
    });
  });

  describe('アプリケーションエラー', () => {
    it('ロード前の問い合わせはエラーペイロードを data に載せる', async () => {
      const response = await call('getAtom', { serial: 1 });

      expect(errorOf(response)).toEqual({
        code: -32000,
        message: 'No system loaded',
        data: { code: 'not_loaded', message: 'No system loaded' },
      });
    });

    it('存在しないファイルは file_not_found', async () => {
      const response = await call('load', { parm7Path: '/nonexistent/system.parm7' });

      expect(errorOf(response).data).toEqual({
        code: 'file_not_found',
        message: 'parm7 file not found',
        details: '/nonexistent/system.parm7',
      });
    });
  });

  describe('メソッド呼び出し', () => {
    it('load の後に select と getResidue を呼べる', async () => {
      const load = resultOf(await call('load', { parm7Path: MINI_PARM7_PATH }));
      expect(load).toMatchObject({ natoms: 6, nresidues: 2 });

      expect(resultOf(await call('select', { table: 'bond_types', row: 1, cursor: 1 }))).toEqual({
        mode: 'Bond',
        serials: [2, 4],
        index: 1,
        total: 2,
      });
      expect(resultOf(await call('getResidue', { resid: 1 }))).toEqual({
        segid: null,
        resid: 1,
        resname: 'MOL',
        serials: [1, 2, 3],
      });
    });

    it('queryAtoms は params を省略できる', async () => {
      await call('load', { parm7Path: MINI_PARM7_PATH });

      expect(resultOf(await call('queryAtoms'))).toEqual({
        serials: [1, 2, 3, 4, 5, 6],
        count: 6,
        truncated: false,
      });
    });

    it('getStatus はリクエスト数を種類別に集計する', async () => {
      await call('load', { parm7Path: MINI_PARM7_PATH });
      await call('highlight', { serials: [1] });
      await call('select', { table: 'atom_types', row: 0 });

      const status = resultOf(await call('getStatus'));

      expect(status).toMatchObject({
        server: {
          version: '0.1.0',
          requests: { total: 3, load: 1, highlight: 1, select: 1, tables: 0 },
        },
        model: { loaded: true, path: MINI_PARM7_PATH, natoms: 6 },
      });
    });
  });
});
