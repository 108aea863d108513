/**
 * parmlens JSON-RPCクライアント
 */

import type {
  AtomQueryFilters,
  GetAtomResponse,
  GetPdbResponse,
  GetResidueResponse,
  GetSectionsResponse,
  GetStatusResponse,
  GetTablesResponse,
  GetTextResponse,
  HighlightResult,
  JsonRpcError,
  JsonRpcRequest,
  LoadRequest,
  LoadResponse,
  QueryAtomsResponse,
  SelectionResult,
  SystemTable,
  TableName,
} from '@parmlens/types';

/**
 * クライアント設定
 */
export interface ParmLensClientConfig {
  /** サーバURL（デフォルト: http://localhost:24310） */
  baseUrl?: string;
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeout?: number;
}

/**
 * JSON-RPCエラー
 */
export class JsonRpcClientError extends Error {
  constructor(
    message: string,
    public readonly code: number,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcClientError';
  }
}

function isJsonRpcError(value: unknown): value is JsonRpcError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'number' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * parmlensクライアント
 *
 * HTTPサーバとJSON-RPC 2.0で通信し、トポロジの読み込み・問い合わせを提供
 */
export class ParmLensClient {
  private baseUrl: string;
  private timeout: number;
  private requestId = 0;

  constructor(config: ParmLensClientConfig = {}) {
    this.baseUrl = config.baseUrl || 'http://localhost:24310';
    this.timeout = config.timeout || 30000;
  }

  /**
   * parm7（とrst7）を読み込む
   */
  async load(request: LoadRequest): Promise<LoadResponse> {
    return this.call<LoadResponse>('load', request);
  }

  async getText(): Promise<GetTextResponse> {
    return this.call<GetTextResponse>('getText');
  }

  async getSections(): Promise<GetSectionsResponse> {
    return this.call<GetSectionsResponse>('getSections');
  }

  async getTables(): Promise<GetTablesResponse> {
    return this.call<GetTablesResponse>('getTables');
  }

  async getTable(table: TableName): Promise<SystemTable> {
    return this.call<SystemTable>('getTable', { table });
  }

  /**
   * 原子シリアルとモードからハイライト範囲を取得
   */
  async highlight(serials: number[], mode?: string): Promise<HighlightResult> {
    return this.call<HighlightResult>('highlight', mode === undefined ? { serials } : { serials, mode });
  }

  /**
   * テーブル行から原子を選択
   */
  async select(table: string, row: number, cursor = 0): Promise<SelectionResult> {
    return this.call<SelectionResult>('select', { table, row, cursor });
  }

  async getAtom(serial: number): Promise<GetAtomResponse> {
    return this.call<GetAtomResponse>('getAtom', { serial });
  }

  async getResidue(resid: number): Promise<GetResidueResponse> {
    return this.call<GetResidueResponse>('getResidue', { resid });
  }

  async queryAtoms(filters: AtomQueryFilters, maxResults?: number): Promise<QueryAtomsResponse> {
    return this.call<QueryAtomsResponse>('queryAtoms', maxResults === undefined ? { filters } : { filters, maxResults });
  }

  async getPdb(): Promise<GetPdbResponse> {
    return this.call<GetPdbResponse>('getPdb');
  }

  /**
   * ステータスを取得
   */
  async getStatus(): Promise<GetStatusResponse> {
    return this.call<GetStatusResponse>('getStatus');
  }

  /**
   * ヘルスチェック
   */
  async healthCheck(): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Health check failed: ${response.status} ${response.statusText}`);
      }

      return await response.json();
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * JSON-RPCメソッド呼び出し
   */
  private async call<T>(method: string, params?: unknown): Promise<T> {
    const id = ++this.requestId;

    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      method,
      params,
      id,
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}/rpc`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const rpcResponse: unknown = await response.json();
      if (typeof rpcResponse !== 'object' || rpcResponse === null) {
        throw new Error('Invalid JSON-RPC response: not an object');
      }

      // エラーレスポンスのチェック
      if ('error' in rpcResponse) {
        const error = rpcResponse.error;
        if (!isJsonRpcError(error)) {
          throw new Error('Invalid JSON-RPC response: malformed error');
        }
        throw new JsonRpcClientError(error.message, error.code, error.data);
      }

      // 成功レスポンス
      if ('result' in rpcResponse) {
        return rpcResponse.result as T;
      }

      throw new Error('Invalid JSON-RPC response: missing result or error');
    } catch (error) {
      if (error instanceof JsonRpcClientError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new Error(`Request timeout after ${this.timeout}ms`);
        }
        throw error;
      }

      throw new Error('Unknown error occurred');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
