import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { z, ZodError } from 'zod';
import {
  TABLE_NAMES,
  type JsonRpcErrorResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonRpcSuccessResponse,
} from '@parmlens/types';
import { ParmLensError } from '../errors.js';
import type { ParmLensService } from './parmlens-service.js';

/**
 * JSON-RPC 2.0 エラーコード
 */
export const JSON_RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  /** ParmLensError（data にエラーペイロード） */
  APPLICATION_ERROR: -32000,
} as const;

const serialSchema = z.number().int().positive();

const paramSchemas = {
  load: z.object({
    parm7Path: z.string().min(1),
    rst7Path: z.string().min(1).optional(),
  }),
  getTable: z.object({
    table: z.enum(TABLE_NAMES),
  }),
  highlight: z.object({
    serials: z.array(serialSchema),
    mode: z.string().optional(),
  }),
  select: z.object({
    table: z.string(),
    row: z.number().int(),
    cursor: z.number().int().optional(),
  }),
  getAtom: z.object({
    serial: serialSchema,
  }),
  getResidue: z.object({
    resid: z.number().int(),
  }),
  queryAtoms: z.object({
    filters: z
      .object({
        resnameContains: z.string().optional(),
        atomnameContains: z.string().optional(),
        atomTypeEquals: z.string().optional(),
        chargeMin: z.number().optional(),
        chargeMax: z.number().optional(),
      })
      .default({}),
    maxResults: z.number().int().positive().optional(),
  }),
};

/**
 * 未知メソッドなど、JSON-RPCのエラーコードを直接持つエラー
 */
class JsonRpcMethodError extends Error {
  constructor(
    readonly code: number,
    message: string
  ) {
    super(message);
    this.name = 'JsonRpcMethodError';
  }
}

/**
 * HTTP JSON-RPCサーバ
 * ParmLensServiceをJSON-RPC over HTTPで公開
 */
export class JsonRpcServer {
  private app: express.Application;
  private server: Server | null = null;

  constructor(
    private service: ParmLensService,
    private host: string,
    private port: number
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * ミドルウェア設定
   */
  private setupMiddleware(): void {
    // CORS設定（複数クライアント対応）
    this.app.use(cors());

    // JSONパーサー
    this.app.use(express.json({ limit: '10mb' }));

    // リクエストログ
    this.app.use((req, _res, next) => {
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
      next();
    });
  }

  /**
   * ルート設定
   */
  private setupRoutes(): void {
    // JSON-RPCエンドポイント
    this.app.post('/rpc', (req: Request, res: Response, next) => {
      this.dispatch(req.body)
        .then((response) => {
          res.json(response);
        })
        .catch(next);
    });

    // ヘルスチェック
    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok' });
    });

    // 404ハンドラ
    this.app.use((_req, res) => {
      res.status(404).json({ error: 'Not Found' });
    });

    // 不正なJSONボディ
    const parseErrorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
      console.error('[JsonRpcServer] Request failed:', error instanceof Error ? error.message : error);
      const isParseError = error instanceof SyntaxError;
      res.json(
        this.createErrorResponse(
          null,
          isParseError ? JSON_RPC_ERROR_CODES.PARSE_ERROR : JSON_RPC_ERROR_CODES.INTERNAL_ERROR,
          isParseError ? 'Parse error' : 'Internal error'
        )
      );
    };
    this.app.use(parseErrorHandler);
  }

  /**
   * JSON-RPCリクエストを処理してレスポンスを返す
   */
  async dispatch(body: unknown): Promise<JsonRpcResponse> {
    if (!this.isValidJsonRpcRequest(body)) {
      return this.createErrorResponse(null, JSON_RPC_ERROR_CODES.INVALID_REQUEST, 'Invalid Request');
    }
    const id = body.id ?? null;

    try {
      const result = await this.executeMethod(body.method, body.params);
      return this.createSuccessResponse(id, result);
    } catch (error) {
      return this.toErrorResponse(id, body.method, error);
    }
  }

  /**
   * JSON-RPCリクエストのバリデーション
   */
  private isValidJsonRpcRequest(request: unknown): request is JsonRpcRequest {
    if (typeof request !== 'object' || request === null) {
      return false;
    }
    if (!('jsonrpc' in request) || request.jsonrpc !== '2.0') {
      return false;
    }
    if (!('method' in request) || typeof request.method !== 'string') {
      return false;
    }
    if ('id' in request) {
      const id = request.id;
      return id === null || typeof id === 'string' || typeof id === 'number';
    }
    return true;
  }

  /**
   * メソッド実行
   */
  private async executeMethod(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case 'load':
        return await this.service.load(paramSchemas.load.parse(params));

      case 'getText':
        return this.service.getText();

      case 'getSections':
        return this.service.getSections();

      case 'getTables':
        return await this.service.getTables();

      case 'getTable':
        return await this.service.getTable(paramSchemas.getTable.parse(params));

      case 'highlight':
        return this.service.highlight(paramSchemas.highlight.parse(params));

      case 'select':
        return await this.service.select(paramSchemas.select.parse(params));

      case 'getAtom':
        return this.service.getAtom(paramSchemas.getAtom.parse(params));

      case 'getResidue':
        return this.service.getResidue(paramSchemas.getResidue.parse(params));

      case 'queryAtoms':
        return this.service.queryAtoms(paramSchemas.queryAtoms.parse(params ?? {}));

      case 'getPdb':
        return this.service.getPdb();

      case 'getStatus':
        return this.service.getStatus();

      default:
        throw new JsonRpcMethodError(JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  }

  private toErrorResponse(id: string | number | null, method: string, error: unknown): JsonRpcErrorResponse {
    if (error instanceof JsonRpcMethodError) {
      return this.createErrorResponse(id, error.code, error.message);
    }
    if (error instanceof ZodError) {
      return this.createErrorResponse(id, JSON_RPC_ERROR_CODES.INVALID_PARAMS, 'Invalid params', error.issues);
    }
    if (error instanceof ParmLensError) {
      console.warn(`[JsonRpcServer] ${method}: ${error.code} ${error.message}`);
      return this.createErrorResponse(id, JSON_RPC_ERROR_CODES.APPLICATION_ERROR, error.message, error.toPayload());
    }
    console.error(`[RPC Error] ${method}:`, error);
    return this.createErrorResponse(
      id,
      JSON_RPC_ERROR_CODES.INTERNAL_ERROR,
      error instanceof Error ? error.message : 'Internal error'
    );
  }

  /**
   * 成功レスポンス作成
   */
  private createSuccessResponse(id: string | number | null, result: unknown): JsonRpcSuccessResponse {
    return {
      jsonrpc: '2.0',
      result,
      id,
    };
  }

  /**
   * エラーレスポンス作成
   */
  private createErrorResponse(
    id: string | number | null,
    code: number,
    message: string,
    data?: unknown
  ): JsonRpcErrorResponse {
    const error: { code: number; message: string; data?: unknown } = {
      code,
      message,
    };
    if (data !== undefined) {
      error.data = data;
    }
    return {
      jsonrpc: '2.0',
      error,
      id,
    };
  }

  /**
   * サーバ起動
   */
  async start(): Promise<void> {
    this.service.start();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        console.log(`JSON-RPC server listening on http://${this.host}:${this.port}/rpc`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  /**
   * サーバ停止
   */
  async stop(): Promise<void> {
    this.service.stop();

    const server = this.server;
    if (server) {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            console.log('JSON-RPC server stopped');
            this.server = null;
            resolve();
          }
        });
      });
    }
  }
}
