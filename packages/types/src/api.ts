/**
 * API Request/Response型定義
 */

import type { AtomMeta } from './atom.js';
import type { HighlightSpan } from './highlight.js';
import type { SectionSummary } from './parm7.js';
import type { SystemTable, TableName } from './tables.js';

// ========================================
// Load API
// ========================================

export interface LoadRequest {
  /** parm7ファイルのパス */
  parm7Path: string;
  /** 座標ファイル（rst7）のパス */
  rst7Path?: string;
}

export interface LoadResponse {
  path: string;
  natoms: number;
  nresidues: number;
  nsections: number;
  hasCoordinates: boolean;
  /** 数値として解釈できなかったフィールドの警告 */
  warnings: string[];
  took: number; // ms
}

// ========================================
// Text / Sections API
// ========================================

export interface GetTextResponse {
  /** 元テキスト（base64） */
  parm7TextB64: string;
}

export interface GetSectionsResponse {
  sections: SectionSummary[];
}

// ========================================
// Tables API
// ========================================

export interface GetTableRequest {
  table: TableName;
}

// ========================================
// Highlight / Select API
// ========================================

export interface HighlightRequest {
  serials: number[];
  /** HighlightMode のいずれか。省略時は Atom */
  mode?: string;
}

export interface SelectRequest {
  table: string;
  row: number;
  /** 同一行に複数の候補がある場合の巡回位置（デフォルト: 0） */
  cursor?: number;
}

// ========================================
// Atom / Residue API
// ========================================

export interface GetAtomRequest {
  serial: number;
}

export interface GetAtomResponse {
  atom: AtomMeta;
  highlights: HighlightSpan[];
}

export interface GetResidueRequest {
  resid: number;
}

export interface GetResidueResponse {
  segid: string | null;
  resid: number;
  resname: string;
  serials: number[];
}

export interface AtomQueryFilters {
  /** 残基名の部分一致（大文字小文字を区別しない） */
  resnameContains?: string;
  /** 原子名の部分一致（大文字小文字を区別しない） */
  atomnameContains?: string;
  /** AMBER原子タイプの完全一致（大文字小文字を区別しない） */
  atomTypeEquals?: string;
  chargeMin?: number;
  chargeMax?: number;
}

export interface QueryAtomsRequest {
  filters: AtomQueryFilters;
  maxResults?: number;
}

export interface QueryAtomsResponse {
  serials: number[];
  count: number;
  truncated: boolean;
}

export interface GetPdbResponse {
  pdb: string;
}

// ========================================
// Status API
// ========================================

export interface GetStatusResponse {
  server: {
    version: string;
    uptime: number; // ms
    pid: number;
    requests: {
      total: number;
      load: number;
      highlight: number;
      select: number;
      tables: number;
    };
  };
  model: {
    loaded: boolean;
    path: string | null;
    natoms: number;
    /** 派生テーブルの構築済みか */
    tablesReady: boolean;
    /** 選択インデックスの構築済みか */
    selectionReady: boolean;
  };
}

export type GetTablesResponse = Record<TableName, SystemTable>;

// ========================================
// JSON-RPC
// ========================================

export interface JsonRpcRequest<T = unknown> {
  jsonrpc: '2.0';
  id?: string | number | null;
  method: string;
  params?: T;
}

export interface JsonRpcSuccessResponse<T = unknown> {
  jsonrpc: '2.0';
  id: string | number | null;
  result: T;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  error: JsonRpcError;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}
