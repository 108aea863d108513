/**
 * parmlensのエラー階層
 */

import type { ErrorCode, ErrorPayload, ErrorResult } from '@parmlens/types';

/**
 * 安定したエラーコードを持つ基底エラー
 */
export class ParmLensError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ParmLensError';
  }

  toPayload(): ErrorPayload {
    const payload: ErrorPayload = { code: this.code, message: this.message };
    if (this.details !== undefined) {
      payload.details = this.details;
    }
    return payload;
  }

  toResult(): ErrorResult {
    return { ok: false, error: this.toPayload() };
  }
}

/**
 * セクション欠落・長さ不一致・負のポインタなど、ロードを継続できない書式エラー
 */
export class FormatError extends ParmLensError {
  constructor(message: string, details?: unknown) {
    super('parm7_parse_failed', message, details);
    this.name = 'FormatError';
  }
}

/**
 * 存在しないシリアル・範囲外の行など、呼び出し単位で回復可能なエラー
 */
export class NotFoundError extends ParmLensError {
  constructor(message: string, details?: unknown) {
    super('not_found', message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * 個々の数値フィールドが解釈できない
 */
export class ValueParseError extends ParmLensError {
  constructor(
    public readonly raw: string,
    public readonly kind: 'int' | 'float'
  ) {
    super('invalid_value', `Cannot parse ${kind} value '${raw.trim()}'`, { raw });
    this.name = 'ValueParseError';
  }
}

/**
 * モデル操作のエラー（未ロード・入力不正・ファイル無しなど）
 */
export class ModelError extends ParmLensError {
  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'ModelError';
  }
}
