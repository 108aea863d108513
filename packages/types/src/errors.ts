/**
 * エラーペイロードの型定義
 */

export const ERROR_CODES = [
  'not_loaded',
  'not_found',
  'invalid_input',
  'parm7_parse_failed',
  'ambiguous',
  'file_not_found',
  'load_failed',
  'invalid_value',
  'pdb_format_failed',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

export interface ErrorResult {
  ok: false;
  error: ErrorPayload;
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && (ERROR_CODES as readonly string[]).includes(value);
}
