/**
 * 固定幅フィールドの数値パース
 */

import type { Parm7Token } from '@parmlens/types';
import { ValueParseError } from '../errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * 整数フィールドをパース（小数表記は0方向に切り捨て）
 * 空欄は0
 * @throws ValueParseError
 */
export function parseIntValue(raw: string): number {
  const text = raw.trim();
  if (text.length === 0) {
    return 0;
  }
  if (INTEGER_PATTERN.test(text)) {
    return Number.parseInt(text, 10);
  }
  if (FLOAT_PATTERN.test(text)) {
    return Math.trunc(Number.parseFloat(text));
  }
  throw new ValueParseError(raw, 'int');
}

/**
 * 実数フィールドをパース（FortranのD指数表記に対応）
 * 空欄は0
 * @throws ValueParseError
 */
export function parseFloatValue(raw: string): number {
  const text = raw.trim().replace(/D/g, 'E').replace(/d/g, 'e');
  if (text.length === 0) {
    return 0;
  }
  if (FLOAT_PATTERN.test(text)) {
    return Number.parseFloat(text);
  }
  throw new ValueParseError(raw, 'float');
}

/** パースできなかったトークンの通知先 */
export type InvalidValueHandler = (error: ValueParseError, tokenIndex: number) => void;

/**
 * トークン列を整数配列に変換。解釈できないトークンは0に置き換える
 */
export function decodeIntTokens(tokens: readonly Parm7Token[], onInvalid?: InvalidValueHandler): number[] {
  return tokens.map((token, index) => {
    try {
      return parseIntValue(token.value);
    } catch (error) {
      if (!(error instanceof ValueParseError)) throw error;
      onInvalid?.(error, index);
      return 0;
    }
  });
}

/**
 * トークン列を実数配列に変換。解釈できないトークンは0に置き換える
 */
export function decodeFloatTokens(tokens: readonly Parm7Token[], onInvalid?: InvalidValueHandler): number[] {
  return tokens.map((token, index) => {
    try {
      return parseFloatValue(token.value);
    } catch (error) {
      if (!(error instanceof ValueParseError)) throw error;
      onInvalid?.(error, index);
      return 0;
    }
  });
}
