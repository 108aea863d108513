/**
 * POINTERSの長さ契約に基づく必須セクションの読み出し
 */

import type { Parm7Section } from '@parmlens/types';
import { FormatError, ValueParseError } from '../errors.js';
import type { SectionCache } from './section-cache.js';
import { parseFloatValue, parseIntValue } from './values.js';

function describeSection(section: Parm7Section | undefined): string {
  if (!section) {
    return 'section=absent';
  }
  return (
    `flag_line=${section.line} end_line=${section.endLine} ` +
    `format=${section.count}x${section.width} tokens=${section.tokens.length}`
  );
}

function lengthMismatch(section: Parm7Section, expected: number): FormatError {
  console.error(
    `[Parm7] Section ${section.name} length mismatch: expected=${expected} actual=${section.tokens.length}; ${describeSection(section)}`
  );
  return new FormatError(
    `${section.name} length ${section.tokens.length} does not match expected ${expected}`,
    { section: section.name, expected, actual: section.tokens.length }
  );
}

/**
 * 期待個数に一致するトークンを持つセクションを返す。期待個数0なら null
 */
function checkedSection(cache: SectionCache, name: string, expected: number): Parm7Section | null {
  const section = cache.get(name);
  if (expected === 0) {
    if (section && section.tokens.length > 0) {
      throw lengthMismatch(section, expected);
    }
    return null;
  }
  if (!section || section.tokens.length === 0) {
    console.error(`[Parm7] Section missing: ${name} expected=${expected}; ${describeSection(section)}`);
    throw new FormatError(`${name} section missing`, { section: name, expected });
  }
  if (section.tokens.length !== expected) {
    throw lengthMismatch(section, expected);
  }
  return section;
}

function parseStrict(section: Parm7Section, expected: number, parse: (raw: string) => number): number[] {
  const values: number[] = [];
  for (const token of section.tokens) {
    try {
      values.push(parse(token.value));
    } catch (error) {
      if (!(error instanceof ValueParseError)) throw error;
      console.error(
        `[Parm7] Section ${section.name} parsed value mismatch: parsed=${values.length} expected=${expected}; ${describeSection(section)}`
      );
      throw new FormatError(`${section.name} parsed ${values.length} values but expected ${expected}`, {
        section: section.name,
        raw: error.raw,
      });
    }
  }
  return values;
}

/**
 * 必須整数セクション
 * @throws FormatError 欠落・個数不一致・数値として解釈できない場合
 */
export function readIntSection(cache: SectionCache, name: string, expected: number): number[] {
  const section = checkedSection(cache, name, expected);
  return section ? parseStrict(section, expected, parseIntValue) : [];
}

/**
 * 必須実数セクション
 * @throws FormatError 欠落・個数不一致・数値として解釈できない場合
 */
export function readFloatSection(cache: SectionCache, name: string, expected: number): number[] {
  const section = checkedSection(cache, name, expected);
  return section ? parseStrict(section, expected, parseFloatValue) : [];
}

/**
 * 必須文字列セクション（各フィールドはトリム済み）
 */
export function readStringSection(cache: SectionCache, name: string, expected: number): string[] {
  const section = checkedSection(cache, name, expected);
  return section ? section.tokens.map((token) => token.value.trim()) : [];
}

/**
 * 省略可能な実数セクション。セクション自体が無ければ null で埋める
 * @throws FormatError 存在するのに空、または個数が合わない場合
 */
export function readOptionalFloatSection(cache: SectionCache, name: string, expected: number): (number | null)[] {
  const section = cache.get(name);
  if (!section) {
    return new Array<number | null>(expected).fill(null);
  }
  if (expected === 0) {
    if (section.tokens.length > 0) {
      throw lengthMismatch(section, expected);
    }
    return [];
  }
  if (section.tokens.length === 0) {
    console.error(
      `[Parm7] Optional section ${name} is present but empty: expected=${expected}; ${describeSection(section)}`
    );
    throw new FormatError(`${name} section present but empty`, { section: name, expected });
  }
  return readFloatSection(cache, name, expected);
}

/**
 * 個数のみ厳密に検査する整数セクション。解釈できないフィールドは0になり警告として記録される
 * @throws FormatError 欠落・個数不一致の場合
 */
export function readLenientIntSection(cache: SectionCache, name: string, expected: number): number[] {
  const section = checkedSection(cache, name, expected);
  return section ? cache.ints(name) : [];
}
