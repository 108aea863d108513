import type { Parm7Section, Parm7Sections } from '@parmlens/types';
import { decodeFloatTokens, decodeIntTokens } from './values.js';

/**
 * スナップショット単位のセクションデコードキャッシュ
 *
 * セクション名ごとに整数・実数の配列を一度だけデコードして保持する。
 * 解釈できなかったフィールドは0として扱い、警告を記録する。
 */
export class SectionCache {
  private intCache = new Map<string, number[]>();
  private floatCache = new Map<string, number[]>();
  private warningList: string[] = [];

  constructor(readonly sections: Parm7Sections) {}

  get(name: string): Parm7Section | undefined {
    return this.sections.get(name);
  }

  /** トークンを持つセクションを返す */
  withTokens(name: string): Parm7Section | undefined {
    const section = this.sections.get(name);
    return section && section.tokens.length > 0 ? section : undefined;
  }

  ints(name: string): number[] {
    const cached = this.intCache.get(name);
    if (cached) return cached;
    const section = this.sections.get(name);
    const values = section
      ? decodeIntTokens(section.tokens, (error, index) => this.warn(name, index, error.message))
      : [];
    this.intCache.set(name, values);
    return values;
  }

  floats(name: string): number[] {
    const cached = this.floatCache.get(name);
    if (cached) return cached;
    const section = this.sections.get(name);
    const values = section
      ? decodeFloatTokens(section.tokens, (error, index) => this.warn(name, index, error.message))
      : [];
    this.floatCache.set(name, values);
    return values;
  }

  /** トリム済みの文字列フィールド */
  strings(name: string): string[] {
    const section = this.sections.get(name);
    return section ? section.tokens.map((token) => token.value.trim()) : [];
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  private warn(name: string, index: number, message: string): void {
    this.warningList.push(`${name}[${index}]: ${message}`);
  }
}
