/**
 * テスト用のフィクスチャ読み込み
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG, DEFAULT_TOKEN_SECTIONS, type ParmLensConfig } from '@parmlens/types';
import { buildAtomTable, type AtomTable } from '../model/atom-meta.js';
import { SectionCache } from '../parm7/section-cache.js';
import { tokenizeParm7 } from '../parm7/tokenizer.js';

export const MINI_PARM7_PATH = fileURLToPath(new URL('./fixtures/mini.parm7', import.meta.url));
export const MINI_RST7_PATH = fileURLToPath(new URL('./fixtures/mini.rst7', import.meta.url));

export function readMiniParm7(): string {
  return readFileSync(MINI_PARM7_PATH, 'utf-8');
}

export function cacheFromText(text: string): SectionCache {
  return new SectionCache(tokenizeParm7(text, DEFAULT_TOKEN_SECTIONS));
}

export function loadMiniCache(): SectionCache {
  return cacheFromText(readMiniParm7());
}

export function loadMiniAtomTable(cache: SectionCache = loadMiniCache()): AtomTable {
  return buildAtomTable(cache, { natom: 6, ntypes: 4, chargeScale: 18.2223 });
}

/**
 * 1セクションだけのparm7テキスト
 */
export function sectionText(name: string, format: string, lines: string[]): string {
  return [`%FLAG ${name}`, `%FORMAT(${format})`, ...lines].join('\n') + '\n';
}

export function testConfig(overrides: Partial<ParmLensConfig> = {}): ParmLensConfig {
  return {
    ...DEFAULT_CONFIG,
    parm7: { ...DEFAULT_CONFIG.parm7, tokenSections: [...DEFAULT_TOKEN_SECTIONS] },
    worker: { enabled: false },
    ...overrides,
  };
}

/**
 * 同期関数が投げた例外を返す
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
