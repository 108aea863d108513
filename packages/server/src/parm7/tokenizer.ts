/**
 * parm7テキストのトークナイザ
 *
 * %FLAG 行でセクションを開始し、%FORMAT で宣言された (count, width) に従って
 * データ行を固定幅のフィールドに切り出す。不正な入力でも例外は投げない。
 */

import type { Parm7Section, Parm7Token } from '@parmlens/types';

const FORMAT_PATTERN = /%FORMAT\((\d+)([a-zA-Z])(\d+)(?:\.(\d+))?\)/;
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * バイト列をUTF-8としてデコード（不正なバイトは置換文字になる）
 */
export function decodeParm7(buffer: Uint8Array): string {
  return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString('utf-8');
}

/**
 * テキストを行に分割（末尾の改行は空行を生まない）
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(LINE_BREAK);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

interface OpenSection {
  name: string;
  count: number;
  width: number;
  line: number;
  collect: boolean;
  tokens: Parm7Token[];
}

/**
 * parm7テキストをセクションに分割する
 *
 * @param tokenSections トークンを収集するセクション名。それ以外は行範囲のみ記録する
 */
export function tokenizeParm7(text: string, tokenSections: Iterable<string>): Map<string, Parm7Section> {
  const allowed = new Set(tokenSections);
  const lines = splitLines(text);
  const sections = new Map<string, Parm7Section>();
  let current: OpenSection | null = null;

  const finalize = (section: OpenSection, endLine: number): void => {
    sections.set(section.name, {
      name: section.name,
      count: section.count,
      width: section.width,
      line: section.line,
      endLine,
      tokens: section.tokens,
    });
  };

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];
    if (line.startsWith('%FLAG')) {
      if (current) {
        finalize(current, idx - 1);
      }
      const name = line.split(/\s+/)[1];
      current = name
        ? { name, count: 0, width: 0, line: idx, collect: allowed.has(name), tokens: [] }
        : null;
      continue;
    }

    if (line.startsWith('%FORMAT')) {
      const match = FORMAT_PATTERN.exec(line);
      if (match && current) {
        current.count = Number.parseInt(match[1], 10);
        current.width = Number.parseInt(match[3], 10);
      }
      continue;
    }

    if (!current || !current.collect || current.count === 0 || current.width === 0) {
      continue;
    }

    for (let slot = 0; slot < current.count; slot++) {
      const start = slot * current.width;
      if (start >= line.length) {
        break;
      }
      const end = start + current.width;
      const value = line.slice(start, end);
      if (value.trim().length === 0) {
        continue;
      }
      current.tokens.push({ value, line: idx, start, end: Math.min(end, line.length) });
    }
  }

  if (current) {
    finalize(current, lines.length - 1);
  }

  return sections;
}
