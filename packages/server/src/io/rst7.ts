/**
 * ASCII restart（rst7/inpcrd）座標の読み込み
 */

import { FormatError, ValueParseError } from '../errors.js';
import { splitLines } from '../parm7/tokenizer.js';
import { parseFloatValue } from '../parm7/values.js';

const FIELD_WIDTH = 12;
const FIELDS_PER_LINE = 6;

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface Rst7 {
  title: string;
  natom: number;
  /** 時刻（2行目に記載がある場合） */
  time: number | null;
  positions: Position[];
}

/**
 * restartテキストをパース
 *
 * 1行目はタイトル、2行目の先頭フィールドが原子数、以降は12桁固定幅で1行6値。
 * 速度・セル情報が続く場合は先頭の 3 × 原子数 個のみ読む。
 * @throws FormatError 原子数が読めない、座標が足りない、数値として解釈できない場合
 */
export function parseRst7(text: string): Rst7 {
  const lines = splitLines(text);
  if (lines.length < 2) {
    throw new FormatError('Restart file is missing the atom count line');
  }

  const header = lines[1].trim().split(/\s+/);
  const natom = Number.parseInt(header[0] ?? '', 10);
  if (!Number.isInteger(natom) || natom <= 0) {
    throw new FormatError(`Invalid restart atom count '${lines[1].trim()}'`);
  }
  const time = header.length > 1 ? Number.parseFloat(header[1]) : Number.NaN;

  const expected = natom * 3;
  const values: number[] = [];
  for (let lineIndex = 2; lineIndex < lines.length && values.length < expected; lineIndex++) {
    const line = lines[lineIndex];
    for (let slot = 0; slot < FIELDS_PER_LINE && values.length < expected; slot++) {
      const start = slot * FIELD_WIDTH;
      if (start >= line.length) break;
      const field = line.slice(start, start + FIELD_WIDTH);
      if (field.trim().length === 0) continue;
      try {
        values.push(parseFloatValue(field));
      } catch (error) {
        if (!(error instanceof ValueParseError)) throw error;
        throw new FormatError(`Invalid restart coordinate '${field.trim()}' at line ${lineIndex + 1}`, {
          line: lineIndex + 1,
        });
      }
    }
  }

  if (values.length < expected) {
    throw new FormatError(`Restart file has ${values.length} coordinates but expected ${expected}`, {
      expected,
      actual: values.length,
    });
  }

  const positions: Position[] = [];
  for (let idx = 0; idx < natom; idx++) {
    positions.push({ x: values[idx * 3], y: values[idx * 3 + 1], z: values[idx * 3 + 2] });
  }

  return {
    title: lines[0].trim(),
    natom,
    time: Number.isFinite(time) ? time : null,
    positions,
  };
}
