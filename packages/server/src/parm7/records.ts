/**
 * 結合項レコードの抽出
 *
 * 結合は3個、角度は4個、二面角は5個の整数を1レコードとして読む。
 * 原子ポインタは座標配列のオフセット（3×(serial-1)）として格納されている。
 */

/** 結合・角度・二面角を格納するセクションの組 */
export const BOND_SECTIONS = ['BONDS_INC_HYDROGEN', 'BONDS_WITHOUT_HYDROGEN'] as const;
export const ANGLE_SECTIONS = ['ANGLES_INC_HYDROGEN', 'ANGLES_WITHOUT_HYDROGEN'] as const;
export const DIHEDRAL_SECTIONS = ['DIHEDRALS_INC_HYDROGEN', 'DIHEDRALS_WITHOUT_HYDROGEN'] as const;

export interface BondRecord {
  a: number;
  b: number;
  paramIndex: number;
  /** セクション内の先頭トークン位置 */
  offset: number;
}

export interface AngleRecord {
  i: number;
  j: number;
  k: number;
  paramIndex: number;
  offset: number;
}

export interface DihedralRecord {
  i: number;
  j: number;
  k: number;
  l: number;
  paramIndex: number;
  /** 3番目のポインタが負: 1-4相互作用から除外 */
  excludeOneFour: boolean;
  /** 4番目のポインタが負: 改良二面角（improper） */
  improper: boolean;
  offset: number;
}

/**
 * ポインタ値を原子シリアル（1-indexed）に変換
 */
export function pointerToSerial(value: number): number {
  return Math.floor(Math.abs(value) / 3) + 1;
}

export function extractBonds(values: readonly number[]): BondRecord[] {
  const records: BondRecord[] = [];
  for (let idx = 0; idx + 3 <= values.length; idx += 3) {
    records.push({
      a: pointerToSerial(values[idx]),
      b: pointerToSerial(values[idx + 1]),
      paramIndex: Math.abs(values[idx + 2]),
      offset: idx,
    });
  }
  return records;
}

export function extractAngles(values: readonly number[]): AngleRecord[] {
  const records: AngleRecord[] = [];
  for (let idx = 0; idx + 4 <= values.length; idx += 4) {
    records.push({
      i: pointerToSerial(values[idx]),
      j: pointerToSerial(values[idx + 1]),
      k: pointerToSerial(values[idx + 2]),
      paramIndex: Math.abs(values[idx + 3]),
      offset: idx,
    });
  }
  return records;
}

export function extractDihedrals(values: readonly number[]): DihedralRecord[] {
  const records: DihedralRecord[] = [];
  for (let idx = 0; idx + 5 <= values.length; idx += 5) {
    const rawK = values[idx + 2];
    const rawL = values[idx + 3];
    records.push({
      i: pointerToSerial(values[idx]),
      j: pointerToSerial(values[idx + 1]),
      k: pointerToSerial(rawK),
      l: pointerToSerial(rawL),
      paramIndex: Math.abs(values[idx + 4]),
      excludeOneFour: rawK < 0,
      improper: rawL < 0,
      offset: idx,
    });
  }
  return records;
}

/** 1-4ペアを生成する二面角か */
export function formsOneFourPair(record: DihedralRecord): boolean {
  return !record.excludeOneFour && !record.improper;
}

export function sortedPair(a: number, b: number): [number, number] {
  return a <= b ? [a, b] : [b, a];
}

/**
 * 順方向または逆方向で一致するか
 */
export function matchesOrdered(record: readonly number[], serials: readonly number[]): boolean {
  const n = record.length;
  if (serials.length < n) {
    return false;
  }
  let forward = true;
  let reverse = true;
  for (let idx = 0; idx < n; idx++) {
    if (record[idx] !== serials[idx]) forward = false;
    if (record[n - 1 - idx] !== serials[idx]) reverse = false;
  }
  return forward || reverse;
}

/**
 * 順序を無視して（多重集合として）一致するか
 */
export function matchesUnordered(record: readonly number[], serials: readonly number[]): boolean {
  const n = record.length;
  if (serials.length < n) {
    return false;
  }
  const left = [...record].sort((x, y) => x - y);
  const right = serials.slice(0, n).sort((x, y) => x - y);
  return left.every((value, idx) => value === right[idx]);
}

/**
 * 2つの集合が等しいか
 */
export function sameSet(left: Iterable<number>, right: Iterable<number>): boolean {
  const a = new Set(left);
  const b = new Set(right);
  if (a.size !== b.size) return false;
  for (const value of a) {
    if (!b.has(value)) return false;
  }
  return true;
}
