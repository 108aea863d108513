/**
 * 派生テーブルの行 → 原子シリアルの逆引きインデックス
 */

import { FormatError } from '../errors.js';
import { decodePointers } from '../parm7/pointers.js';
import {
  ANGLE_SECTIONS,
  BOND_SECTIONS,
  DIHEDRAL_SECTIONS,
  extractAngles,
  extractBonds,
  extractDihedrals,
  formsOneFourPair,
  sortedPair,
} from '../parm7/records.js';
import type { SectionCache } from '../parm7/section-cache.js';
import { readLenientIntSection } from '../parm7/sections.js';

export type SerialPair = [number, number];
export type SerialTriplet = [number, number, number];
export type SerialQuad = [number, number, number, number];

export interface SelectionIndex {
  /** タイプ番号 → そのタイプの原子シリアル（昇順） */
  atomSerialsByType: Map<number, number[]>;
  /** "typeA,typeB,param" → 結合ペア */
  bondsByKey: Map<string, SerialPair[]>;
  /** "typeI,typeJ,typeK,param" → 角度の3原子 */
  anglesByKey: Map<string, SerialTriplet[]>;
  /** 二面角の通し番号（1始まり） → 4原子 */
  dihedralsByIdx: Map<number, SerialQuad>;
  /** "typeA,typeB,param" → 1-4ペア */
  oneFourByKey: Map<string, SerialPair[]>;
}

export function bondKey(typeA: number, typeB: number, paramIndex: number): string {
  const [lo, hi] = sortedPair(typeA, typeB);
  return `${lo},${hi},${paramIndex}`;
}

export function angleKey(typeI: number, typeJ: number, typeK: number, paramIndex: number): string {
  const [lo, hi] = sortedPair(typeI, typeK);
  return `${lo},${typeJ},${hi},${paramIndex}`;
}

function append<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * セクションから選択インデックスを構築
 *
 * タイプ番号が範囲外・0以下の原子を含むレコードは登録しない。
 * @throws FormatError POINTERSの欠落、セクションの欠落・個数不一致
 */
export function buildSelectionIndex(cache: SectionCache): SelectionIndex {
  const pointers = decodePointers(cache.get('POINTERS'));
  const natom = pointers.NATOM;
  if (natom <= 0) {
    throw new FormatError(`Invalid POINTERS NATOM ${natom}`);
  }

  const atomTypeIndices = readLenientIntSection(cache, 'ATOM_TYPE_INDEX', natom);
  const typeOf = (serial: number): number | null => {
    const index = serial - 1;
    if (index < 0 || index >= atomTypeIndices.length) return null;
    const typeIndex = atomTypeIndices[index];
    return typeIndex > 0 ? typeIndex : null;
  };

  const atomSerialsByType = new Map<number, number[]>();
  atomTypeIndices.forEach((typeIndex, idx) => {
    if (typeIndex > 0) append(atomSerialsByType, typeIndex, idx + 1);
  });

  const bondsByKey = new Map<string, SerialPair[]>();
  const [bondsH, bondsHeavy] = BOND_SECTIONS;
  for (const [name, count] of [
    [bondsH, pointers.NBONH],
    [bondsHeavy, pointers.MBONA],
  ] as const) {
    for (const bond of extractBonds(readLenientIntSection(cache, name, count * 3))) {
      const typeA = typeOf(bond.a);
      const typeB = typeOf(bond.b);
      if (typeA === null || typeB === null) continue;
      append(bondsByKey, bondKey(typeA, typeB, bond.paramIndex), [bond.a, bond.b]);
    }
  }

  const anglesByKey = new Map<string, SerialTriplet[]>();
  const [anglesH, anglesHeavy] = ANGLE_SECTIONS;
  for (const [name, count] of [
    [anglesH, pointers.NTHETH],
    [anglesHeavy, pointers.MTHETA],
  ] as const) {
    for (const angle of extractAngles(readLenientIntSection(cache, name, count * 4))) {
      const typeI = typeOf(angle.i);
      const typeJ = typeOf(angle.j);
      const typeK = typeOf(angle.k);
      if (typeI === null || typeJ === null || typeK === null) continue;
      append(anglesByKey, angleKey(typeI, typeJ, typeK, angle.paramIndex), [angle.i, angle.j, angle.k]);
    }
  }

  const dihedralsByIdx = new Map<number, SerialQuad>();
  const oneFourByKey = new Map<string, SerialPair[]>();
  const [dihedralsH, dihedralsHeavy] = DIHEDRAL_SECTIONS;
  let termIdx = 1;
  for (const [name, count] of [
    [dihedralsH, pointers.NPHIH],
    [dihedralsHeavy, pointers.MPHIA],
  ] as const) {
    for (const dihedral of extractDihedrals(readLenientIntSection(cache, name, count * 5))) {
      dihedralsByIdx.set(termIdx, [dihedral.i, dihedral.j, dihedral.k, dihedral.l]);
      termIdx += 1;
      if (!formsOneFourPair(dihedral)) continue;
      const typeI = typeOf(dihedral.i);
      const typeL = typeOf(dihedral.l);
      if (typeI === null || typeL === null) continue;
      append(oneFourByKey, bondKey(typeI, typeL, dihedral.paramIndex), [dihedral.i, dihedral.l]);
    }
  }

  return { atomSerialsByType, bondsByKey, anglesByKey, dihedralsByIdx, oneFourByKey };
}

/**
 * 非結合ペアの総数
 * 同一タイプは重複なしの組み合わせ C(n, 2)、異なるタイプは n_a × n_b
 */
export function nonbondedPairTotal(countA: number, countB: number, sameType: boolean): number {
  if (sameType) {
    return (countA * (countA - 1)) / 2;
  }
  return countA * countB;
}

/** 先頭インデックスが row 未満の組み合わせの数 */
function pairsBefore(count: number, row: number): number {
  return (row * (2 * count - row - 1)) / 2;
}

/**
 * 組み合わせの通し番号 → (i, j)（i < j、辞書順）
 * 三角数の逆関数で行を求め、浮動小数点の誤差を補正する
 */
export function combinationPairAt(count: number, index: number): [number, number] {
  if (count < 2) {
    throw new RangeError('Need at least two atoms to form a pair');
  }
  const total = nonbondedPairTotal(count, count, true);
  if (index < 0 || index >= total) {
    throw new RangeError('Index out of range for combination pairs');
  }
  const b = 2 * count - 1;
  let row = Math.floor((b - Math.sqrt(b * b - 8 * index)) / 2);
  row = Math.max(0, Math.min(row, count - 2));
  while (row < count - 2 && pairsBefore(count, row + 1) <= index) row += 1;
  while (row > 0 && pairsBefore(count, row) > index) row -= 1;
  const column = index - pairsBefore(count, row) + row + 1;
  return [row, column];
}

/**
 * カーソル位置の非結合ペア（全ペアを列挙せずに求める）
 */
export function nonbondedPairForCursor(
  serialsA: readonly number[],
  serialsB: readonly number[],
  cursor: number,
  sameType: boolean
): SerialPair {
  const total = nonbondedPairTotal(serialsA.length, serialsB.length, sameType);
  if (total <= 0) {
    throw new RangeError('No nonbonded pairs available');
  }
  const index = cursor % total;
  if (sameType) {
    const [i, j] = combinationPairAt(serialsA.length, index);
    return [serialsA[i], serialsA[j]];
  }
  const i = Math.floor(index / serialsB.length);
  const j = index % serialsB.length;
  return [serialsA[i], serialsB[j]];
}
