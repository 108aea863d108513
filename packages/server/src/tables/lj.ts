/**
 * Lennard-Jones係数の変換と非結合パラメータの参照
 */

/** これ未満の係数は0として扱う */
export const LJ_MIN_COEF = 1.0e-10;

export interface DiagonalLj {
  rmin: number;
  epsilon: number;
}

/**
 * 原子タイプ対角成分のLJ半径・井戸深さ
 * rmin = (2A/B)^(1/6) / 2, epsilon = B / (2 * 2A/B)
 */
export function diagonalLj(acoef: number | null, bcoef: number | null): DiagonalLj {
  if (acoef === null || bcoef === null || acoef < LJ_MIN_COEF || bcoef < LJ_MIN_COEF) {
    return { rmin: 0, epsilon: 0 };
  }
  const factor = (2.0 * acoef) / bcoef;
  return {
    rmin: Math.pow(factor, 1.0 / 6.0) * 0.5,
    epsilon: bcoef / 2.0 / factor,
  };
}

export interface PairLj {
  rmin: number | null;
  epsilon: number | null;
}

/**
 * 原子ペアのLJ最小距離・井戸深さ（A, Bがともに正のときのみ）
 */
export function pairLj(acoef: number | null, bcoef: number | null): PairLj {
  if (acoef === null || bcoef === null || !(acoef > 0) || !(bcoef > 0)) {
    return { rmin: null, epsilon: null };
  }
  return {
    rmin: Math.pow((2.0 * acoef) / bcoef, 1.0 / 6.0),
    epsilon: (bcoef * bcoef) / (4.0 * acoef),
  };
}

/** 係数の出典（HBONDは負のインデックスで参照される10-12項） */
export type PairSource = 'LJ' | 'HBOND' | '';

export interface PairValues {
  acoef: number | null;
  bcoef: number | null;
  rmin: number | null;
  epsilon: number | null;
  source: PairSource;
}

export interface CoefficientTables {
  acoef: readonly number[];
  bcoef: readonly number[];
  hbondAcoef: readonly number[];
  hbondBcoef: readonly number[];
}

function at(values: readonly number[], index: number): number | null {
  return index >= 0 && index < values.length ? values[index] : null;
}

/**
 * NONBONDED_PARM_INDEXの値から係数を引く
 * 正ならLJテーブル、負ならHBONDテーブル、0なら値なし
 */
export function lookupPairValues(pairIndex: number, tables: CoefficientTables): PairValues {
  if (pairIndex > 0) {
    const acoef = at(tables.acoef, pairIndex - 1);
    const bcoef = at(tables.bcoef, pairIndex - 1);
    return { acoef, bcoef, ...pairLj(acoef, bcoef), source: 'LJ' };
  }
  if (pairIndex < 0 && tables.hbondAcoef.length > 0 && tables.hbondBcoef.length > 0) {
    const hbIndex = Math.abs(pairIndex) - 1;
    return {
      acoef: at(tables.hbondAcoef, hbIndex),
      bcoef: at(tables.hbondBcoef, hbIndex),
      rmin: null,
      epsilon: null,
      source: 'HBOND',
    };
  }
  return { acoef: null, bcoef: null, rmin: null, epsilon: null, source: '' };
}

/**
 * タイプ対 (a, b) の NONBONDED_PARM_INDEX 上の位置
 */
export function nonbondedOffset(ntypes: number, typeA: number, typeB: number): number {
  return (typeA - 1) * ntypes + (typeB - 1);
}

/**
 * タイプ対のペアインデックス。主成分が0なら転置位置の値を使う
 */
export function nonbondedPairIndex(
  nonbondIndex: readonly number[],
  ntypes: number,
  typeA: number,
  typeB: number
): number {
  const primary = at(nonbondIndex, nonbondedOffset(ntypes, typeA, typeB)) ?? 0;
  if (primary !== 0) {
    return primary;
  }
  return at(nonbondIndex, nonbondedOffset(ntypes, typeB, typeA)) ?? 0;
}

/**
 * NONBONDED_PARM_INDEX の長さからタイプ数を求める
 * 平方数でなければ LENNARD_JONES_ACOEF の個数（三角数）から推定する
 */
export function estimateNtypes(nonbondCount: number, acoefCount: number): number | null {
  if (nonbondCount <= 0) {
    return null;
  }
  const root = Math.floor(Math.sqrt(nonbondCount));
  if (root > 0 && root * root === nonbondCount) {
    return root;
  }
  if (acoefCount <= 0) {
    return null;
  }
  const estimate = Math.floor((Math.sqrt(8 * acoefCount + 1) - 1) / 2);
  if (estimate > 0 && (estimate * (estimate + 1)) / 2 === acoefCount) {
    return estimate;
  }
  return null;
}
