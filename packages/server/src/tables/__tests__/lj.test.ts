import { describe, it, expect } from 'vitest';
import {
  diagonalLj,
  estimateNtypes,
  lookupPairValues,
  nonbondedPairIndex,
  pairLj,
  type CoefficientTables,
} from '../lj.js';

const TABLES: CoefficientTables = {
  acoef: [100, 200, 50],
  bcoef: [10, 20, 5],
  hbondAcoef: [1000],
  hbondBcoef: [100],
};

describe('diagonalLj', () => {
  it('A, B から半径と井戸深さを求める', () => {
    const { rmin, epsilon } = diagonalLj(100, 10);
    // factor = 2A/B = 20、半径 = 20^(1/6) / 2 ≈ 0.8238（0.8145 ではない）
    expect(rmin).toBeCloseTo(0.5 * Math.pow(20, 1 / 6), 12);
    expect(rmin).toBeCloseTo(0.8238, 4);
    expect(epsilon).toBeCloseTo(0.25, 12);
  });

  it('係数が無い・小さすぎる場合は0', () => {
    expect(diagonalLj(null, 10)).toEqual({ rmin: 0, epsilon: 0 });
    expect(diagonalLj(0, 0)).toEqual({ rmin: 0, epsilon: 0 });
  });
});

describe('pairLj', () => {
  it('A, B がともに正なら最小距離と井戸深さ', () => {
    const { rmin, epsilon } = pairLj(400, 40);
    expect(rmin).toBeCloseTo(Math.pow(20, 1 / 6), 12);
    expect(epsilon).toBeCloseTo(1, 12);
  });

  it('0を含む場合は null', () => {
    expect(pairLj(0, 0)).toEqual({ rmin: null, epsilon: null });
  });
});

describe('lookupPairValues', () => {
  it('正のインデックスはLJテーブルを引く', () => {
    expect(lookupPairValues(3, TABLES)).toMatchObject({ acoef: 50, bcoef: 5, source: 'LJ' });
  });

  it('負のインデックスはHBONDテーブルを引く', () => {
    expect(lookupPairValues(-1, TABLES)).toEqual({
      acoef: 1000,
      bcoef: 100,
      rmin: null,
      epsilon: null,
      source: 'HBOND',
    });
  });

  it('0や範囲外は値なし', () => {
    expect(lookupPairValues(0, TABLES)).toEqual({ acoef: null, bcoef: null, rmin: null, epsilon: null, source: '' });
    expect(lookupPairValues(9, TABLES)).toEqual({ acoef: null, bcoef: null, rmin: null, epsilon: null, source: 'LJ' });
  });
});

describe('nonbondedPairIndex', () => {
  it('主成分が0なら転置位置を使う', () => {
    // 2タイプ: (1,2) が0、(2,1) が3
    const index = [1, 0, 3, 2];
    expect(nonbondedPairIndex(index, 2, 1, 2)).toBe(3);
    expect(nonbondedPairIndex(index, 2, 2, 2)).toBe(2);
  });
});

describe('estimateNtypes', () => {
  it('平方数ならその平方根', () => {
    expect(estimateNtypes(16, 0)).toBe(4);
  });

  it('平方数でなければ係数の三角数から推定する', () => {
    expect(estimateNtypes(15, 10)).toBe(4);
    expect(estimateNtypes(15, 11)).toBeNull();
    expect(estimateNtypes(0, 10)).toBeNull();
  });
});
