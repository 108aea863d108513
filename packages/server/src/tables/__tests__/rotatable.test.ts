import { describe, it, expect } from 'vitest';
import type { BondRecord, DihedralRecord } from '../../parm7/records.js';
import { findRotatableBonds, isRotatable } from '../rotatable.js';

function bond(a: number, b: number): BondRecord {
  return { a, b, paramIndex: 1, offset: 0 };
}

function dihedral(i: number, j: number, k: number, l: number): DihedralRecord {
  return { i, j, k, l, paramIndex: 1, excludeOneFour: false, improper: false, offset: 0 };
}

describe('findRotatableBonds', () => {
  it('二面角の中央にある重原子同士の結合を回転可能とする', () => {
    const rotatable = findRotatableBonds(
      [bond(1, 2), bond(3, 2), bond(3, 4)],
      [dihedral(1, 2, 3, 4)],
      [12, 12, 12, 12]
    );
    expect([...rotatable]).toEqual(['2-3']);
    expect(isRotatable(rotatable, 3, 2)).toBe(true);
    expect(isRotatable(rotatable, 1, 2)).toBe(false);
  });

  it('水素を含む結合は対象外', () => {
    const rotatable = findRotatableBonds([bond(1, 2), bond(2, 3), bond(3, 4)], [dihedral(1, 2, 3, 4)], [12, 1.008, 12, 12]);
    expect(rotatable.size).toBe(0);
  });

  it('両端の近傍が重なる結合は回転可能としない', () => {
    const masses = new Array<number>(9).fill(12);
    const rotatable = findRotatableBonds(
      [bond(2, 3)],
      [dihedral(1, 2, 3, 4), dihedral(2, 5, 6, 7), dihedral(3, 5, 8, 9)],
      masses
    );
    expect(rotatable.size).toBe(0);
  });
});
