import { describe, it, expect } from 'vitest';
import type { AtomMeta } from '@parmlens/types';
import { queryAtoms } from '../query.js';
import { loadMiniAtomTable } from '../../__tests__/helpers.js';

const atoms = loadMiniAtomTable().atoms;

describe('queryAtoms', () => {
  it('残基名は大文字小文字を区別せず部分一致', () => {
    expect(queryAtoms(atoms, { resnameContains: ' ohx ' }, 100)).toEqual({
      serials: [4, 5, 6],
      count: 3,
      truncated: false,
    });
  });

  it('原子名は部分一致', () => {
    expect(queryAtoms(atoms, { atomnameContains: 'h' }, 100).serials).toEqual([3, 4, 6]);
  });

  it('原子タイプは完全一致', () => {
    expect(queryAtoms(atoms, { atomTypeEquals: 'ct' }, 100).serials).toEqual([1, 2]);
    expect(queryAtoms(atoms, { atomTypeEquals: 'c' }, 100).serials).toEqual([]);
  });

  it('電荷の範囲で絞り込む', () => {
    expect(queryAtoms(atoms, { chargeMin: 0 }, 100).serials).toEqual([2, 3, 4, 6]);
    expect(queryAtoms(atoms, { chargeMax: -0.2 }, 100).serials).toEqual([5]);
    expect(queryAtoms(atoms, { resnameContains: 'mol', chargeMin: 0 }, 100).serials).toEqual([2, 3]);
  });

  it('電荷の条件があると電荷不明の原子は除外する', () => {
    const unknown: AtomMeta = { ...atoms[0], serial: 7, parm7: { ...atoms[0].parm7, charge: null } };
    expect(queryAtoms([unknown], { chargeMin: -10 }, 100).serials).toEqual([]);
    expect(queryAtoms([unknown], {}, 100).serials).toEqual([7]);
  });

  it('上限に達したら打ち切る', () => {
    expect(queryAtoms(atoms, {}, 2)).toEqual({ serials: [1, 2], count: 2, truncated: true });
    expect(queryAtoms(atoms, {}, 7)).toEqual({ serials: [1, 2, 3, 4, 5, 6], count: 6, truncated: false });
  });
});
