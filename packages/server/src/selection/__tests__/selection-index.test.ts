import { describe, it, expect } from 'vitest';
import {
  angleKey,
  bondKey,
  buildSelectionIndex,
  combinationPairAt,
  nonbondedPairForCursor,
  nonbondedPairTotal,
} from '../selection-index.js';
import { cacheFromText, loadMiniCache, readMiniParm7 } from '../../__tests__/helpers.js';

describe('buildSelectionIndex', () => {
  it('タイプごとの原子シリアル', () => {
    const index = buildSelectionIndex(loadMiniCache());

    expect([...index.atomSerialsByType.entries()]).toEqual([
      [1, [1, 2]],
      [2, [3, 4]],
      [3, [5]],
      [4, [6]],
    ]);
  });

  it('結合・角度はタイプとパラメータのキーで引ける', () => {
    const index = buildSelectionIndex(loadMiniCache());

    expect(index.bondsByKey.get(bondKey(2, 1, 1))).toEqual([
      [1, 3],
      [2, 4],
    ]);
    expect(index.bondsByKey.get('1,1,3')).toEqual([[1, 2]]);
    expect(index.anglesByKey.get(angleKey(2, 1, 1, 1))).toEqual([[3, 1, 2]]);
    expect(index.anglesByKey.get('2,1,3,3')).toEqual([[4, 2, 5]]);
  });

  it('二面角は両セクション通しの番号で引ける', () => {
    const index = buildSelectionIndex(loadMiniCache());

    expect(index.dihedralsByIdx.size).toBe(5);
    expect(index.dihedralsByIdx.get(4)).toEqual([3, 1, 2, 5]);
    expect(index.dihedralsByIdx.get(5)).toEqual([1, 5, 2, 4]);
  });

  it('1-4ペアには除外フラグ付きの項と改良二面角を含めない', () => {
    const index = buildSelectionIndex(loadMiniCache());

    expect(index.oneFourByKey.get('1,4,3')).toEqual([[1, 6]]);
    expect(index.oneFourByKey.get('2,3,2')).toEqual([[3, 5]]);
    expect(index.oneFourByKey.has('2,3,4')).toBe(false);
    expect(index.oneFourByKey.size).toBe(3);
  });

  it('タイプ番号が0の原子を含むレコードは登録しない', () => {
    const text = readMiniParm7().replace(
      '       1       1       2       2       3       4',
      '       1       1       0       2       3       4'
    );
    const index = buildSelectionIndex(cacheFromText(text));

    expect(index.atomSerialsByType.get(2)).toEqual([4]);
    expect(index.bondsByKey.get('1,2,1')).toEqual([[2, 4]]);
  });
});

describe('非結合ペアの列挙', () => {
  it('ペア総数', () => {
    expect(nonbondedPairTotal(4, 4, true)).toBe(6);
    expect(nonbondedPairTotal(2, 3, false)).toBe(6);
    expect(nonbondedPairTotal(1, 1, true)).toBe(0);
  });

  it('組み合わせの通し番号を辞書順の (i, j) に変換する', () => {
    const pairs = [0, 1, 2, 3, 4, 5].map((index) => combinationPairAt(4, index));
    expect(pairs).toEqual([
      [0, 1],
      [0, 2],
      [0, 3],
      [1, 2],
      [1, 3],
      [2, 3],
    ]);
  });

  it('大きな集合でも最後の組み合わせを正しく求める', () => {
    expect(combinationPairAt(1000, 499499)).toEqual([998, 999]);
    expect(combinationPairAt(1000, 998)).toEqual([0, 999]);
    expect(combinationPairAt(1000, 999)).toEqual([1, 2]);
  });

  it('範囲外は RangeError', () => {
    expect(() => combinationPairAt(1, 0)).toThrow(RangeError);
    expect(() => combinationPairAt(4, 6)).toThrow(RangeError);
  });

  it('同一タイプはカーソル位置の組み合わせを返し、総数で巡回する', () => {
    const serials = [1, 3, 5, 7];
    expect(nonbondedPairForCursor(serials, serials, 3, true)).toEqual([3, 5]);
    expect(nonbondedPairForCursor(serials, serials, 9, true)).toEqual([3, 5]);
  });

  it('異なるタイプは直積の順に並べる', () => {
    expect(nonbondedPairForCursor([1, 2], [5, 6, 7], 4, false)).toEqual([2, 6]);
  });
});
