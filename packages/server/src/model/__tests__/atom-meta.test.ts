import { describe, it, expect, vi, afterEach } from 'vitest';
import { ModelError } from '../../errors.js';
import { buildAtomTable, guessElement } from '../atom-meta.js';
import { cacheFromText, loadMiniAtomTable, loadMiniCache, readMiniParm7, thrownBy } from '../../__tests__/helpers.js';

describe('guessElement', () => {
  it('2文字の元素記号を優先する', () => {
    expect(guessElement('CL1')).toBe('Cl');
    expect(guessElement('Fe2')).toBe('Fe');
  });

  it('先頭の数字は読み飛ばす', () => {
    expect(guessElement('1HB')).toBe('H');
  });

  it('2文字目が小文字なら2文字の記号とみなす', () => {
    expect(guessElement('Xy')).toBe('Xy');
  });

  it('それ以外は先頭の1文字', () => {
    expect(guessElement('OW')).toBe('O');
    expect(guessElement('c1')).toBe('C');
  });

  it('空の原子名は null', () => {
    expect(guessElement('   ')).toBeNull();
    expect(guessElement('12')).toBeNull();
  });
});

describe('buildAtomTable', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('原子ごとのメタデータを構築する', () => {
    const table = loadMiniAtomTable();
    const first = table.bySerial.get(1);

    expect(table.atoms).toHaveLength(6);
    expect(first).toMatchObject({
      serial: 1,
      atomName: 'C1',
      element: 'C',
      residue: { resid: 1, resname: 'MOL', segid: null, chain: null },
      residueIndex: 1,
      coords: { x: 0, y: 0, z: 0 },
      parm7: {
        atomType: 'CT',
        atomTypeIndex: 1,
        chargeRaw: '-1.82223000E+00',
        mass: 12.01,
        atomicNumber: 6,
        ljPairIndex: 1,
        ljACoef: 100,
        ljBCoef: 10,
      },
    });
    expect(first?.parm7.charge).toBeCloseTo(-0.1, 10);
    expect(first?.parm7.ljEpsilon).toBeCloseTo(0.25, 12);
  });

  it('係数が0のタイプは半径・井戸深さ0', () => {
    const atom = loadMiniAtomTable().bySerial.get(6);
    expect(atom?.parm7).toMatchObject({ ljPairIndex: 10, ljACoef: 0, ljBCoef: 0, ljRmin: 0, ljEpsilon: 0 });
    expect(atom?.element).toBe('H');
  });

  it('残基インデックスを構築する', () => {
    const table = loadMiniAtomTable();

    expect(table.nresidues).toBe(2);
    expect(table.residueKeysByResid.get(1)).toEqual([':1:MOL']);
    expect(table.residueIndex.get(':1:MOL')).toEqual([1, 2, 3]);
    expect(table.residueIndex.get(':2:OHX')).toEqual([4, 5, 6]);
  });

  it('座標を指定すると原子に割り当てる', () => {
    const positions = [1, 2, 3, 4, 5, 6].map((value) => ({ x: value, y: -value, z: 0.5 }));
    const table = buildAtomTable(loadMiniCache(), { natom: 6, ntypes: 4, chargeScale: 18.2223, positions });
    expect(table.bySerial.get(3)?.coords).toEqual({ x: 3, y: -3, z: 0.5 });
  });

  it('ATOMIC_NUMBERが無ければ原子名から元素を推定する', () => {
    const text = readMiniParm7().replace('%FLAG ATOMIC_NUMBER', '%FLAG ATOMIC_NUMBER_OLD');
    const table = buildAtomTable(cacheFromText(text), { natom: 6, ntypes: 4, chargeScale: 18.2223 });

    expect(table.atoms.map((atom) => atom.element)).toEqual(['C', 'C', 'H', 'H', 'O', 'H']);
  });

  it('解釈できない電荷は null', () => {
    const text = readMiniParm7().replace('  7.28892000E+00', '  7.28892000X+00');
    const table = buildAtomTable(cacheFromText(text), { natom: 6, ntypes: 4, chargeScale: 18.2223 });

    expect(table.bySerial.get(6)?.parm7.charge).toBeNull();
    expect(table.bySerial.get(6)?.parm7.chargeRaw).toBe('7.28892000X+00');
  });

  it('LJ関連セクションの長さが合わなければ ModelError', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const text = readMiniParm7().replace('%FLAG NONBONDED_PARM_INDEX', '%FLAG NONBONDED_PARM_INDEX_OLD');

    const error = thrownBy(() =>
      buildAtomTable(cacheFromText(text), { natom: 6, ntypes: 4, chargeScale: 18.2223 })
    );
    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({
      code: 'parm7_parse_failed',
      message: 'Failed to parse LJ tables',
      details: 'NONBONDED_PARM_INDEX section missing',
    });
  });
});
