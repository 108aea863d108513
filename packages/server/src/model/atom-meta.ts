/**
 * parm7セクションからの原子メタデータ構築
 */

import type { AtomMeta, Parm7AtomInfo } from '@parmlens/types';
import { ModelError, ParmLensError, ValueParseError } from '../errors.js';
import type { Position } from '../io/rst7.js';
import { elementForAtomicNumber } from '../parm7/catalog.js';
import type { SectionCache } from '../parm7/section-cache.js';
import { readFloatSection, readIntSection } from '../parm7/sections.js';
import { parseFloatValue } from '../parm7/values.js';
import { diagonalLj, nonbondedOffset } from '../tables/lj.js';

const TWO_LETTER_ELEMENTS = new Set([
  'CL', 'BR', 'NA', 'MG', 'ZN', 'FE', 'CA', 'LI', 'SI', 'AL',
  'CU', 'MN', 'CO', 'NI', 'CD', 'HG', 'PB', 'AG', 'AU',
]);

/**
 * 原子名から元素記号を推定（先頭の数字は読み飛ばす）
 */
export function guessElement(atomName: string): string | null {
  const name = atomName.trim().replace(/^\d+/, '');
  if (!name) {
    return null;
  }
  const upper = name.slice(0, 2).toUpperCase();
  if (TWO_LETTER_ELEMENTS.has(upper)) {
    return upper[0] + upper[1].toLowerCase();
  }
  if (name.length > 1 && name[1] !== name[1].toUpperCase()) {
    return name[0].toUpperCase() + name[1].toLowerCase();
  }
  return name[0].toUpperCase();
}

interface TypeLj {
  pairIndex: number;
  acoef: number | null;
  bcoef: number | null;
  rmin: number;
  epsilon: number;
}

/**
 * タイプ番号 → 対角成分のLJパラメータ
 * 原子タイプ・非結合インデックス・係数は個数を厳密に検査する
 */
function buildLjByType(cache: SectionCache, natom: number, ntypes: number): {
  atomTypeIndices: number[];
  ljByType: Map<number, TypeLj>;
} {
  let atomTypeIndices: number[];
  let nonbondIndex: number[];
  let acoef: number[];
  let bcoef: number[];
  try {
    const ljCount = (ntypes * (ntypes + 1)) / 2;
    atomTypeIndices = readIntSection(cache, 'ATOM_TYPE_INDEX', natom);
    nonbondIndex = readIntSection(cache, 'NONBONDED_PARM_INDEX', ntypes * ntypes);
    acoef = readFloatSection(cache, 'LENNARD_JONES_ACOEF', ljCount);
    bcoef = readFloatSection(cache, 'LENNARD_JONES_BCOEF', ljCount);
  } catch (error) {
    if (!(error instanceof ParmLensError)) throw error;
    throw new ModelError('parm7_parse_failed', 'Failed to parse LJ tables', error.message);
  }

  const ljByType = new Map<number, TypeLj>();
  for (let typeIndex = 1; typeIndex <= ntypes; typeIndex++) {
    const pairIndex = nonbondIndex[nonbondedOffset(ntypes, typeIndex, typeIndex)];
    const usable = pairIndex > 0 && pairIndex <= acoef.length && pairIndex <= bcoef.length;
    const a = usable ? acoef[pairIndex - 1] : null;
    const b = usable ? bcoef[pairIndex - 1] : null;
    ljByType.set(typeIndex, { pairIndex, acoef: a, bcoef: b, ...diagonalLj(a, b) });
  }
  return { atomTypeIndices, ljByType };
}

/**
 * 各原子の所属残基（0-indexed）。RESIDUE_POINTERは各残基の先頭原子（1-indexed）
 */
function residueOfAtoms(residuePointers: readonly number[], natom: number): number[] {
  const residues = new Array<number>(natom).fill(0);
  let residue = 0;
  for (let idx = 0; idx < natom; idx++) {
    const serial = idx + 1;
    while (residue + 1 < residuePointers.length && residuePointers[residue + 1] <= serial) {
      residue += 1;
    }
    residues[idx] = residue;
  }
  return residues;
}

export interface AtomTable {
  atoms: AtomMeta[];
  bySerial: Map<number, AtomMeta>;
  /** resid → 残基キー（"segid:resid:resname"） */
  residueKeysByResid: Map<number, string[]>;
  /** 残基キー → 原子シリアル */
  residueIndex: Map<string, number[]>;
  nresidues: number;
}

export interface BuildAtomTableOptions {
  natom: number;
  ntypes: number;
  /** CHARGEの値をe単位に直すための除数 */
  chargeScale: number;
  positions?: readonly Position[];
}

/**
 * 原子メタデータと残基インデックスを構築
 *
 * @throws ModelError LJ関連セクションの欠落・長さ不一致
 */
export function buildAtomTable(cache: SectionCache, options: BuildAtomTableOptions): AtomTable {
  const { natom, ntypes, chargeScale, positions } = options;
  const { atomTypeIndices, ljByType } = buildLjByType(cache, natom, ntypes);

  const names = cache.strings('ATOM_NAME');
  const amberTypes = cache.strings('AMBER_ATOM_TYPE');
  const masses = cache.floats('MASS');
  const atomicNumbers = cache.ints('ATOMIC_NUMBER');
  const chargeTokens = cache.get('CHARGE')?.tokens ?? [];
  const residueLabels = cache.strings('RESIDUE_LABEL');
  const residuePointers = cache.ints('RESIDUE_POINTER');
  const residues = residueOfAtoms(residuePointers, natom);
  const nresidues = Math.max(residuePointers.length, 1);

  const elementCache = new Map<string, string | null>();
  const atoms: AtomMeta[] = [];
  const bySerial = new Map<number, AtomMeta>();
  const residueKeysByResid = new Map<number, string[]>();
  const residueIndex = new Map<string, number[]>();

  for (let idx = 0; idx < natom; idx++) {
    const serial = idx + 1;
    const atomName = names[idx] ?? '';
    const atomicNumber = atomicNumbers[idx] ?? 0;

    let element = elementForAtomicNumber(atomicNumber);
    if (element === null) {
      if (!elementCache.has(atomName)) {
        elementCache.set(atomName, guessElement(atomName));
      }
      element = elementCache.get(atomName) ?? null;
    }

    const chargeRaw = idx < chargeTokens.length ? chargeTokens[idx].value.trim() : null;
    let charge: number | null = null;
    if (chargeRaw !== null) {
      try {
        charge = parseFloatValue(chargeRaw) / chargeScale;
      } catch (error) {
        if (!(error instanceof ValueParseError)) throw error;
        charge = null;
      }
    }

    const atomTypeIndex = atomTypeIndices[idx];
    const lj = ljByType.get(atomTypeIndex);
    const parm7: Parm7AtomInfo = {
      atomType: amberTypes[idx] ?? '',
      atomTypeIndex,
      charge,
      chargeRaw,
      mass: masses[idx] ?? 0,
      atomicNumber,
      ljPairIndex: lj ? lj.pairIndex : null,
      ljACoef: lj ? lj.acoef : null,
      ljBCoef: lj ? lj.bcoef : null,
      ljRmin: lj ? lj.rmin : null,
      ljEpsilon: lj ? lj.epsilon : null,
    };

    const residueNumber = residues[idx] + 1;
    const resname = residueLabels[residues[idx]] ?? '';
    const position = positions?.[idx] ?? { x: 0, y: 0, z: 0 };
    const meta: AtomMeta = {
      serial,
      atomName,
      element,
      residue: { resid: residueNumber, resname, segid: null, chain: null },
      residueIndex: residueNumber,
      coords: { x: position.x, y: position.y, z: position.z },
      parm7,
    };
    atoms.push(meta);
    bySerial.set(serial, meta);

    const residueKey = `:${residueNumber}:${resname}`;
    const serials = residueIndex.get(residueKey);
    if (serials) {
      serials.push(serial);
    } else {
      residueIndex.set(residueKey, [serial]);
      residueKeysByResid.set(residueNumber, [...(residueKeysByResid.get(residueNumber) ?? []), residueKey]);
    }
  }

  return { atoms, bySerial, residueKeysByResid, residueIndex, nresidues };
}
