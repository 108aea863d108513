/**
 * 派生テーブルの構築
 *
 * POINTERSで宣言された長さに従って各セクションを厳密に読み出し、
 * 結合項レコードをタイプ・パラメータごとに集計した7つのテーブルを作る。
 */

import type { SystemTable, SystemTables, TableValue } from '@parmlens/types';
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
  type AngleRecord,
  type BondRecord,
  type DihedralRecord,
} from '../parm7/records.js';
import type { SectionCache } from '../parm7/section-cache.js';
import {
  readFloatSection,
  readIntSection,
  readOptionalFloatSection,
  readStringSection,
} from '../parm7/sections.js';
import {
  diagonalLj,
  lookupPairValues,
  nonbondedOffset,
  nonbondedPairIndex,
  type CoefficientTables,
} from './lj.js';
import { findRotatableBonds, isRotatable } from './rotatable.js';

const ATOM_TYPE_COLUMNS = [
  'type_index',
  'amber_types',
  'atom_count',
  'pair_index',
  'acoef',
  'bcoef',
  'rmin',
  'epsilon',
];

const BOND_COLUMNS = [
  'type_a',
  'type_a_name',
  'type_b',
  'type_b_name',
  'param_index',
  'force_constant',
  'equil_value',
  'count',
];

const ANGLE_COLUMNS = [
  'type_i',
  'type_i_name',
  'type_j',
  'type_j_name',
  'type_k',
  'type_k_name',
  'param_index',
  'force_constant',
  'equil_value',
  'count',
];

const DIHEDRAL_COLUMNS = [
  'ID',
  'idx',
  'ijkl indices',
  'ijkl names',
  'ijkl types',
  'rotatable',
  'k',
  'pdcty',
  'phase',
  'scee',
  'scnb',
];

const IMPROPER_COLUMNS = [
  'ID',
  'idx',
  'ijkl indices',
  'ijkl names',
  'ijkl types',
  'force_constant',
  'periodicity',
  'phase',
  'scee',
  'scnb',
];

const ONE_FOUR_COLUMNS = [
  'type_a',
  'type_a_name',
  'type_b',
  'type_b_name',
  'param_index',
  'scee',
  'scnb',
  'pair_index',
  'acoef',
  'bcoef',
  'rmin',
  'epsilon',
  'source',
  'count',
];

const NONBONDED_COLUMNS = [
  'type_a',
  'type_a_name',
  'type_b',
  'type_b_name',
  'pair_index',
  'acoef',
  'bcoef',
  'rmin',
  'epsilon',
  'source',
];

/**
 * 構築に必要なセクションをまとめたもの
 */
interface TopologyArrays {
  natom: number;
  ntypes: number;
  atomTypeIndices: number[];
  atomNames: string[];
  amberAtomTypes: string[];
  masses: number[];
  nonbondIndex: number[];
  coefficients: CoefficientTables;
  bondForce: number[];
  bondEquil: number[];
  angleForce: number[];
  angleEquil: number[];
  dihedralForce: number[];
  dihedralPeriodicity: number[];
  dihedralPhase: number[];
  scee: (number | null)[];
  scnb: (number | null)[];
  bonds: BondRecord[];
  angles: AngleRecord[];
  dihedrals: DihedralRecord[];
}

function readTopology(cache: SectionCache): TopologyArrays {
  const pointers = decodePointers(cache.get('POINTERS'));
  const natom = pointers.NATOM;
  const ntypes = pointers.NTYPES;
  if (natom <= 0 || ntypes <= 0) {
    throw new FormatError(`Invalid POINTERS NATOM/NTYPES ${natom}/${ntypes}`);
  }
  const ljCount = (ntypes * (ntypes + 1)) / 2;

  const atomTypeIndices = readIntSection(cache, 'ATOM_TYPE_INDEX', natom);
  const atomNames = readStringSection(cache, 'ATOM_NAME', natom);
  const amberAtomTypes = readStringSection(cache, 'AMBER_ATOM_TYPE', natom);
  const masses = readFloatSection(cache, 'MASS', natom);
  const nonbondIndex = readIntSection(cache, 'NONBONDED_PARM_INDEX', ntypes * ntypes);
  const coefficients: CoefficientTables = {
    acoef: readFloatSection(cache, 'LENNARD_JONES_ACOEF', ljCount),
    bcoef: readFloatSection(cache, 'LENNARD_JONES_BCOEF', ljCount),
    hbondAcoef: readFloatSection(cache, 'HBOND_ACOEF', pointers.NPHB),
    hbondBcoef: readFloatSection(cache, 'HBOND_BCOEF', pointers.NPHB),
  };

  const bondForce = readFloatSection(cache, 'BOND_FORCE_CONSTANT', pointers.NUMBND);
  const bondEquil = readFloatSection(cache, 'BOND_EQUIL_VALUE', pointers.NUMBND);
  const angleForce = readFloatSection(cache, 'ANGLE_FORCE_CONSTANT', pointers.NUMANG);
  const angleEquil = readFloatSection(cache, 'ANGLE_EQUIL_VALUE', pointers.NUMANG);
  const dihedralForce = readFloatSection(cache, 'DIHEDRAL_FORCE_CONSTANT', pointers.NPTRA);
  const dihedralPeriodicity = readFloatSection(cache, 'DIHEDRAL_PERIODICITY', pointers.NPTRA);
  const dihedralPhase = readFloatSection(cache, 'DIHEDRAL_PHASE', pointers.NPTRA);
  const scee = readOptionalFloatSection(cache, 'SCEE_SCALE_FACTOR', pointers.NPTRA);
  const scnb = readOptionalFloatSection(cache, 'SCNB_SCALE_FACTOR', pointers.NPTRA);

  const [bondsH, bondsHeavy] = BOND_SECTIONS;
  const [anglesH, anglesHeavy] = ANGLE_SECTIONS;
  const [dihedralsH, dihedralsHeavy] = DIHEDRAL_SECTIONS;
  const bonds = [
    ...extractBonds(readIntSection(cache, bondsH, pointers.NBONH * 3)),
    ...extractBonds(readIntSection(cache, bondsHeavy, pointers.MBONA * 3)),
  ];
  const angles = [
    ...extractAngles(readIntSection(cache, anglesH, pointers.NTHETH * 4)),
    ...extractAngles(readIntSection(cache, anglesHeavy, pointers.MTHETA * 4)),
  ];
  const dihedrals = [
    ...extractDihedrals(readIntSection(cache, dihedralsH, pointers.NPHIH * 5)),
    ...extractDihedrals(readIntSection(cache, dihedralsHeavy, pointers.MPHIA * 5)),
  ];

  return {
    natom,
    ntypes,
    atomTypeIndices,
    atomNames,
    amberAtomTypes,
    masses,
    nonbondIndex,
    coefficients,
    bondForce,
    bondEquil,
    angleForce,
    angleEquil,
    dihedralForce,
    dihedralPeriodicity,
    dihedralPhase,
    scee,
    scnb,
    bonds,
    angles,
    dihedrals,
  };
}

// ========================================
// Helpers
// ========================================

/**
 * 1-indexedのパラメータ参照。範囲外は null
 */
function lookupParam(values: readonly (number | null)[], paramIndex: number): number | null {
  if (paramIndex <= 0 || paramIndex > values.length) {
    return null;
  }
  return values[paramIndex - 1];
}

function lookupLabel(values: readonly string[], serial: number): string {
  const index = serial - 1;
  return index >= 0 && index < values.length ? values[index] : '';
}

function typeIndexOf(topology: TopologyArrays, serial: number, kind: string): number {
  if (serial > topology.natom) {
    throw new FormatError(`${kind} record references atom ${serial} beyond NATOM ${topology.natom}`, {
      serial,
      natom: topology.natom,
    });
  }
  return topology.atomTypeIndices[serial - 1];
}

/**
 * タイプ番号 → そのタイプに属するAMBER原子タイプ名（重複なし・ソート済み・カンマ区切り）
 */
function buildTypeNameMap(
  atomTypeIndices: readonly number[],
  amberAtomTypes: readonly string[],
  ntypes: number
): Map<number, string> {
  const namesByType = new Map<number, Set<string>>();
  atomTypeIndices.forEach((typeIndex, idx) => {
    const names = namesByType.get(typeIndex) ?? new Set<string>();
    const name = amberAtomTypes[idx] ?? '';
    if (name) names.add(name);
    namesByType.set(typeIndex, names);
  });
  const typeNames = new Map<number, string>();
  for (const [typeIndex, names] of namesByType) {
    typeNames.set(typeIndex, [...names].sort().join(', '));
  }
  for (let typeIndex = 1; typeIndex <= ntypes; typeIndex++) {
    if (!typeNames.has(typeIndex)) typeNames.set(typeIndex, '');
  }
  return typeNames;
}

/**
 * セル値の比較（null は最後）
 */
function compareValues(a: TableValue, b: TableValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : 1;
}

function compareKeys(a: readonly TableValue[], b: readonly TableValue[]): number {
  for (let idx = 0; idx < a.length; idx++) {
    const order = compareValues(a[idx], b[idx]);
    if (order !== 0) return order;
  }
  return 0;
}

interface Group {
  key: TableValue[];
  count: number;
}

/**
 * 同一キーのレコードをまとめて件数を数え、キー昇順に並べる
 */
function groupRecords(keys: readonly TableValue[][]): Group[] {
  const groups = new Map<string, Group>();
  for (const key of keys) {
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.count += 1;
    } else {
      groups.set(id, { key, count: 1 });
    }
  }
  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

// ========================================
// Tables
// ========================================

function buildAtomTypeTable(topology: TopologyArrays, typeNames: Map<number, string>): SystemTable {
  const { ntypes, nonbondIndex, coefficients } = topology;
  const atomCounts = new Map<number, number>();
  for (const typeIndex of topology.atomTypeIndices) {
    atomCounts.set(typeIndex, (atomCounts.get(typeIndex) ?? 0) + 1);
  }

  const rows: TableValue[][] = [];
  for (let typeIndex = 1; typeIndex <= ntypes; typeIndex++) {
    const offset = nonbondedOffset(ntypes, typeIndex, typeIndex);
    const pairIndex = offset < nonbondIndex.length ? nonbondIndex[offset] : 0;
    const usable =
      pairIndex > 0 && pairIndex <= coefficients.acoef.length && pairIndex <= coefficients.bcoef.length;
    const acoef = usable ? coefficients.acoef[pairIndex - 1] : null;
    const bcoef = usable ? coefficients.bcoef[pairIndex - 1] : null;
    const { rmin, epsilon } = diagonalLj(acoef, bcoef);
    rows.push([
      typeIndex,
      typeNames.get(typeIndex) ?? null,
      atomCounts.get(typeIndex) ?? 0,
      pairIndex,
      acoef,
      bcoef,
      rmin,
      epsilon,
    ]);
  }
  return { columns: [...ATOM_TYPE_COLUMNS], rows };
}

function buildBondTable(topology: TopologyArrays, typeNames: Map<number, string>): SystemTable {
  const keys = topology.bonds.map((bond) => {
    const [typeA, typeB] = sortedPair(
      typeIndexOf(topology, bond.a, 'Bond'),
      typeIndexOf(topology, bond.b, 'Bond')
    );
    return [
      typeA,
      typeB,
      bond.paramIndex,
      lookupParam(topology.bondForce, bond.paramIndex),
      lookupParam(topology.bondEquil, bond.paramIndex),
    ];
  });
  const rows = groupRecords(keys).map(({ key, count }) => {
    const [typeA, typeB, paramIndex, force, equil] = key;
    return [
      typeA,
      nameOf(typeNames, typeA),
      typeB,
      nameOf(typeNames, typeB),
      paramIndex,
      force,
      equil,
      count,
    ];
  });
  return { columns: [...BOND_COLUMNS], rows };
}

function buildAngleTable(topology: TopologyArrays, typeNames: Map<number, string>): SystemTable {
  const keys = topology.angles.map((angle) => {
    const [typeI, typeK] = sortedPair(
      typeIndexOf(topology, angle.i, 'Angle'),
      typeIndexOf(topology, angle.k, 'Angle')
    );
    return [
      typeI,
      typeIndexOf(topology, angle.j, 'Angle'),
      typeK,
      angle.paramIndex,
      lookupParam(topology.angleForce, angle.paramIndex),
      lookupParam(topology.angleEquil, angle.paramIndex),
    ];
  });
  const rows = groupRecords(keys).map(({ key, count }) => {
    const [typeI, typeJ, typeK, paramIndex, force, equil] = key;
    return [
      typeI,
      nameOf(typeNames, typeI),
      typeJ,
      nameOf(typeNames, typeJ),
      typeK,
      nameOf(typeNames, typeK),
      paramIndex,
      force,
      equil,
      count,
    ];
  });
  return { columns: [...ANGLE_COLUMNS], rows };
}

function nameOf(typeNames: Map<number, string>, typeIndex: TableValue): string | null {
  return typeof typeIndex === 'number' ? (typeNames.get(typeIndex) ?? null) : null;
}

interface TermLabels {
  id: number;
  idx: number;
  indices: string;
  names: string;
  types: string;
}

/**
 * 二面角・改良二面角の行ラベル
 * 同じ (i, j, k, l) の複数の項は同じIDを共有する
 */
function termLabeler(topology: TopologyArrays): (dihedral: DihedralRecord, idx: number) => TermLabels {
  const idByQuad = new Map<string, number>();
  return (dihedral, idx) => {
    const quad = [dihedral.i, dihedral.j, dihedral.k, dihedral.l];
    const quadKey = quad.join(',');
    let id = idByQuad.get(quadKey);
    if (id === undefined) {
      id = idByQuad.size + 1;
      idByQuad.set(quadKey, id);
    }
    return {
      id,
      idx,
      indices: quad.join(', '),
      names: quad.map((serial) => lookupLabel(topology.atomNames, serial)).join(', '),
      types: quad.map((serial) => lookupLabel(topology.amberAtomTypes, serial)).join(', '),
    };
  };
}

function buildDihedralTable(topology: TopologyArrays): SystemTable {
  const rotatable = findRotatableBonds(topology.bonds, topology.dihedrals, topology.masses);
  const label = termLabeler(topology);
  const rows = topology.dihedrals.map((dihedral, position) => {
    const labels = label(dihedral, position + 1);
    const param = dihedral.paramIndex;
    return [
      labels.id,
      labels.idx,
      labels.indices,
      labels.names,
      labels.types,
      isRotatable(rotatable, dihedral.j, dihedral.k) ? 'T' : 'F',
      lookupParam(topology.dihedralForce, param),
      lookupParam(topology.dihedralPeriodicity, param),
      lookupParam(topology.dihedralPhase, param),
      lookupParam(topology.scee, param),
      lookupParam(topology.scnb, param),
    ];
  });
  return { columns: [...DIHEDRAL_COLUMNS], rows };
}

function buildImproperTable(topology: TopologyArrays): SystemTable {
  const label = termLabeler(topology);
  const rows: TableValue[][] = [];
  topology.dihedrals.forEach((dihedral, position) => {
    if (!dihedral.improper) return;
    const labels = label(dihedral, position + 1);
    const param = dihedral.paramIndex;
    rows.push([
      labels.id,
      labels.idx,
      labels.indices,
      labels.names,
      labels.types,
      lookupParam(topology.dihedralForce, param),
      lookupParam(topology.dihedralPeriodicity, param),
      lookupParam(topology.dihedralPhase, param),
      lookupParam(topology.scee, param),
      lookupParam(topology.scnb, param),
    ]);
  });
  return { columns: [...IMPROPER_COLUMNS], rows };
}

function buildOneFourTable(topology: TopologyArrays, typeNames: Map<number, string>): SystemTable {
  const keys: TableValue[][] = [];
  for (const dihedral of topology.dihedrals) {
    if (!formsOneFourPair(dihedral)) continue;
    const typeI = typeIndexOf(topology, dihedral.i, 'Dihedral');
    const typeL = typeIndexOf(topology, dihedral.l, 'Dihedral');
    const pairIndex = nonbondedPairIndex(topology.nonbondIndex, topology.ntypes, typeI, typeL);
    const values = lookupPairValues(pairIndex, topology.coefficients);
    const [typeA, typeB] = sortedPair(typeI, typeL);
    keys.push([
      typeA,
      typeB,
      dihedral.paramIndex,
      lookupParam(topology.scee, dihedral.paramIndex),
      lookupParam(topology.scnb, dihedral.paramIndex),
      pairIndex,
      values.acoef,
      values.bcoef,
      values.rmin,
      values.epsilon,
      values.source,
    ]);
  }
  const rows = groupRecords(keys).map(({ key, count }) => {
    const [typeA, typeB, ...rest] = key;
    return [typeA, nameOf(typeNames, typeA), typeB, nameOf(typeNames, typeB), ...rest, count];
  });
  return { columns: [...ONE_FOUR_COLUMNS], rows };
}

function buildNonbondedTable(topology: TopologyArrays, typeNames: Map<number, string>): SystemTable {
  const { ntypes, nonbondIndex, coefficients } = topology;
  const rows: TableValue[][] = [];
  for (let typeA = 1; typeA <= ntypes; typeA++) {
    for (let typeB = typeA; typeB <= ntypes; typeB++) {
      const pairIndex = nonbondIndex[nonbondedOffset(ntypes, typeA, typeB)];
      const values = lookupPairValues(pairIndex, coefficients);
      rows.push([
        typeA,
        typeNames.get(typeA) ?? null,
        typeB,
        typeNames.get(typeB) ?? null,
        pairIndex,
        values.acoef,
        values.bcoef,
        values.rmin,
        values.epsilon,
        values.source,
      ]);
    }
  }
  return { columns: [...NONBONDED_COLUMNS], rows };
}

/**
 * セクションから7つの派生テーブルを構築
 *
 * @throws FormatError 必須セクションの欠落・長さ不一致・数値として解釈できない値
 */
export function buildSystemTables(cache: SectionCache): SystemTables {
  const topology = readTopology(cache);
  const typeNames = buildTypeNameMap(topology.atomTypeIndices, topology.amberAtomTypes, topology.ntypes);

  return {
    atom_types: buildAtomTypeTable(topology, typeNames),
    bond_types: buildBondTable(topology, typeNames),
    angle_types: buildAngleTable(topology, typeNames),
    dihedral_types: buildDihedralTable(topology),
    improper_types: buildImproperTable(topology),
    one_four_nonbonded: buildOneFourTable(topology, typeNames),
    nonbonded_pairs: buildNonbondedTable(topology, typeNames),
  };
}
