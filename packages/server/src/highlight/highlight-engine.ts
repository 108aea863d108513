/**
 * ハイライトエンジン
 *
 * 選択された原子シリアルと相互作用モードから、元テキスト上のトークン範囲と
 * デコードした相互作用パラメータを返す。
 */

import type {
  AngleTerm,
  AtomMeta,
  BondTerm,
  DihedralTerm,
  HighlightMode,
  HighlightResult,
  HighlightSpan,
  Interaction,
  NonbondedTerm,
  OneFourTerm,
  Parm7Section,
} from '@parmlens/types';
import { NotFoundError } from '../errors.js';
import {
  ANGLE_SECTIONS,
  BOND_SECTIONS,
  DIHEDRAL_SECTIONS,
  extractAngles,
  extractBonds,
  extractDihedrals,
  formsOneFourPair,
  matchesOrdered,
  matchesUnordered,
  sameSet,
  type AngleRecord,
  type BondRecord,
  type DihedralRecord,
} from '../parm7/records.js';
import type { SectionCache } from '../parm7/section-cache.js';
import { estimateNtypes, nonbondedOffset } from '../tables/lj.js';

const PER_ATOM_SECTIONS = [
  'ATOM_NAME',
  'CHARGE',
  'ATOMIC_NUMBER',
  'MASS',
  'ATOM_TYPE_INDEX',
  'AMBER_ATOM_TYPE',
] as const;

const RESIDUE_SECTIONS = ['RESIDUE_LABEL', 'RESIDUE_POINTER'] as const;

const DIHEDRAL_PARAM_SECTIONS = [
  'DIHEDRAL_FORCE_CONSTANT',
  'DIHEDRAL_PERIODICITY',
  'DIHEDRAL_PHASE',
  'SCEE_SCALE_FACTOR',
  'SCNB_SCALE_FACTOR',
] as const;

/**
 * 重複を除きながらスパンを集める
 */
class SpanCollector {
  readonly spans: HighlightSpan[] = [];
  private seen = new Set<string>();

  add(section: Parm7Section, tokenIndex: number): void {
    if (tokenIndex < 0 || tokenIndex >= section.tokens.length) {
      return;
    }
    const token = section.tokens[tokenIndex];
    const key = `${token.line}:${token.start}:${token.end}`;
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);
    this.spans.push({ line: token.line, start: token.start, end: token.end, section: section.name });
  }

  /** 同じレコードの連続するトークンをまとめて追加 */
  addRange(section: Parm7Section, offset: number, length: number): void {
    for (let idx = 0; idx < length; idx++) {
      this.add(section, offset + idx);
    }
  }
}

interface NonbondedCandidate {
  offset: number;
  nbIndex: number;
}

/**
 * スナップショット単位のハイライトエンジン
 */
export class HighlightEngine {
  private adjacency: Map<number, Set<number>> | null = null;

  constructor(
    private cache: SectionCache,
    private metaBySerial: ReadonlyMap<number, AtomMeta>
  ) {}

  /**
   * 原子1個分の基本スパン（原子ごとのセクションと所属残基のセクション）
   */
  atomSpans(meta: AtomMeta): HighlightSpan[] {
    const collector = new SpanCollector();
    this.collectAtomSpans(collector, meta);
    return collector.spans;
  }

  /**
   * ハイライトと相互作用パラメータを計算
   *
   * @throws NotFoundError メタデータの無いシリアルが含まれる場合
   */
  highlight(serials: readonly number[], mode: HighlightMode = 'Atom'): HighlightResult {
    if (serials.length === 0) {
      return { highlights: [], interaction: null };
    }

    const collector = new SpanCollector();
    const missing: number[] = [];
    for (const serial of serials) {
      const meta = this.metaBySerial.get(serial);
      if (!meta) {
        missing.push(serial);
        continue;
      }
      this.collectAtomSpans(collector, meta);
    }
    if (missing.length > 0) {
      throw new NotFoundError(`Atom serial(s) ${missing.join(', ')} not found`, { serials: missing });
    }

    let interaction: Interaction | null = null;
    switch (mode) {
      case 'Atom':
        for (const serial of serials) {
          this.highlightAtomLj(collector, serial);
        }
        break;

      case 'Bond':
        this.highlightBonds(collector, serials);
        interaction = { mode, bonds: this.bondTerms(serials) };
        break;

      case 'Angle':
        this.highlightAngles(collector, serials);
        interaction = { mode, angles: this.angleTerms(serials) };
        break;

      case 'Dihedral':
        this.highlightDihedrals(collector, serials);
        interaction = { mode, dihedrals: this.dihedralTerms(serials) };
        break;

      case 'Improper':
        this.highlightImpropers(collector, serials);
        interaction = { mode, impropers: this.improperTerms(serials) };
        break;

      case '1-4 Nonbonded': {
        const oneFour = this.oneFourTerms(serials);
        const pairs = oneFour.length > 0 ? oneFour.map((term) => term.serials) : null;
        this.highlightOneFourPairs(collector, serials);
        this.highlightNonbondedPairs(collector, pairs ?? [serials.slice(0, 2)]);
        interaction = {
          mode,
          oneFour,
          nonbonded: this.nonbondedTerm(pairs ? pairs[0] : serials),
        };
        break;
      }

      case 'Non-bonded':
        this.highlightNonbondedPairs(collector, [serials.slice(0, 2)]);
        interaction = { mode, nonbonded: this.nonbondedTerm(serials) };
        break;
    }

    return { highlights: collector.spans, interaction };
  }

  // ========================================
  // Atom
  // ========================================

  private collectAtomSpans(collector: SpanCollector, meta: AtomMeta): void {
    for (const name of PER_ATOM_SECTIONS) {
      const section = this.cache.get(name);
      if (section) collector.add(section, meta.serial - 1);
    }
    for (const name of RESIDUE_SECTIONS) {
      const section = this.cache.get(name);
      if (section) collector.add(section, meta.residueIndex - 1);
    }
  }

  private highlightAtomLj(collector: SpanCollector, serial: number): void {
    const typeIndex = this.typeIndexOf(serial);
    if (!typeIndex) return;
    const values = this.nonbondIndexValues();
    const ntypes = this.ntypes();
    if (values.length === 0 || ntypes === null) return;
    const offset = nonbondedOffset(ntypes, typeIndex, typeIndex);
    if (offset < 0 || offset >= values.length) return;
    const nbIndex = values[offset];
    if (nbIndex > 0) {
      this.addParam(collector, 'LENNARD_JONES_ACOEF', nbIndex);
    } else if (nbIndex < 0) {
      this.addParam(collector, 'HBOND_ACOEF', Math.abs(nbIndex));
    }
  }

  // ========================================
  // Bond / Angle
  // ========================================

  private highlightBonds(collector: SpanCollector, serials: readonly number[]): void {
    if (serials.length < 2) return;
    const target = serials.slice(0, 2);
    this.eachRecord(BOND_SECTIONS, extractBonds, (section, bond) => {
      if (!sameSet([bond.a, bond.b], target)) return;
      collector.addRange(section, bond.offset, 3);
      this.addParam(collector, 'BOND_FORCE_CONSTANT', bond.paramIndex);
      this.addParam(collector, 'BOND_EQUIL_VALUE', bond.paramIndex);
    });
  }

  private bondTerms(serials: readonly number[]): BondTerm[] {
    if (serials.length < 2) return [];
    const target = serials.slice(0, 2);
    const terms: BondTerm[] = [];
    this.eachRecord(BOND_SECTIONS, extractBonds, (_section, bond) => {
      if (!sameSet([bond.a, bond.b], target)) return;
      const typeA = this.typeIndexOf(bond.a);
      const typeB = this.typeIndexOf(bond.b);
      terms.push({
        serials: [bond.a, bond.b],
        paramIndex: bond.paramIndex,
        typeIndices: typeA !== null && typeB !== null ? [typeA, typeB] : null,
        forceConstant: this.paramValue('BOND_FORCE_CONSTANT', bond.paramIndex),
        equilValue: this.paramValue('BOND_EQUIL_VALUE', bond.paramIndex),
      });
    });
    return terms;
  }

  /**
   * 順方向・逆方向で一致する角度。無ければ順序を無視して一致するもの
   */
  private matchingAngles(serials: readonly number[]): { section: Parm7Section; angle: AngleRecord }[] {
    if (serials.length < 3) return [];
    const collect = (match: (record: readonly number[], target: readonly number[]) => boolean) => {
      const found: { section: Parm7Section; angle: AngleRecord }[] = [];
      this.eachRecord(ANGLE_SECTIONS, extractAngles, (section, angle) => {
        if (match([angle.i, angle.j, angle.k], serials)) found.push({ section, angle });
      });
      return found;
    };
    const ordered = collect(matchesOrdered);
    return ordered.length > 0 ? ordered : collect(matchesUnordered);
  }

  private highlightAngles(collector: SpanCollector, serials: readonly number[]): void {
    for (const { section, angle } of this.matchingAngles(serials)) {
      collector.addRange(section, angle.offset, 4);
      this.addParam(collector, 'ANGLE_FORCE_CONSTANT', angle.paramIndex);
      this.addParam(collector, 'ANGLE_EQUIL_VALUE', angle.paramIndex);
    }
  }

  private angleTerms(serials: readonly number[]): AngleTerm[] {
    return this.matchingAngles(serials).map(({ angle }) => {
      const typeI = this.typeIndexOf(angle.i);
      const typeJ = this.typeIndexOf(angle.j);
      const typeK = this.typeIndexOf(angle.k);
      return {
        serials: [angle.i, angle.j, angle.k],
        paramIndex: angle.paramIndex,
        typeIndices: typeI !== null && typeJ !== null && typeK !== null ? [typeI, typeJ, typeK] : null,
        forceConstant: this.paramValue('ANGLE_FORCE_CONSTANT', angle.paramIndex),
        equilValue: this.paramValue('ANGLE_EQUIL_VALUE', angle.paramIndex),
      };
    });
  }

  // ========================================
  // Dihedral / Improper
  // ========================================

  private matchingDihedrals(serials: readonly number[]): { section: Parm7Section; dihedral: DihedralRecord }[] {
    if (serials.length < 4) return [];
    const collect = (match: (record: readonly number[], target: readonly number[]) => boolean) => {
      const found: { section: Parm7Section; dihedral: DihedralRecord }[] = [];
      this.eachRecord(DIHEDRAL_SECTIONS, extractDihedrals, (section, dihedral) => {
        if (match([dihedral.i, dihedral.j, dihedral.k, dihedral.l], serials)) found.push({ section, dihedral });
      });
      return found;
    };
    const ordered = collect(matchesOrdered);
    return ordered.length > 0 ? ordered : collect(matchesUnordered);
  }

  private highlightDihedrals(collector: SpanCollector, serials: readonly number[]): void {
    for (const { section, dihedral } of this.matchingDihedrals(serials)) {
      this.highlightDihedralRecord(collector, section, dihedral);
    }
  }

  private dihedralTerms(serials: readonly number[]): DihedralTerm[] {
    return this.matchingDihedrals(serials).map(({ dihedral }) =>
      this.dihedralTerm([dihedral.i, dihedral.j, dihedral.k, dihedral.l], dihedral.paramIndex)
    );
  }

  /**
   * 改良二面角として並べ替えた4原子と中心原子
   * 中心原子は他の3原子すべてと結合している候補のうち最小のシリアル
   */
  private improperTarget(
    serials: readonly number[]
  ): { central: number; ordered: [number, number, number, number] } | null {
    if (serials.length < 4) return null;
    const adjacency = this.bondAdjacency();
    if (adjacency.size === 0) return null;
    const quad = serials.slice(0, 4);
    const candidates = quad.filter((candidate) => {
      const neighbors = adjacency.get(candidate);
      return quad.every((other) => other === candidate || (neighbors?.has(other) ?? false));
    });
    if (candidates.length === 0) return null;
    const central = Math.min(...candidates);
    const others = quad.filter((serial) => serial !== central).sort((a, b) => a - b);
    if (others.length !== 3) return null;
    return { central, ordered: [central, others[0], others[1], others[2]] };
  }

  private matchingImpropers(
    serials: readonly number[]
  ): { ordered: [number, number, number, number]; matches: { section: Parm7Section; dihedral: DihedralRecord }[] } | null {
    const target = this.improperTarget(serials);
    if (!target) return null;
    const adjacency = this.bondAdjacency();
    const neighbors = adjacency.get(target.central) ?? new Set<number>();
    const matches: { section: Parm7Section; dihedral: DihedralRecord }[] = [];
    this.eachRecord(DIHEDRAL_SECTIONS, extractDihedrals, (section, dihedral) => {
      const record = [dihedral.i, dihedral.j, dihedral.k, dihedral.l];
      if (!sameSet(record, target.ordered)) return;
      if (!record.every((serial) => serial === target.central || neighbors.has(serial))) return;
      matches.push({ section, dihedral });
    });
    return { ordered: target.ordered, matches };
  }

  private highlightImpropers(collector: SpanCollector, serials: readonly number[]): void {
    const found = this.matchingImpropers(serials);
    if (!found) return;
    for (const { section, dihedral } of found.matches) {
      this.highlightDihedralRecord(collector, section, dihedral);
    }
  }

  private improperTerms(serials: readonly number[]): DihedralTerm[] {
    const found = this.matchingImpropers(serials);
    if (!found) return [];
    return found.matches.map(({ dihedral }) => this.dihedralTerm([...found.ordered], dihedral.paramIndex));
  }

  private highlightDihedralRecord(collector: SpanCollector, section: Parm7Section, dihedral: DihedralRecord): void {
    collector.addRange(section, dihedral.offset, 5);
    for (const name of DIHEDRAL_PARAM_SECTIONS) {
      this.addParam(collector, name, dihedral.paramIndex);
    }
  }

  private dihedralTerm(serials: [number, number, number, number], paramIndex: number): DihedralTerm {
    return {
      serials,
      paramIndex,
      forceConstant: this.paramValue('DIHEDRAL_FORCE_CONSTANT', paramIndex),
      periodicity: this.paramValue('DIHEDRAL_PERIODICITY', paramIndex),
      phase: this.paramValue('DIHEDRAL_PHASE', paramIndex),
      scee: this.paramValue('SCEE_SCALE_FACTOR', paramIndex),
      scnb: this.paramValue('SCNB_SCALE_FACTOR', paramIndex),
    };
  }

  /**
   * 結合隣接リスト（両方の結合セクションから構築し、エンジンの寿命の間保持）
   */
  private bondAdjacency(): Map<number, Set<number>> {
    if (this.adjacency) return this.adjacency;
    const adjacency = new Map<number, Set<number>>();
    const link = (from: number, to: number): void => {
      const neighbors = adjacency.get(from) ?? new Set<number>();
      neighbors.add(to);
      adjacency.set(from, neighbors);
    };
    this.eachRecord(BOND_SECTIONS, extractBonds, (_section, bond: BondRecord) => {
      link(bond.a, bond.b);
      link(bond.b, bond.a);
    });
    this.adjacency = adjacency;
    return adjacency;
  }

  // ========================================
  // 1-4 / Non-bonded
  // ========================================

  private eachOneFour(serials: readonly number[], fn: (section: Parm7Section, dihedral: DihedralRecord) => void): void {
    if (serials.length < 2) return;
    const target = serials.slice(0, 2);
    this.eachRecord(DIHEDRAL_SECTIONS, extractDihedrals, (section, dihedral) => {
      if (!formsOneFourPair(dihedral)) return;
      if (!sameSet([dihedral.i, dihedral.l], target)) return;
      fn(section, dihedral);
    });
  }

  private highlightOneFourPairs(collector: SpanCollector, serials: readonly number[]): void {
    this.eachOneFour(serials, (section, dihedral) => {
      collector.addRange(section, dihedral.offset, 5);
      this.addParam(collector, 'SCEE_SCALE_FACTOR', dihedral.paramIndex);
      this.addParam(collector, 'SCNB_SCALE_FACTOR', dihedral.paramIndex);
    });
  }

  private oneFourTerms(serials: readonly number[]): OneFourTerm[] {
    const terms: OneFourTerm[] = [];
    this.eachOneFour(serials, (_section, dihedral) => {
      const typeI = this.typeIndexOf(dihedral.i);
      const typeL = this.typeIndexOf(dihedral.l);
      terms.push({
        serials: [dihedral.i, dihedral.l],
        paramIndex: dihedral.paramIndex,
        typeIndices: typeI !== null && typeL !== null ? [typeI, typeL] : null,
        scee: this.paramValue('SCEE_SCALE_FACTOR', dihedral.paramIndex),
        scnb: this.paramValue('SCNB_SCALE_FACTOR', dihedral.paramIndex),
      });
    });
    return terms;
  }

  /**
   * タイプ対 (a, b) と転置 (b, a) の NONBONDED_PARM_INDEX 上の位置と値
   */
  private nonbondedCandidates(typeA: number, typeB: number): [NonbondedCandidate | null, NonbondedCandidate | null] {
    const values = this.nonbondIndexValues();
    const ntypes = this.ntypes();
    if (values.length === 0 || ntypes === null) return [null, null];
    const candidate = (a: number, b: number): NonbondedCandidate | null => {
      const offset = nonbondedOffset(ntypes, a, b);
      return offset >= 0 && offset < values.length ? { offset, nbIndex: values[offset] } : null;
    };
    return [candidate(typeA, typeB), candidate(typeB, typeA)];
  }

  private highlightNonbondedPairs(collector: SpanCollector, pairs: readonly (readonly number[])[]): void {
    const section = this.cache.withTokens('NONBONDED_PARM_INDEX');
    if (!section) return;
    const nbIndices = new Set<number>();
    for (const pair of pairs) {
      if (pair.length < 2) continue;
      const typeA = this.typeIndexOf(pair[0]);
      const typeB = this.typeIndexOf(pair[1]);
      if (!typeA || !typeB) continue;
      for (const candidate of this.nonbondedCandidates(typeA, typeB)) {
        if (!candidate) continue;
        collector.add(section, candidate.offset);
        if (candidate.nbIndex !== 0) nbIndices.add(candidate.nbIndex);
      }
    }
    for (const nbIndex of nbIndices) {
      if (nbIndex > 0) {
        this.addParam(collector, 'LENNARD_JONES_ACOEF', nbIndex);
        this.addParam(collector, 'LENNARD_JONES_BCOEF', nbIndex);
      } else {
        this.addParam(collector, 'HBOND_ACOEF', Math.abs(nbIndex));
        this.addParam(collector, 'HBOND_BCOEF', Math.abs(nbIndex));
        const hbcut = this.cache.withTokens('HBCUT');
        if (hbcut) collector.add(hbcut, 0);
      }
    }
  }

  private nonbondedTerm(serials: readonly number[]): NonbondedTerm | null {
    if (serials.length < 2) return null;
    const [serialA, serialB] = serials;
    const typeA = this.typeIndexOf(serialA);
    const typeB = this.typeIndexOf(serialB);
    if (!typeA || !typeB) return null;
    if (this.nonbondIndexValues().length === 0 || this.ntypes() === null) return null;
    const [primary, secondary] = this.nonbondedCandidates(typeA, typeB);

    let nbIndex = primary ? primary.nbIndex : 0;
    if (nbIndex === 0 && secondary) {
      nbIndex = secondary.nbIndex;
    }
    let acoef: number | null = null;
    let bcoef: number | null = null;
    let rmin: number | null = null;
    let epsilon: number | null = null;
    if (nbIndex > 0) {
      acoef = this.paramValue('LENNARD_JONES_ACOEF', nbIndex);
      bcoef = this.paramValue('LENNARD_JONES_BCOEF', nbIndex);
      if (acoef && bcoef) {
        epsilon = (bcoef * bcoef) / (4.0 * acoef);
        rmin = Math.pow((2.0 * acoef) / bcoef, 1.0 / 6.0);
      }
    }
    return { serials: [serialA, serialB], typeIndices: [typeA, typeB], nbIndex, acoef, bcoef, rmin, epsilon };
  }

  private nonbondIndexValues(): number[] {
    return this.cache.withTokens('NONBONDED_PARM_INDEX') ? this.cache.ints('NONBONDED_PARM_INDEX') : [];
  }

  private ntypes(): number | null {
    const acoef = this.cache.get('LENNARD_JONES_ACOEF');
    return estimateNtypes(this.nonbondIndexValues().length, acoef ? acoef.tokens.length : 0);
  }

  // ========================================
  // Helpers
  // ========================================

  private eachRecord<R>(
    sectionNames: readonly string[],
    extract: (values: readonly number[]) => R[],
    fn: (section: Parm7Section, record: R) => void
  ): void {
    for (const name of sectionNames) {
      const section = this.cache.withTokens(name);
      if (!section) continue;
      for (const record of extract(this.cache.ints(name))) {
        fn(section, record);
      }
    }
  }

  private typeIndexOf(serial: number): number | null {
    const meta = this.metaBySerial.get(serial);
    return meta ? meta.parm7.atomTypeIndex : null;
  }

  private addParam(collector: SpanCollector, sectionName: string, paramIndex: number): void {
    if (paramIndex <= 0) return;
    const section = this.cache.get(sectionName);
    if (section) collector.add(section, paramIndex - 1);
  }

  private paramValue(sectionName: string, paramIndex: number): number | null {
    if (paramIndex <= 0 || !this.cache.get(sectionName)) return null;
    const values = this.cache.floats(sectionName);
    const index = paramIndex - 1;
    return index < values.length ? values[index] : null;
  }
}
