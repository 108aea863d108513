/**
 * ハイライトと相互作用パラメータの型定義
 */

export const HIGHLIGHT_MODES = [
  'Atom',
  'Bond',
  'Angle',
  'Dihedral',
  'Improper',
  '1-4 Nonbonded',
  'Non-bonded',
] as const;

export type HighlightMode = (typeof HIGHLIGHT_MODES)[number];

export function isHighlightMode(value: string): value is HighlightMode {
  return (HIGHLIGHT_MODES as readonly string[]).includes(value);
}

/**
 * 元テキスト上の範囲（行番号は0-indexed、start/endは行内オフセット）
 */
export interface HighlightSpan {
  line: number;
  start: number;
  end: number;
  section: string;
}

export interface BondTerm {
  serials: [number, number];
  paramIndex: number;
  typeIndices: [number, number] | null;
  forceConstant: number | null;
  equilValue: number | null;
}

export interface AngleTerm {
  serials: [number, number, number];
  paramIndex: number;
  typeIndices: [number, number, number] | null;
  forceConstant: number | null;
  equilValue: number | null;
}

export interface DihedralTerm {
  serials: [number, number, number, number];
  paramIndex: number;
  forceConstant: number | null;
  periodicity: number | null;
  phase: number | null;
  scee: number | null;
  scnb: number | null;
}

export interface OneFourTerm {
  serials: [number, number];
  paramIndex: number;
  typeIndices: [number, number] | null;
  scee: number | null;
  scnb: number | null;
}

export interface NonbondedTerm {
  serials: [number, number];
  typeIndices: [number, number];
  /** NONBONDED_PARM_INDEX の値（負はHBOND側を指す） */
  nbIndex: number;
  acoef: number | null;
  bcoef: number | null;
  rmin: number | null;
  epsilon: number | null;
}

export type Interaction =
  | { mode: 'Bond'; bonds: BondTerm[] }
  | { mode: 'Angle'; angles: AngleTerm[] }
  | { mode: 'Dihedral'; dihedrals: DihedralTerm[] }
  | { mode: 'Improper'; impropers: DihedralTerm[] }
  | { mode: '1-4 Nonbonded'; oneFour: OneFourTerm[]; nonbonded: NonbondedTerm | null }
  | { mode: 'Non-bonded'; nonbonded: NonbondedTerm | null };

export interface HighlightResult {
  highlights: HighlightSpan[];
  interaction: Interaction | null;
}

export interface SelectionResult {
  mode: HighlightMode;
  serials: number[];
  index: number;
  total: number;
}
