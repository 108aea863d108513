/**
 * parm7トポロジファイルの型定義
 */

/**
 * 固定幅フィールド1つ分のトークン
 * start/end は line 内の文字オフセット
 */
export interface Parm7Token {
  readonly value: string;
  readonly line: number;
  readonly start: number;
  readonly end: number;
}

/**
 * %FLAG で始まるセクション
 */
export interface Parm7Section {
  readonly name: string;
  /** %FORMAT で宣言された1行あたりのフィールド数（未宣言時は0） */
  readonly count: number;
  /** %FORMAT で宣言されたフィールド幅（未宣言時は0） */
  readonly width: number;
  /** %FLAG 行の行番号（0-indexed） */
  readonly line: number;
  /** セクション最終行の行番号（0-indexed） */
  readonly endLine: number;
  readonly tokens: readonly Parm7Token[];
}

/** セクション名 → セクション */
export type Parm7Sections = ReadonlyMap<string, Parm7Section>;

/**
 * POINTERSセクションの並び順
 * 32番目（NUMEXTRA）は省略可能
 */
export const POINTER_NAMES = [
  'NATOM',
  'NTYPES',
  'NBONH',
  'MBONA',
  'NTHETH',
  'MTHETA',
  'NPHIH',
  'MPHIA',
  'NHPARM',
  'NPARM',
  'NNB',
  'NRES',
  'NBONA',
  'NTHETA',
  'NPHIA',
  'NUMBND',
  'NUMANG',
  'NPTRA',
  'NATYP',
  'NPHB',
  'IFPERT',
  'NBPER',
  'NGPER',
  'NDPER',
  'MBPER',
  'MGPER',
  'MDPER',
  'IFBOX',
  'NMXRS',
  'IFCAP',
  'NUMEXTRA',
  'NCOPY',
] as const;

export type PointerName = (typeof POINTER_NAMES)[number];

/** 名前付きのPOINTERS値。NCOPYが無いファイルでは欠落する */
export type PointerSet = Readonly<Record<Exclude<PointerName, 'NCOPY'>, number>> & {
  readonly NCOPY?: number;
};

/**
 * getSections のレスポンス要素
 */
export interface SectionSummary {
  name: string;
  line: number;
  endLine: number;
  count: number;
  width: number;
  tokenCount: number;
  description: string;
  deprecated: boolean;
}
