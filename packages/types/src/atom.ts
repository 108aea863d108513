/**
 * 原子メタデータの型定義
 */

export interface ResidueInfo {
  resid: number;
  resname: string;
  segid: string | null;
  chain: string | null;
}

export interface Parm7AtomInfo {
  atomType: string;
  atomTypeIndex: number;
  /** 電荷（e単位）。CHARGEが無い・解釈できない場合は null */
  charge: number | null;
  /** CHARGEセクションの生トークン（トリム済み） */
  chargeRaw: string | null;
  mass: number;
  atomicNumber: number;
  ljPairIndex: number | null;
  ljACoef: number | null;
  ljBCoef: number | null;
  /** タイプ対角成分から求めたLJ半径（タイプ番号が範囲外なら null） */
  ljRmin: number | null;
  ljEpsilon: number | null;
}

export interface AtomMeta {
  serial: number;
  atomName: string;
  /** 元素記号（ATOMIC_NUMBER、無ければ原子名から推定） */
  element: string | null;
  residue: ResidueInfo;
  /** 残基の通し番号（1-indexed） */
  residueIndex: number;
  coords: { x: number; y: number; z: number };
  parm7: Parm7AtomInfo;
}
