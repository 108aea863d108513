/**
 * 設定ファイルの型定義
 */

export interface ParmLensConfig {
  version: string;
  server: ServerConfig;
  parm7: Parm7Config;
  query: QueryConfig;
  worker: WorkerConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  /** ホスト */
  host: string;
  /** ポート */
  port: number;
}

export interface Parm7Config {
  /** トークン化するセクション名 */
  tokenSections: string[];
  /** CHARGEセクションの値をe単位に変換する除数 */
  chargeScale: number;
}

export interface QueryConfig {
  /** queryAtoms の最大件数 */
  maxResults: number;
}

export interface WorkerConfig {
  /** ロード直後にテーブル・選択インデックスをバックグラウンドで構築するか */
  enabled: boolean;
}

export interface LoggingConfig {
  /** ロード・構築時間をログ出力するか */
  timings: boolean;
}

/** 数値・文字列フィールドを持つ標準セクション */
export const DEFAULT_TOKEN_SECTIONS: readonly string[] = [
  'POINTERS',
  'ATOM_NAME',
  'CHARGE',
  'ATOMIC_NUMBER',
  'MASS',
  'ATOM_TYPE_INDEX',
  'NUMBER_EXCLUDED_ATOMS',
  'NONBONDED_PARM_INDEX',
  'RESIDUE_LABEL',
  'RESIDUE_POINTER',
  'BOND_FORCE_CONSTANT',
  'BOND_EQUIL_VALUE',
  'ANGLE_FORCE_CONSTANT',
  'ANGLE_EQUIL_VALUE',
  'DIHEDRAL_FORCE_CONSTANT',
  'DIHEDRAL_PERIODICITY',
  'DIHEDRAL_PHASE',
  'SCEE_SCALE_FACTOR',
  'SCNB_SCALE_FACTOR',
  'SOLTY',
  'LENNARD_JONES_ACOEF',
  'LENNARD_JONES_BCOEF',
  'BONDS_INC_HYDROGEN',
  'BONDS_WITHOUT_HYDROGEN',
  'ANGLES_INC_HYDROGEN',
  'ANGLES_WITHOUT_HYDROGEN',
  'DIHEDRALS_INC_HYDROGEN',
  'DIHEDRALS_WITHOUT_HYDROGEN',
  'EXCLUDED_ATOMS_LIST',
  'HBOND_ACOEF',
  'HBOND_BCOEF',
  'HBCUT',
  'AMBER_ATOM_TYPE',
  'TREE_CHAIN_CLASSIFICATION',
  'JOIN_ARRAY',
  'IROTAT',
  'RADII',
  'SCREEN',
  'SOLVENT_POINTERS',
  'ATOMS_PER_MOLECULE',
  'BOX_DIMENSIONS',
  'IPOL',
];

/** デフォルト設定 */
export const DEFAULT_CONFIG: ParmLensConfig = {
  version: '1.0',
  server: {
    host: 'localhost',
    port: 24310,
  },
  parm7: {
    tokenSections: [...DEFAULT_TOKEN_SECTIONS],
    chargeScale: 18.2223,
  },
  query: {
    maxResults: 50000,
  },
  worker: {
    enabled: true,
  },
  logging: {
    timings: false,
  },
};
