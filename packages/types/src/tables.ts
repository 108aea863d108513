/**
 * 派生テーブルの型定義
 */

/** テーブルのセル値。該当する値が無い場合は null */
export type TableValue = string | number | null;

export interface SystemTable {
  columns: string[];
  rows: TableValue[][];
}

export const TABLE_NAMES = [
  'atom_types',
  'bond_types',
  'angle_types',
  'dihedral_types',
  'improper_types',
  'one_four_nonbonded',
  'nonbonded_pairs',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export type SystemTables = Record<TableName, SystemTable>;

/**
 * テーブル名の判定
 */
export function isTableName(value: string): value is TableName {
  return (TABLE_NAMES as readonly string[]).includes(value);
}
