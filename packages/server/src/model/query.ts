/**
 * 原子メタデータに対する条件検索
 */

import type { AtomMeta, AtomQueryFilters, QueryAtomsResponse } from '@parmlens/types';

function normalize(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/**
 * フィルタ条件に一致する原子のシリアルを返す
 *
 * 文字列条件は前後の空白を除いて大文字小文字を区別せずに比較する。
 * 電荷の範囲条件がある場合、電荷が不明な原子は除外する。
 * 件数が maxResults に達した時点で打ち切り、truncated を立てる。
 */
export function queryAtoms(
  atoms: Iterable<AtomMeta>,
  filters: AtomQueryFilters,
  maxResults: number
): QueryAtomsResponse {
  const resname = normalize(filters.resnameContains);
  const atomName = normalize(filters.atomnameContains);
  const atomType = normalize(filters.atomTypeEquals);
  const { chargeMin, chargeMax } = filters;

  const serials: number[] = [];
  let truncated = false;
  for (const meta of atoms) {
    if (resname && !meta.residue.resname.toLowerCase().includes(resname)) continue;
    if (atomName && !meta.atomName.toLowerCase().includes(atomName)) continue;
    if (atomType && meta.parm7.atomType.toLowerCase() !== atomType) continue;

    if (chargeMin !== undefined || chargeMax !== undefined) {
      const charge = meta.parm7.charge;
      if (charge === null) continue;
      if (chargeMin !== undefined && charge < chargeMin) continue;
      if (chargeMax !== undefined && charge > chargeMax) continue;
    }

    serials.push(meta.serial);
    if (serials.length >= maxResults) {
      truncated = true;
      break;
    }
  }

  return { serials, count: serials.length, truncated };
}
