/**
 * 固定カラムPDBの書き出し
 */

import type { AtomMeta } from '@parmlens/types';
import { ModelError } from '../errors.js';

function formatAtomName(name: string): string {
  const trimmed = name.trim();
  return trimmed.length > 4 ? trimmed.slice(0, 4) : trimmed.padStart(4);
}

function formatResname(resname: string): string {
  const trimmed = resname.trim();
  return trimmed.length > 3 ? trimmed.slice(0, 3) : trimmed.padEnd(3);
}

function formatElement(element: string | null): string {
  const trimmed = (element ?? '').trim();
  if (!trimmed) return '  ';
  if (trimmed.length === 1) return ` ${trimmed.toUpperCase()}`;
  return trimmed[0].toUpperCase() + trimmed[1].toLowerCase();
}

function fixed(value: number, width: number, digits: number): string {
  return value.toFixed(digits).padStart(width);
}

function assertValid(meta: AtomMeta): void {
  const { x, y, z } = meta.coords;
  if (!Number.isInteger(meta.serial) || !Number.isInteger(meta.residue.resid)) {
    throw new ModelError('pdb_format_failed', 'Invalid atom metadata', `serial=${meta.serial}`);
  }
  if (![x, y, z].every(Number.isFinite)) {
    throw new ModelError('pdb_format_failed', 'Invalid atom metadata', `serial=${meta.serial} coords=${x},${y},${z}`);
  }
}

/**
 * ATOMレコードとENDからなるPDBテキスト（末尾は改行）
 *
 * @throws ModelError pdb_format_failed シリアル・残基番号・座標が不正な場合
 */
export function writePdb(atoms: Iterable<AtomMeta>): string {
  const lines: string[] = [];
  for (const meta of atoms) {
    assertValid(meta);
    const chain = (meta.residue.chain || ' ').slice(0, 1);
    lines.push(
      'ATOM  ' +
        `${String(meta.serial).padStart(5)} ` +
        formatAtomName(meta.atomName) +
        ' ' +
        `${formatResname(meta.residue.resname)} ` +
        chain +
        String(meta.residue.resid).padStart(4) +
        '    ' +
        fixed(meta.coords.x, 8, 3) +
        fixed(meta.coords.y, 8, 3) +
        fixed(meta.coords.z, 8, 3) +
        fixed(1.0, 6, 2) +
        fixed(0.0, 6, 2) +
        '          ' +
        formatElement(meta.element).padStart(2)
    );
  }
  lines.push('END');
  return lines.join('\n') + '\n';
}
