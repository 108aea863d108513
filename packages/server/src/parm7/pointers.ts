/**
 * POINTERSセクションのデコード
 */

import { POINTER_NAMES, type Parm7Section, type PointerName, type PointerSet } from '@parmlens/types';
import { FormatError } from '../errors.js';

/**
 * POINTERSの31個または32個の整数をデコード
 * @throws FormatError 個数が合わない、または負の値を含む場合
 */
export function decodePointers(section: Parm7Section | undefined): PointerSet {
  if (!section || section.tokens.length === 0) {
    throw new FormatError('POINTERS section missing');
  }

  const fields = section.tokens
    .map((token) => token.value)
    .join(' ')
    .split(/\s+/)
    .filter((field) => field.length > 0);

  const values: number[] = [];
  for (const field of fields) {
    if (!/^[+-]?\d+$/.test(field)) {
      break;
    }
    values.push(Number.parseInt(field, 10));
  }

  if (values.length !== 31 && values.length !== 32) {
    throw new FormatError(`POINTERS section length ${values.length} does not match expected 31 or 32 values`);
  }

  const named = new Map<PointerName, number>();
  values.forEach((value, index) => {
    const name = POINTER_NAMES[index];
    if (value < 0) {
      console.error(`[Parm7] POINTERS ${name} value is negative: ${value}`);
      throw new FormatError(`POINTERS ${name} value ${value} is negative`);
    }
    named.set(name, value);
  });

  const at = (name: PointerName): number => named.get(name) ?? 0;

  const pointers: PointerSet = {
    NATOM: at('NATOM'),
    NTYPES: at('NTYPES'),
    NBONH: at('NBONH'),
    MBONA: at('MBONA'),
    NTHETH: at('NTHETH'),
    MTHETA: at('MTHETA'),
    NPHIH: at('NPHIH'),
    MPHIA: at('MPHIA'),
    NHPARM: at('NHPARM'),
    NPARM: at('NPARM'),
    NNB: at('NNB'),
    NRES: at('NRES'),
    NBONA: at('NBONA'),
    NTHETA: at('NTHETA'),
    NPHIA: at('NPHIA'),
    NUMBND: at('NUMBND'),
    NUMANG: at('NUMANG'),
    NPTRA: at('NPTRA'),
    NATYP: at('NATYP'),
    NPHB: at('NPHB'),
    IFPERT: at('IFPERT'),
    NBPER: at('NBPER'),
    NGPER: at('NGPER'),
    NDPER: at('NDPER'),
    MBPER: at('MBPER'),
    MGPER: at('MGPER'),
    MDPER: at('MDPER'),
    IFBOX: at('IFBOX'),
    NMXRS: at('NMXRS'),
    IFCAP: at('IFCAP'),
    NUMEXTRA: at('NUMEXTRA'),
  };
  const ncopy = named.get('NCOPY');
  return ncopy === undefined ? pointers : { ...pointers, NCOPY: ncopy };
}
