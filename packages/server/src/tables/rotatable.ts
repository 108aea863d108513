/**
 * 回転可能結合の判定
 */

import { sortedPair, type BondRecord, type DihedralRecord } from '../parm7/records.js';

/** これを超える質量を重原子とみなす */
const HEAVY_ATOM_MASS = 3.1;

function pairKey(a: number, b: number): string {
  const [lo, hi] = sortedPair(a, b);
  return `${lo}-${hi}`;
}

/**
 * 回転可能な結合の集合を返す（キーは "小さいシリアル-大きいシリアル"）
 *
 * 重原子同士の結合で、いずれかの二面角の中央結合になっており、
 * 両端を末端とする二面角から集めた近傍集合が互いに素であるもの。
 */
export function findRotatableBonds(
  bonds: readonly BondRecord[],
  dihedrals: readonly DihedralRecord[],
  masses: readonly number[]
): Set<string> {
  const isHeavy = (serial: number): boolean =>
    serial > 0 && serial <= masses.length && masses[serial - 1] > HEAVY_ATOM_MASS;

  const heavyBonds = new Map<string, [number, number]>();
  for (const bond of bonds) {
    const [a, b] = sortedPair(bond.a, bond.b);
    if (isHeavy(a) && isHeavy(b)) {
      heavyBonds.set(pairKey(a, b), [a, b]);
    }
  }

  const centralBonds = new Set<string>();
  const terminalTriplets = new Map<number, number[][]>();
  const addTriplet = (terminal: number, triplet: number[]): void => {
    const list = terminalTriplets.get(terminal);
    if (list) {
      list.push(triplet);
    } else {
      terminalTriplets.set(terminal, [triplet]);
    }
  };
  for (const dihedral of dihedrals) {
    centralBonds.add(pairKey(dihedral.j, dihedral.k));
    addTriplet(dihedral.i, [dihedral.j, dihedral.k, dihedral.l]);
    addTriplet(dihedral.l, [dihedral.i, dihedral.j, dihedral.k]);
  }

  const neighborsOf = (atom: number, partner: number): Set<number> => {
    const neighbors = new Set<number>();
    for (const triplet of terminalTriplets.get(atom) ?? []) {
      if (triplet.includes(partner)) continue;
      triplet.forEach((serial) => neighbors.add(serial));
    }
    return neighbors;
  };

  const rotatable = new Set<string>();
  for (const [key, [a, b]] of heavyBonds) {
    if (!centralBonds.has(key)) continue;
    const neighborsA = neighborsOf(a, b);
    const neighborsB = neighborsOf(b, a);
    if ([...neighborsA].every((serial) => !neighborsB.has(serial))) {
      rotatable.add(key);
    }
  }
  return rotatable;
}

/**
 * 二面角の中央結合 (j, k) が回転可能か
 */
export function isRotatable(rotatable: ReadonlySet<string>, j: number, k: number): boolean {
  return rotatable.has(pairKey(j, k));
}
