/**
 * parm7セクションの説明・非推奨フラグ、元素記号表
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const sectionCatalogSchema = z.object({
  sections: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      deprecated: z.boolean(),
    })
  ),
});

const elementTableSchema = z.object({
  symbols: z.array(z.string()),
});

export interface SectionCatalogEntry {
  description: string;
  deprecated: boolean;
}

let sectionCatalog: Map<string, SectionCatalogEntry> | null = null;
let elementSymbols: string[] | null = null;

function readDataFile(fileName: string): unknown {
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  return JSON.parse(readFileSync(url, 'utf-8'));
}

/**
 * セクション名 → 説明・非推奨フラグ
 */
export function getSectionCatalog(): ReadonlyMap<string, SectionCatalogEntry> {
  if (!sectionCatalog) {
    const parsed = sectionCatalogSchema.parse(readDataFile('parm7-sections.json'));
    sectionCatalog = new Map(
      parsed.sections.map((entry) => [entry.name, { description: entry.description, deprecated: entry.deprecated }])
    );
  }
  return sectionCatalog;
}

/**
 * 原子番号から元素記号を返す（範囲外は null）
 */
export function elementForAtomicNumber(atomicNumber: number): string | null {
  if (!elementSymbols) {
    elementSymbols = elementTableSchema.parse(readDataFile('elements.json')).symbols;
  }
  if (!Number.isInteger(atomicNumber) || atomicNumber < 1 || atomicNumber > elementSymbols.length) {
    return null;
  }
  return elementSymbols[atomicNumber - 1];
}
