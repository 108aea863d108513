/**
 * ロード単位のスナップショット
 *
 * テキスト・セクション・デコードキャッシュ・原子メタデータと、
 * 派生テーブル／選択インデックスの遅延構築をまとめて保持する。
 * 次のロードでスナップショットごと破棄される。
 */

import type { AtomMeta, PointerSet, SystemTables } from '@parmlens/types';
import { HighlightEngine } from '../highlight/highlight-engine.js';
import type { SectionCache } from '../parm7/section-cache.js';
import { buildSelectionIndex, type SelectionIndex } from '../selection/selection-index.js';
import { buildSystemTables } from '../tables/builder.js';
import { LazyBuild } from '../worker/lazy-build.js';
import type { AtomTable } from './atom-meta.js';

export interface SnapshotInit {
  path: string;
  text: string;
  cache: SectionCache;
  pointers: PointerSet;
  atomTable: AtomTable;
  hasCoordinates: boolean;
  onBuilt?: (name: string, durationMs: number) => void;
}

export class Snapshot {
  readonly path: string;
  readonly text: string;
  readonly cache: SectionCache;
  readonly pointers: PointerSet;
  readonly atoms: readonly AtomMeta[];
  readonly atomsBySerial: ReadonlyMap<number, AtomMeta>;
  readonly residueKeysByResid: ReadonlyMap<number, readonly string[]>;
  readonly residueIndex: ReadonlyMap<string, readonly number[]>;
  readonly nresidues: number;
  readonly hasCoordinates: boolean;
  readonly engine: HighlightEngine;
  readonly tables: LazyBuild<SystemTables>;
  readonly selection: LazyBuild<SelectionIndex>;

  constructor(init: SnapshotInit) {
    this.path = init.path;
    this.text = init.text;
    this.cache = init.cache;
    this.pointers = init.pointers;
    this.atoms = init.atomTable.atoms;
    this.atomsBySerial = init.atomTable.bySerial;
    this.residueKeysByResid = init.atomTable.residueKeysByResid;
    this.residueIndex = init.atomTable.residueIndex;
    this.nresidues = init.atomTable.nresidues;
    this.hasCoordinates = init.hasCoordinates;
    this.engine = new HighlightEngine(init.cache, init.atomTable.bySerial);
    this.tables = new LazyBuild('tables', () => buildSystemTables(init.cache), init.onBuilt);
    this.selection = new LazyBuild('selection', () => buildSelectionIndex(init.cache), init.onBuilt);
  }

  /** 数値として解釈できなかったフィールド */
  get warnings(): readonly string[] {
    return this.cache.warnings;
  }
}
