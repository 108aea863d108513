/**
 * parm7トポロジのモデル
 *
 * ロードごとにスナップショットを作り直し、問い合わせは現在のスナップショットに対して行う。
 * ロードに失敗した場合は直前のスナップショットをそのまま残す。
 */

import { promises as fs } from 'fs';
import {
  isHighlightMode,
  isTableName,
  type GetAtomResponse,
  type GetResidueResponse,
  type GetSectionsResponse,
  type GetTextResponse,
  type HighlightResult,
  type LoadResponse,
  type ParmLensConfig,
  type PointerSet,
  type QueryAtomsRequest,
  type QueryAtomsResponse,
  type SelectionResult,
  type SystemTable,
  type SystemTables,
  type TableName,
  type TableValue,
} from '@parmlens/types';
import { FormatError, ModelError, NotFoundError, ParmLensError } from '../errors.js';
import { writePdb } from '../io/pdb-writer.js';
import { parseRst7, type Position } from '../io/rst7.js';
import { getSectionCatalog } from '../parm7/catalog.js';
import { decodePointers } from '../parm7/pointers.js';
import { SectionCache } from '../parm7/section-cache.js';
import { decodeParm7, tokenizeParm7 } from '../parm7/tokenizer.js';
import {
  angleKey,
  bondKey,
  nonbondedPairForCursor,
  nonbondedPairTotal,
  type SelectionIndex,
} from '../selection/selection-index.js';
import { buildAtomTable } from './atom-meta.js';
import { queryAtoms } from './query.js';
import { Snapshot } from './snapshot.js';

type ModelConfig = Pick<ParmLensConfig, 'parm7' | 'query' | 'worker' | 'logging'>;

const TABLE_MODES = {
  atom_types: 'Atom',
  bond_types: 'Bond',
  angle_types: 'Angle',
  dihedral_types: 'Dihedral',
  improper_types: 'Improper',
  one_four_nonbonded: '1-4 Nonbonded',
  nonbonded_pairs: 'Non-bonded',
} as const satisfies Record<TableName, SelectionResult['mode']>;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readInput(filePath: string, kind: 'parm7' | 'rst7'): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new ModelError('file_not_found', `${kind} file not found`, filePath);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelError('load_failed', `Failed to read ${kind} file`, message);
  }
}

/**
 * テーブル行の整数セル（0・非整数は null）
 */
function intCell(table: SystemTable, row: readonly TableValue[], column: string): number | null {
  const index = table.columns.indexOf(column);
  const value = index >= 0 ? row[index] : null;
  return typeof value === 'number' && Number.isInteger(value) && value !== 0 ? value : null;
}

function paramCell(table: SystemTable, row: readonly TableValue[]): number | null {
  const index = table.columns.indexOf('param_index');
  const value = index >= 0 ? row[index] : null;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function cycle(mode: SelectionResult['mode'], selections: readonly (readonly number[])[], cursor: number): SelectionResult {
  const total = selections.length;
  if (total === 0) {
    throw new NotFoundError('No matches for row');
  }
  const index = cursor % total;
  return { mode, serials: [...selections[index]], index, total };
}

export class Model {
  private snapshot: Snapshot | null = null;

  constructor(private readonly config: ModelConfig) {}

  /**
   * parm7（と任意のrst7）を読み込み、スナップショットを差し替える
   */
  async load(parm7Path: string, rst7Path?: string): Promise<LoadResponse> {
    if (!parm7Path) {
      throw new ModelError('invalid_input', 'parm7 path is required');
    }
    const startTime = Date.now();
    const parm7Buffer = await readInput(parm7Path, 'parm7');
    const rst7Buffer = rst7Path ? await readInput(rst7Path, 'rst7') : null;
    const readTime = Date.now();

    const text = decodeParm7(parm7Buffer);
    const sections = tokenizeParm7(text, this.config.parm7.tokenSections);
    const cache = new SectionCache(sections);
    const tokenizeTime = Date.now();

    let pointers: PointerSet;
    try {
      pointers = decodePointers(cache.get('POINTERS'));
    } catch (error) {
      if (!(error instanceof ParmLensError)) throw error;
      throw new ModelError('parm7_parse_failed', 'Failed to parse POINTERS', error.message);
    }
    const natom = pointers.NATOM;
    const ntypes = pointers.NTYPES;
    if (natom <= 0 || ntypes <= 0) {
      throw new ModelError('parm7_parse_failed', 'Invalid POINTERS values for NATOM/NTYPES', {
        NATOM: natom,
        NTYPES: ntypes,
      });
    }

    let positions: Position[] | undefined;
    if (rst7Buffer) {
      const rst7 = parseRst7(decodeParm7(rst7Buffer));
      if (rst7.natom !== natom) {
        throw new FormatError(`Restart file has ${rst7.natom} atoms but topology has ${natom}`, {
          expected: natom,
          actual: rst7.natom,
        });
      }
      positions = rst7.positions;
    }

    const atomTable = buildAtomTable(cache, {
      natom,
      ntypes,
      chargeScale: this.config.parm7.chargeScale,
      positions,
    });
    const metaTime = Date.now();

    const snapshot = new Snapshot({
      path: parm7Path,
      text,
      cache,
      pointers,
      atomTable,
      hasCoordinates: positions !== undefined,
      onBuilt: (name, durationMs) => this.logTiming(`${name} build`, durationMs),
    });
    this.snapshot = snapshot;

    if (this.config.worker.enabled) {
      snapshot.tables.start();
      snapshot.selection.start();
    }

    this.logTiming('read', readTime - startTime);
    this.logTiming('tokenize', tokenizeTime - readTime);
    this.logTiming('metadata', metaTime - tokenizeTime);
    console.log(`[Model] Loaded ${parm7Path}: ${natom} atoms, ${atomTable.nresidues} residues`);

    return {
      path: parm7Path,
      natoms: natom,
      nresidues: atomTable.nresidues,
      nsections: sections.size,
      hasCoordinates: snapshot.hasCoordinates,
      warnings: [...snapshot.warnings],
      took: Date.now() - startTime,
    };
  }

  getText(): GetTextResponse {
    if (!this.snapshot) {
      throw new ModelError('not_loaded', 'No parm7 text loaded');
    }
    return { parm7TextB64: Buffer.from(this.snapshot.text, 'utf-8').toString('base64') };
  }

  getSections(): GetSectionsResponse {
    if (!this.snapshot || this.snapshot.cache.sections.size === 0) {
      throw new ModelError('not_loaded', 'No parm7 sections available');
    }
    const catalog = getSectionCatalog();
    const sections = [...this.snapshot.cache.sections.values()]
      .map((section) => {
        const entry = catalog.get(section.name);
        return {
          name: section.name,
          line: section.line,
          endLine: section.endLine,
          count: section.count,
          width: section.width,
          tokenCount: section.tokens.length,
          description: entry?.description ?? '',
          deprecated: entry?.deprecated ?? false,
        };
      })
      .sort((a, b) => a.line - b.line);
    return { sections };
  }

  /**
   * 7つの派生テーブル（スナップショットごとに1回だけ構築）
   */
  async getTables(): Promise<SystemTables> {
    return this.tablesOf(this.requireSnapshot());
  }

  async getTable(name: string): Promise<SystemTable> {
    if (!isTableName(name)) {
      throw new ModelError('invalid_input', `Unsupported table '${name}'`);
    }
    const tables = await this.getTables();
    return tables[name];
  }

  highlight(serials: readonly number[], mode?: string): HighlightResult {
    const snapshot = this.requireSnapshot();
    const requested = (mode ?? '').trim() || 'Atom';
    if (!isHighlightMode(requested)) {
      throw new ModelError('invalid_input', `Unsupported highlight mode '${requested}'`);
    }
    return snapshot.engine.highlight(serials, requested);
  }

  /**
   * 派生テーブルの行から原子シリアルを選択する
   * cursor は同じ行に対応する候補を巡回する位置
   */
  async select(table: string, row: number, cursor = 0): Promise<SelectionResult> {
    if (!table) {
      throw new ModelError('invalid_input', 'table is required');
    }
    if (row < 0 || cursor < 0) {
      throw new ModelError('invalid_input', 'row_index and cursor must be >= 0');
    }

    // テーブルとインデックスは呼び出し時点のスナップショットから引く
    const snapshot = this.requireSnapshot();
    const tables = await this.tablesOf(snapshot);
    if (!isTableName(table)) {
      throw new NotFoundError(`System info table '${table}' not available`);
    }
    const data = tables[table];
    if (row >= data.rows.length) {
      throw new NotFoundError('Row index out of range');
    }
    const values = data.rows[row];
    const index = await this.selectionOf(snapshot);
    const mode = TABLE_MODES[table];

    switch (table) {
      case 'atom_types': {
        const typeIndex = intCell(data, values, 'type_index');
        const serials = typeIndex === null ? [] : (index.atomSerialsByType.get(typeIndex) ?? []);
        return cycle(mode, serials.map((serial) => [serial]), cursor);
      }
      case 'bond_types':
      case 'one_four_nonbonded': {
        const typeA = intCell(data, values, 'type_a');
        const typeB = intCell(data, values, 'type_b');
        const paramIndex = paramCell(data, values);
        if (typeA === null || typeB === null || paramIndex === null) {
          throw new NotFoundError('No matches for row');
        }
        const byKey = table === 'bond_types' ? index.bondsByKey : index.oneFourByKey;
        return cycle(mode, byKey.get(bondKey(typeA, typeB, paramIndex)) ?? [], cursor);
      }
      case 'angle_types': {
        const typeI = intCell(data, values, 'type_i');
        const typeJ = intCell(data, values, 'type_j');
        const typeK = intCell(data, values, 'type_k');
        const paramIndex = paramCell(data, values);
        if (typeI === null || typeJ === null || typeK === null || paramIndex === null) {
          throw new NotFoundError('No matches for row');
        }
        return cycle(mode, index.anglesByKey.get(angleKey(typeI, typeJ, typeK, paramIndex)) ?? [], cursor);
      }
      case 'dihedral_types':
      case 'improper_types': {
        const termIdx = intCell(data, values, 'idx');
        const quad = termIdx === null ? undefined : index.dihedralsByIdx.get(termIdx);
        if (!quad) {
          throw new NotFoundError('No matches for row');
        }
        return { mode, serials: [...quad], index: 0, total: 1 };
      }
      case 'nonbonded_pairs': {
        const typeA = intCell(data, values, 'type_a');
        const typeB = intCell(data, values, 'type_b');
        if (typeA === null || typeB === null) {
          throw new NotFoundError('No matches for row');
        }
        const serialsA = index.atomSerialsByType.get(typeA) ?? [];
        const serialsB = index.atomSerialsByType.get(typeB) ?? [];
        const sameType = typeA === typeB;
        const total = nonbondedPairTotal(serialsA.length, serialsB.length, sameType);
        if (total <= 0) {
          throw new NotFoundError('No matches for row');
        }
        const pair = nonbondedPairForCursor(serialsA, serialsB, cursor, sameType);
        return { mode, serials: pair, index: cursor % total, total };
      }
    }
  }

  getAtom(serial: number): GetAtomResponse {
    const snapshot = this.requireSnapshot();
    const atom = snapshot.atomsBySerial.get(serial);
    if (!atom) {
      throw new NotFoundError(`Atom serial ${serial} not found`);
    }
    return { atom, highlights: snapshot.engine.atomSpans(atom) };
  }

  getResidue(resid: number): GetResidueResponse {
    const snapshot = this.requireSnapshot();
    const keys = snapshot.residueKeysByResid.get(resid);
    if (!keys || keys.length === 0) {
      throw new NotFoundError(`Residue ${resid} not found`);
    }
    if (keys.length > 1) {
      throw new ModelError('ambiguous', 'Residue id is not unique', [...keys]);
    }
    const serials = snapshot.residueIndex.get(keys[0]) ?? [];
    const first = snapshot.atomsBySerial.get(serials[0]);
    return {
      segid: first?.residue.segid ?? null,
      resid,
      resname: first?.residue.resname ?? '',
      serials: [...serials],
    };
  }

  queryAtoms(request: QueryAtomsRequest): QueryAtomsResponse {
    const snapshot = this.requireSnapshot();
    const maxResults = request.maxResults ?? this.config.query.maxResults;
    return queryAtoms(snapshot.atoms, request.filters, maxResults);
  }

  /**
   * 読み込んだ座標からPDBテキストを生成
   */
  getPdb(): string {
    const snapshot = this.requireSnapshot();
    if (!snapshot.hasCoordinates) {
      throw new NotFoundError('No coordinates loaded');
    }
    return writePdb(snapshot.atoms);
  }

  /**
   * 未完了の派生データ構築を取り消す
   */
  close(): void {
    this.snapshot?.tables.cancel();
    this.snapshot?.selection.cancel();
  }

  status(): {
    loaded: boolean;
    path: string | null;
    natoms: number;
    tablesReady: boolean;
    selectionReady: boolean;
  } {
    const snapshot = this.snapshot;
    return {
      loaded: snapshot !== null,
      path: snapshot?.path ?? null,
      natoms: snapshot?.atoms.length ?? 0,
      tablesReady: snapshot?.tables.isReady() ?? false,
      selectionReady: snapshot?.selection.isReady() ?? false,
    };
  }

  private async tablesOf(snapshot: Snapshot): Promise<SystemTables> {
    try {
      return await snapshot.tables.get();
    } catch (error) {
      throw new ModelError('parm7_parse_failed', 'Failed to build system info tables', errorMessage(error));
    }
  }

  private async selectionOf(snapshot: Snapshot): Promise<SelectionIndex> {
    try {
      return await snapshot.selection.get();
    } catch (error) {
      throw new ModelError('parm7_parse_failed', 'Failed to build system info selections', errorMessage(error));
    }
  }

  private requireSnapshot(): Snapshot {
    if (!this.snapshot) {
      throw new ModelError('not_loaded', 'No system loaded');
    }
    return this.snapshot;
  }

  private logTiming(label: string, durationMs: number): void {
    if (this.config.logging.timings) {
      console.log(`[Model] ${label}: ${durationMs}ms`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
