import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { Model } from '../model.js';
import { LazyBuild } from '../../worker/lazy-build.js';
import { MINI_PARM7_PATH, MINI_RST7_PATH, readMiniParm7, testConfig, thrownBy } from '../../__tests__/helpers.js';

describe('Model', () => {
  let model: Model;
  let testDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    model = new Model(testConfig());
    testDir = path.join(tmpdir(), `.test-model-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function writeParm7(text: string): Promise<string> {
    const filePath = path.join(testDir, 'broken.parm7');
    await fs.writeFile(filePath, text);
    return filePath;
  }

  describe('load', () => {
    it('parm7を読み込んで概要を返す', async () => {
      const result = await model.load(MINI_PARM7_PATH);

      expect(result).toMatchObject({
        path: MINI_PARM7_PATH,
        natoms: 6,
        nresidues: 2,
        nsections: 32,
        hasCoordinates: false,
        warnings: [],
      });
      expect(model.status()).toMatchObject({ loaded: true, path: MINI_PARM7_PATH, natoms: 6 });
    });

    it('rst7を指定すると座標付きで読み込む', async () => {
      const result = await model.load(MINI_PARM7_PATH, MINI_RST7_PATH);

      expect(result.hasCoordinates).toBe(true);
      expect(model.getAtom(2).atom.coords).toEqual({ x: 1.526, y: 0, z: 0 });
    });

    it('パスが空なら invalid_input', async () => {
      await expect(model.load('')).rejects.toMatchObject({ code: 'invalid_input' });
    });

    it('ファイルが無ければ file_not_found', async () => {
      const missing = path.join(testDir, 'missing.parm7');
      await expect(model.load(missing)).rejects.toMatchObject({
        code: 'file_not_found',
        message: 'parm7 file not found',
        details: missing,
      });
    });

    it('失敗したロードは直前のスナップショットを残す', async () => {
      await model.load(MINI_PARM7_PATH);
      await expect(model.load(path.join(testDir, 'missing.parm7'))).rejects.toThrow();

      expect(model.status().path).toBe(MINI_PARM7_PATH);
    });

    it('POINTERSが読めなければ parm7_parse_failed', async () => {
      const filePath = await writeParm7(readMiniParm7().replace('%FLAG POINTERS', '%FLAG POINTERS_OLD'));

      await expect(model.load(filePath)).rejects.toMatchObject({
        code: 'parm7_parse_failed',
        message: 'Failed to parse POINTERS',
        details: 'POINTERS section missing',
      });
    });

    it('rst7の原子数が合わなければエラー', async () => {
      const rst7Path = path.join(testDir, 'short.rst7');
      await fs.writeFile(rst7Path, 'T\n     1\n   1.0000000   2.0000000   3.0000000\n');

      await expect(model.load(MINI_PARM7_PATH, rst7Path)).rejects.toMatchObject({
        code: 'parm7_parse_failed',
        message: 'Restart file has 1 atoms but topology has 6',
      });
    });

    it('バックグラウンド構築が有効ならロード後にテーブルが準備される', async () => {
      const background = new Model(testConfig({ worker: { enabled: true } }));
      await background.load(MINI_PARM7_PATH);

      await vi.waitFor(() => {
        expect(background.status()).toMatchObject({ tablesReady: true, selectionReady: true });
      });
    });
  });

  describe('未ロード時', () => {
    it('各操作は not_loaded', async () => {
      expect(thrownBy(() => model.getText())).toMatchObject({ code: 'not_loaded', message: 'No parm7 text loaded' });
      expect(thrownBy(() => model.getAtom(1))).toMatchObject({ code: 'not_loaded', message: 'No system loaded' });
      await expect(model.getTables()).rejects.toMatchObject({ code: 'not_loaded' });
      expect(model.status()).toEqual({
        loaded: false,
        path: null,
        natoms: 0,
        tablesReady: false,
        selectionReady: false,
      });
    });
  });

  describe('テキスト・セクション', () => {
    it('getText は元テキストをbase64で返す', async () => {
      await model.load(MINI_PARM7_PATH);
      const { parm7TextB64 } = model.getText();

      expect(Buffer.from(parm7TextB64, 'base64').toString('utf-8')).toBe(readMiniParm7());
    });

    it('getSections は行順にセクションを返す', async () => {
      await model.load(MINI_PARM7_PATH);
      const { sections } = model.getSections();

      expect(sections.map((section) => section.name).slice(0, 3)).toEqual(['TITLE', 'POINTERS', 'ATOM_NAME']);
      expect(sections[1]).toMatchObject({
        name: 'POINTERS',
        line: 4,
        endLine: 9,
        count: 10,
        width: 8,
        tokenCount: 31,
        deprecated: false,
      });
      expect(sections[1].description).not.toBe('');
    });
  });

  describe('テーブル', () => {
    it('getTable は名前でテーブルを返す', async () => {
      await model.load(MINI_PARM7_PATH);
      const table = await model.getTable('bond_types');

      expect(table.rows[1]).toEqual([1, 'CT', 2, 'HC', 1, 340, 1.09, 2]);
    });

    it('未知のテーブル名は invalid_input', async () => {
      await model.load(MINI_PARM7_PATH);
      await expect(model.getTable('unknown')).rejects.toMatchObject({
        code: 'invalid_input',
        message: "Unsupported table 'unknown'",
      });
    });

    it('構築に失敗したら parm7_parse_failed', async () => {
      const filePath = await writeParm7(
        readMiniParm7().replace('%FLAG BOND_EQUIL_VALUE', '%FLAG BOND_EQUIL_VALUE_OLD')
      );
      await model.load(filePath);

      await expect(model.getTables()).rejects.toMatchObject({
        code: 'parm7_parse_failed',
        message: 'Failed to build system info tables',
        details: 'BOND_EQUIL_VALUE section missing',
      });
    });
  });

  describe('highlight', () => {
    it('モード省略時はAtom', async () => {
      await model.load(MINI_PARM7_PATH);
      const result = model.highlight([1]);

      expect(result.interaction).toBeNull();
      expect(result.highlights).toHaveLength(9);
    });

    it('未知のモードは invalid_input', async () => {
      await model.load(MINI_PARM7_PATH);
      expect(thrownBy(() => model.highlight([1], 'Torsion'))).toMatchObject({
        code: 'invalid_input',
        message: "Unsupported highlight mode 'Torsion'",
      });
    });
  });

  describe('select', () => {
    beforeEach(async () => {
      await model.load(MINI_PARM7_PATH);
    });

    it('原子タイプの行はそのタイプの原子を1個ずつ巡回する', async () => {
      await expect(model.select('atom_types', 0, 1)).resolves.toEqual({
        mode: 'Atom',
        serials: [2],
        index: 1,
        total: 2,
      });
    });

    it('結合タイプの行は一致する結合を巡回する', async () => {
      await expect(model.select('bond_types', 1, 1)).resolves.toEqual({
        mode: 'Bond',
        serials: [2, 4],
        index: 1,
        total: 2,
      });
      await expect(model.select('bond_types', 1, 2)).resolves.toEqual({
        mode: 'Bond',
        serials: [1, 3],
        index: 0,
        total: 2,
      });
    });

    it('角度タイプの行', async () => {
      await expect(model.select('angle_types', 4)).resolves.toEqual({
        mode: 'Angle',
        serials: [4, 2, 5],
        index: 0,
        total: 1,
      });
    });

    it('二面角・改良二面角の行は通し番号の4原子', async () => {
      await expect(model.select('dihedral_types', 3)).resolves.toEqual({
        mode: 'Dihedral',
        serials: [3, 1, 2, 5],
        index: 0,
        total: 1,
      });
      await expect(model.select('improper_types', 0)).resolves.toEqual({
        mode: 'Improper',
        serials: [1, 5, 2, 4],
        index: 0,
        total: 1,
      });
    });

    it('1-4の行', async () => {
      await expect(model.select('one_four_nonbonded', 0)).resolves.toEqual({
        mode: '1-4 Nonbonded',
        serials: [1, 6],
        index: 0,
        total: 1,
      });
    });

    it('非結合ペアの行はタイプの直積を巡回する', async () => {
      await expect(model.select('nonbonded_pairs', 0)).resolves.toEqual({
        mode: 'Non-bonded',
        serials: [1, 2],
        index: 0,
        total: 1,
      });
      await expect(model.select('nonbonded_pairs', 1, 3)).resolves.toEqual({
        mode: 'Non-bonded',
        serials: [2, 4],
        index: 3,
        total: 4,
      });
    });

    it('cursor が総数を超えたら先頭から巡回する', async () => {
      await expect(model.select('nonbonded_pairs', 1, 6)).resolves.toEqual({
        mode: 'Non-bonded',
        serials: [2, 3],
        index: 2,
        total: 4,
      });
      await expect(model.select('nonbonded_pairs', 0, 5)).resolves.toEqual({
        mode: 'Non-bonded',
        serials: [1, 2],
        index: 0,
        total: 1,
      });
    });

    it('選択の途中で別のロードが完了しても呼び出し時点のトポロジから選ぶ', async () => {
      // 原子タイプ1と2を入れ替えたトポロジ
      const swappedPath = await writeParm7(
        readMiniParm7().replace(
          '       1       1       2       2       3       4',
          '       2       2       1       1       3       4'
        )
      );
      let releaseTables: () => void = () => undefined;
      const tablesGate = new Promise<void>((resolve) => {
        releaseTables = resolve;
      });
      const realGet = LazyBuild.prototype.get;
      vi.spyOn(LazyBuild.prototype, 'get').mockImplementationOnce(function (this: LazyBuild<unknown>) {
        return tablesGate.then(() => realGet.call(this));
      });

      const pending = model.select('atom_types', 0, 1);
      await model.load(swappedPath);
      releaseTables();

      await expect(pending).resolves.toEqual({ mode: 'Atom', serials: [2], index: 1, total: 2 });
      await expect(model.select('atom_types', 0, 1)).resolves.toEqual({
        mode: 'Atom',
        serials: [4],
        index: 1,
        total: 2,
      });
    });

    it('入力エラー', async () => {
      await expect(model.select('', 0)).rejects.toMatchObject({ code: 'invalid_input', message: 'table is required' });
      await expect(model.select('bond_types', -1)).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'row_index and cursor must be >= 0',
      });
      await expect(model.select('bond_types', 10)).rejects.toMatchObject({
        code: 'not_found',
        message: 'Row index out of range',
      });
      await expect(model.select('residues', 0)).rejects.toMatchObject({
        code: 'not_found',
        message: "System info table 'residues' not available",
      });
    });
  });

  describe('原子・残基', () => {
    beforeEach(async () => {
      await model.load(MINI_PARM7_PATH);
    });

    it('getAtom はメタデータと基本スパンを返す', () => {
      const { atom, highlights } = model.getAtom(4);

      expect(atom.atomName).toBe('H2');
      expect(atom.residue.resname).toBe('OHX');
      expect(highlights).toHaveLength(8);
    });

    it('存在しない原子は not_found', () => {
      expect(thrownBy(() => model.getAtom(99))).toMatchObject({
        code: 'not_found',
        message: 'Atom serial 99 not found',
      });
    });

    it('getResidue は残基の原子を返す', () => {
      expect(model.getResidue(2)).toEqual({ segid: null, resid: 2, resname: 'OHX', serials: [4, 5, 6] });
      expect(thrownBy(() => model.getResidue(3))).toMatchObject({
        code: 'not_found',
        message: 'Residue 3 not found',
      });
    });

    it('queryAtoms は条件に一致する原子を返す', () => {
      expect(model.queryAtoms({ filters: { resnameContains: 'mol' } })).toEqual({
        serials: [1, 2, 3],
        count: 3,
        truncated: false,
      });
    });

    it('queryAtoms の上限は設定値が既定', async () => {
      const limited = new Model(testConfig({ query: { maxResults: 2 } }));
      await limited.load(MINI_PARM7_PATH);

      expect(limited.queryAtoms({ filters: {} })).toEqual({ serials: [1, 2], count: 2, truncated: true });
    });
  });

  describe('close', () => {
    it('未完了のバックグラウンド構築を取り消す', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const background = new Model(testConfig({ worker: { enabled: true } }));
      await background.load(MINI_PARM7_PATH);

      background.close();
      await new Promise<void>((resolve) => setImmediate(resolve));

      expect(background.status()).toMatchObject({ loaded: true, tablesReady: false, selectionReady: false });
    });
  });

  describe('getPdb', () => {
    it('座標が無ければ not_found', async () => {
      await model.load(MINI_PARM7_PATH);
      expect(thrownBy(() => model.getPdb())).toMatchObject({ code: 'not_found', message: 'No coordinates loaded' });
    });

    it('座標があればPDBを返す', async () => {
      await model.load(MINI_PARM7_PATH, MINI_RST7_PATH);
      const lines = model.getPdb().split('\n');

      expect(lines).toHaveLength(8);
      expect(lines[1].slice(0, 26)).toBe('ATOM      2   C2 MOL     1');
      expect(lines[1].slice(30, 54)).toBe('   1.526   0.000   0.000');
      expect(lines[6]).toBe('END');
      expect(lines[7]).toBe('');
    });
  });
});
