#!/usr/bin/env node
/**
 * parmlens CLI
 */

import { Command, Option } from 'commander';
import { SERVER_VERSION } from '@parmlens/server';
import { executeAtoms, type AtomsCommandOptions } from './commands/atoms.js';
import { executeAtom, executeResidue, type AtomCommandOptions } from './commands/atom.js';
import { executeHighlight, type HighlightCommandOptions } from './commands/highlight.js';
import { executeLoad, type LoadCommandOptions } from './commands/load.js';
import { executePdb, type PdbCommandOptions } from './commands/pdb.js';
import { executeSections, type SectionsCommandOptions } from './commands/sections.js';
import { executeSelect, type SelectCommandOptions } from './commands/select.js';
import { executeTables, type TablesCommandOptions } from './commands/tables.js';
import { executeConfigInit } from './commands/config/init.js';
import { executeServerStart, type ServerStartOptions } from './commands/server/start.js';
import { executeServerStatus, type ServerStatusOptions } from './commands/server/status.js';

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('parmlens')
  .description('parm7トポロジの解析・問い合わせツール')
  .version(SERVER_VERSION)
  .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env('PARMLENS_CONFIG'))
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

const formatOption = () =>
  new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text');

// server コマンド
const serverCmd = program.command('server').description('サーバの起動・ステータス確認');

serverCmd
  .command('start')
  .description('サーバをフォアグラウンドで起動')
  .option('--host <host>', 'ホスト')
  .option('--port <port>', 'ポート番号')
  .option('--no-worker', '派生テーブルのバックグラウンド構築を行わない')
  .option('--timings', 'ロード・構築時間をログ出力')
  .action((options: ServerStartOptions) => {
    void executeServerStart({ ...options, config: globalConfigPath });
  });

serverCmd
  .command('status')
  .description('サーバのステータスを確認')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((options: ServerStatusOptions) => {
    void executeServerStatus({ ...options, config: globalConfigPath });
  });

// load コマンド
program
  .command('load')
  .description('parm7ファイルをサーバに読み込む')
  .argument('<parm7>', 'parm7ファイルのパス')
  .option('--rst7 <path>', '座標ファイル（rst7）のパス')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((parm7: string, options: LoadCommandOptions) => {
    void executeLoad(parm7, { ...options, config: globalConfigPath });
  });

program
  .command('sections')
  .description('セクション一覧を表示')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((options: SectionsCommandOptions) => {
    void executeSections({ ...options, config: globalConfigPath });
  });

program
  .command('tables')
  .description('派生テーブルを表示')
  .argument('[table]', 'テーブル名（省略時は全テーブル）')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((table: string | undefined, options: TablesCommandOptions) => {
    void executeTables(table, { ...options, config: globalConfigPath });
  });

program
  .command('highlight')
  .description('原子シリアルに対応するテキスト範囲と相互作用パラメータを表示')
  .argument('<serials...>', '原子シリアル')
  .option('--mode <mode>', 'Atom, Bond, Angle, Dihedral, Improper, "1-4 Nonbonded", Non-bonded', 'Atom')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((serials: string[], options: HighlightCommandOptions) => {
    void executeHighlight(serials, { ...options, config: globalConfigPath });
  });

program
  .command('select')
  .description('テーブル行に対応する原子を選択')
  .argument('<table>', 'テーブル名')
  .argument('<row>', '行番号（0始まり）')
  .option('--cursor <n>', '候補の巡回位置', '0')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((table: string, row: string, options: SelectCommandOptions) => {
    void executeSelect(table, row, { ...options, config: globalConfigPath });
  });

program
  .command('atoms')
  .description('条件に一致する原子を検索')
  .option('--resname <text>', '残基名（部分一致）')
  .option('--name <text>', '原子名（部分一致）')
  .option('--type <type>', 'AMBER原子タイプ（完全一致）')
  .option('--charge-min <e>', '電荷の下限')
  .option('--charge-max <e>', '電荷の上限')
  .option('--limit <n>', '最大件数')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((options: AtomsCommandOptions) => {
    void executeAtoms({ ...options, config: globalConfigPath });
  });

program
  .command('atom')
  .description('原子の情報を表示')
  .argument('<serial>', '原子シリアル')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((serial: string, options: AtomCommandOptions) => {
    void executeAtom(serial, { ...options, config: globalConfigPath });
  });

program
  .command('residue')
  .description('残基に属する原子を表示')
  .argument('<resid>', '残基番号')
  .option('--server <url>', 'サーバURL')
  .addOption(formatOption())
  .action((resid: string, options: AtomCommandOptions) => {
    void executeResidue(resid, { ...options, config: globalConfigPath });
  });

program
  .command('pdb')
  .description('読み込んだ座標をPDB形式で出力')
  .option('-o, --output <path>', '出力ファイル（省略時は標準出力）')
  .option('--server <url>', 'サーバURL')
  .action((options: PdbCommandOptions) => {
    void executePdb({ ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program.command('config').description('設定管理');

configCmd
  .command('init')
  .description('設定ファイル（.parmlens.json）を生成')
  .option('--port <port>', 'ポート番号')
  .option('-f, --force', '既存ファイルを上書き')
  .action((options: { port?: string; force?: boolean }) => {
    void executeConfigInit(options);
  });

// コマンドラインを解析
program.parse(process.argv);
