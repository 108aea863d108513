/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, validateConfig, type ParmLensConfig } from '@parmlens/types';

export interface ConfigInitOptions {
  /** ポート番号（指定しない場合はデフォルト） */
  port?: number;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * 書き出す設定オブジェクトを生成
 * tokenSections はデフォルトのままでよいため省略する
 */
function createInitialConfig(port: number | undefined): Omit<ParmLensConfig, 'parm7'> & {
  parm7: Omit<ParmLensConfig['parm7'], 'tokenSections'>;
} {
  const defaults = ConfigLoader.getDefaultConfig();
  return {
    version: defaults.version,
    server: { ...defaults.server, port: port ?? defaults.server.port },
    parm7: { chargeScale: defaults.parm7.chargeScale },
    query: { ...defaults.query },
    worker: { ...defaults.worker },
    logging: { ...defaults.logging },
  };
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, '.parmlens.json');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` + 'Use --force to overwrite the existing file.'
      );
    }

    console.log('Overwriting existing configuration file...');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }

  const config = createInitialConfig(options.port);
  validateConfig(config);

  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log(`Configuration file created: ${configPath}`);
  console.log(`  Port: ${config.server.port}`);
  return configPath;
}

/**
 * config init コマンドを実行（CLIエントリポイント）
 */
export async function executeConfigInit(options: { port?: string; force?: boolean }): Promise<void> {
  try {
    const port = options.port ? parseInt(options.port, 10) : undefined;
    if (port !== undefined && (!Number.isInteger(port) || port <= 0 || port > 65535)) {
      throw new Error(`Invalid port: ${options.port}`);
    }
    await initConfig({ port, force: options.force });
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
