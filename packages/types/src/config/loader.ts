import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { ParmLensConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type PartialParmLensConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .parmlens.json > parmlens.json
 */
export const CONFIG_FILE_NAMES = ['.parmlens.json', 'parmlens.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'PARMLENS_CONFIG';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.parmlens.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './.parmlens.json'): Promise<ParmLensConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      // ファイル読み込み
      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - 設定の読み込み
   */
  static async resolve(
    options: ResolveConfigOptions = {}
  ): Promise<{
    config: ParmLensConfig;
    configPath: string | null;
  }> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    // 設定ファイルが必須なのに見つからない場合はエラー
    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        `Expected one of: ${CONFIG_FILE_NAMES.join(', ')}`
      );
    }

    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): ParmLensConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);
        if (await this.exists(configPath)) {
          return configPath;
        }
      }

      // 親を遡らない場合、ルートに到達した場合は終了
      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  private static async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return false;
      }
      throw error;
    }
  }

  /**
   * 設定ファイルパスを解決
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    // 1. 明示的に指定されている
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    // 2. 環境変数
    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    // 3. 自動探索
    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialParmLensConfig): ParmLensConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      server: {
        host: config.server?.host ?? DEFAULT_CONFIG.server.host,
        port: config.server?.port ?? DEFAULT_CONFIG.server.port,
      },
      parm7: {
        tokenSections: [...(config.parm7?.tokenSections ?? DEFAULT_CONFIG.parm7.tokenSections)],
        chargeScale: config.parm7?.chargeScale ?? DEFAULT_CONFIG.parm7.chargeScale,
      },
      query: {
        maxResults: config.query?.maxResults ?? DEFAULT_CONFIG.query.maxResults,
      },
      worker: {
        enabled: config.worker?.enabled ?? DEFAULT_CONFIG.worker.enabled,
      },
      logging: {
        timings: config.logging?.timings ?? DEFAULT_CONFIG.logging.timings,
      },
    };
  }
}
