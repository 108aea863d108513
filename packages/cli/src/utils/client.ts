/**
 * コマンド用クライアントの生成
 */

import { ParmLensClient } from '@parmlens/client';
import { ConfigLoader } from '@parmlens/types';

/**
 * サーバ接続オプション（全コマンド共通）
 */
export interface ConnectionOptions {
  server?: string;
  config?: string;
}

// 全インターフェースで待ち受けるサーバにはループバックで接続する
const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '[::]']);

/**
 * 接続先URLを決める
 *
 * --server が最優先。無ければ設定ファイル（--config、PARMLENS_CONFIG、
 * カレントから遡って見つかった .parmlens.json の順）の server.host / server.port。
 */
export async function resolveBaseUrl(options: ConnectionOptions): Promise<string> {
  if (options.server) {
    return options.server.replace(/\/+$/, '');
  }
  const { config } = await ConfigLoader.resolve({ configPath: options.config });
  const host = WILDCARD_HOSTS.has(config.server.host) ? 'localhost' : config.server.host;
  return `http://${host}:${config.server.port}`;
}

export async function createClient(options: ConnectionOptions): Promise<ParmLensClient> {
  return new ParmLensClient({ baseUrl: await resolveBaseUrl(options) });
}
