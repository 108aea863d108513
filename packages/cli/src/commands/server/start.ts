/**
 * server start コマンド
 */

import { ConfigLoader, type ParmLensConfig } from '@parmlens/types';
import { startServer as startJsonRpcServer } from '@parmlens/server';

/**
 * server start コマンドのオプション
 */
export interface ServerStartOptions {
  config?: string;
  host?: string;
  port?: string;
  /** 派生テーブルのバックグラウンド構築を無効化 */
  worker?: boolean;
  timings?: boolean;
}

/**
 * 設定ファイルとコマンドラインオプションから起動設定を決定
 */
export async function resolveServerConfig(options: ServerStartOptions): Promise<ParmLensConfig> {
  const { config, configPath } = await ConfigLoader.resolve({
    configPath: options.config,
  });
  console.log(`Config: ${configPath || 'default config'}`);

  let port = config.server.port;
  if (options.port !== undefined) {
    port = parseInt(options.port, 10);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`Invalid port: ${options.port}`);
    }
  }

  return {
    ...config,
    server: { host: options.host ?? config.server.host, port },
    worker: { enabled: options.worker === false ? false : config.worker.enabled },
    logging: { timings: options.timings === true || config.logging.timings },
  };
}

/**
 * server start コマンドを実行（フォアグラウンドで起動し、シグナルで停止）
 */
export async function executeServerStart(options: ServerStartOptions): Promise<void> {
  try {
    const config = await resolveServerConfig(options);
    const server = await startJsonRpcServer(config);
    console.log('Press Ctrl+C to stop.');

    const shutdown = () => {
      console.log('\nShutting down...');
      server
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error:', error instanceof Error ? error.message : error);
          process.exit(1);
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
