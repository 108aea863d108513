#!/usr/bin/env node

/**
 * parmlens HTTP JSON-RPCサーバ エントリポイント
 */

import { ConfigLoader } from '@parmlens/types';
import { startServer } from '../index.js';

async function main() {
  try {
    const { config, configPath } = await ConfigLoader.resolve();
    console.log(`Loading config from: ${configPath || 'default config'}`);

    const jsonRpcServer = await startServer(config);

    // シグナルハンドラ
    const shutdown = () => {
      console.log('\nShutting down...');
      jsonRpcServer
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to stop server:', error);
          process.exit(1);
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void main();
