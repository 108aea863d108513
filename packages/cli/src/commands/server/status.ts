/**
 * server status コマンド
 */

import { createClient, type ConnectionOptions } from '../../utils/client.js';
import { formatJson, formatStatus, type OutputFormat } from '../../utils/output.js';

/**
 * server status コマンドのオプション
 */
export interface ServerStatusOptions extends ConnectionOptions {
  format?: OutputFormat;
}

/**
 * server status コマンドを実行
 */
export async function executeServerStatus(options: ServerStatusOptions): Promise<void> {
  const client = await createClient(options);
  try {
    await client.healthCheck();
  } catch (error) {
    console.log('Server Status: Not Running');
    console.log(`  ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return;
  }

  try {
    const status = await client.getStatus();
    console.log(options.format === 'json' ? formatJson(status) : formatStatus(status));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
