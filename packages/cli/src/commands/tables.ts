/**
 * tables コマンド実装
 */

import { TABLE_NAMES, isTableName } from '@parmlens/types';
import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatJson, formatTable, type OutputFormat } from '../utils/output.js';

export interface TablesCommandOptions extends ConnectionOptions {
  format?: OutputFormat;
}

/**
 * tables コマンドを実行
 * テーブル名を省略した場合は全テーブルを出力する
 */
export async function executeTables(name: string | undefined, options: TablesCommandOptions): Promise<void> {
  try {
    if (name !== undefined && !isTableName(name)) {
      throw new Error(`不明なテーブル '${name}'（${TABLE_NAMES.join(', ')}）`);
    }
    const client = await createClient(options);

    if (name !== undefined) {
      const table = await client.getTable(name);
      console.log(options.format === 'json' ? formatJson(table) : formatTable(table));
      return;
    }

    const tables = await client.getTables();
    if (options.format === 'json') {
      console.log(formatJson(tables));
      return;
    }
    for (const tableName of TABLE_NAMES) {
      console.log(`== ${tableName} (${tables[tableName].rows.length}行) ==`);
      console.log(formatTable(tables[tableName]));
      console.log('');
    }
  } catch (error) {
    exitWithError(error);
  }
}
