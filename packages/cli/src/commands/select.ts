/**
 * select コマンド実装
 */

import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatJson, formatSelection, type OutputFormat } from '../utils/output.js';

export interface SelectCommandOptions extends ConnectionOptions {
  cursor?: string;
  format?: OutputFormat;
}

function parseIndex(value: string, label: string): number {
  const index = Number(value);
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`${label}は0以上の整数で指定してください: '${value}'`);
  }
  return index;
}

export async function executeSelect(table: string, row: string, options: SelectCommandOptions): Promise<void> {
  try {
    const rowIndex = parseIndex(row, '行番号');
    const cursor = options.cursor ? parseIndex(options.cursor, 'カーソル') : 0;
    const client = await createClient(options);
    const result = await client.select(table, rowIndex, cursor);
    console.log(options.format === 'json' ? formatJson(result) : formatSelection(result));
  } catch (error) {
    exitWithError(error);
  }
}
