/**
 * highlight コマンド実装
 */

import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatHighlight, formatJson, type OutputFormat } from '../utils/output.js';

export interface HighlightCommandOptions extends ConnectionOptions {
  mode?: string;
  format?: OutputFormat;
}

/**
 * 原子シリアル引数を整数に変換
 */
export function parseSerials(values: string[]): number[] {
  return values.map((value) => {
    const serial = Number(value);
    if (!Number.isInteger(serial) || serial <= 0) {
      throw new Error(`原子シリアルが不正です: '${value}'`);
    }
    return serial;
  });
}

export async function executeHighlight(serials: string[], options: HighlightCommandOptions): Promise<void> {
  try {
    const parsed = parseSerials(serials);
    const client = await createClient(options);
    const result = await client.highlight(parsed, options.mode);
    console.log(options.format === 'json' ? formatJson(result) : formatHighlight(result));
  } catch (error) {
    exitWithError(error);
  }
}
