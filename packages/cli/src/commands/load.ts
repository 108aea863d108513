/**
 * load コマンド実装
 */

import * as path from 'path';
import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatJson, formatLoadResult, type OutputFormat } from '../utils/output.js';

export interface LoadCommandOptions extends ConnectionOptions {
  rst7?: string;
  format?: OutputFormat;
}

/**
 * load コマンドを実行
 * パスはサーバ側で解決されるため絶対パスに変換して送る
 */
export async function executeLoad(parm7Path: string, options: LoadCommandOptions): Promise<void> {
  try {
    const client = await createClient(options);
    const response = await client.load({
      parm7Path: path.resolve(parm7Path),
      rst7Path: options.rst7 ? path.resolve(options.rst7) : undefined,
    });
    console.log(options.format === 'json' ? formatJson(response) : formatLoadResult(response));
  } catch (error) {
    exitWithError(error);
  }
}
