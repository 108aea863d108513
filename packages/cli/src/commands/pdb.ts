/**
 * pdb コマンド実装
 */

import { writeFile } from 'fs/promises';
import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';

export interface PdbCommandOptions extends ConnectionOptions {
  output?: string;
}

export async function executePdb(options: PdbCommandOptions): Promise<void> {
  try {
    const client = await createClient(options);
    const { pdb } = await client.getPdb();
    if (options.output) {
      await writeFile(options.output, pdb, 'utf-8');
      console.log(`PDBを書き出しました: ${options.output}`);
    } else {
      process.stdout.write(pdb);
    }
  } catch (error) {
    exitWithError(error);
  }
}
