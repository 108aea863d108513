/**
 * atom / residue コマンド実装
 */

import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatAtom, formatJson, formatResidue, type OutputFormat } from '../utils/output.js';

export interface AtomCommandOptions extends ConnectionOptions {
  format?: OutputFormat;
}

function parseId(value: string, label: string): number {
  const id = Number(value);
  if (!Number.isInteger(id)) {
    throw new Error(`${label}は整数で指定してください: '${value}'`);
  }
  return id;
}

export async function executeAtom(serial: string, options: AtomCommandOptions): Promise<void> {
  try {
    const client = await createClient(options);
    const response = await client.getAtom(parseId(serial, '原子シリアル'));
    console.log(options.format === 'json' ? formatJson(response) : formatAtom(response));
  } catch (error) {
    exitWithError(error);
  }
}

export async function executeResidue(resid: string, options: AtomCommandOptions): Promise<void> {
  try {
    const client = await createClient(options);
    const response = await client.getResidue(parseId(resid, '残基番号'));
    console.log(options.format === 'json' ? formatJson(response) : formatResidue(response));
  } catch (error) {
    exitWithError(error);
  }
}
