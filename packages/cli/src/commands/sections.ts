/**
 * sections コマンド実装
 */

import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatJson, formatSections, type OutputFormat } from '../utils/output.js';

export interface SectionsCommandOptions extends ConnectionOptions {
  format?: OutputFormat;
}

export async function executeSections(options: SectionsCommandOptions): Promise<void> {
  try {
    const client = await createClient(options);
    const response = await client.getSections();
    console.log(options.format === 'json' ? formatJson(response) : formatSections(response));
  } catch (error) {
    exitWithError(error);
  }
}
