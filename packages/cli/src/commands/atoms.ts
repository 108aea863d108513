/**
 * atoms コマンド実装（条件検索）
 */

import type { AtomQueryFilters } from '@parmlens/types';
import { createClient, type ConnectionOptions } from '../utils/client.js';
import { exitWithError } from '../utils/errors.js';
import { formatJson, formatQueryResult, type OutputFormat } from '../utils/output.js';

export interface AtomsCommandOptions extends ConnectionOptions {
  resname?: string;
  name?: string;
  type?: string;
  chargeMin?: string;
  chargeMax?: string;
  limit?: string;
  format?: OutputFormat;
}

function parseNumber(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${label}が数値ではありません: '${value}'`);
  }
  return parsed;
}

/**
 * オプションから検索条件を組み立てる
 */
export function buildFilters(options: AtomsCommandOptions): AtomQueryFilters {
  const filters: AtomQueryFilters = {};
  if (options.resname) filters.resnameContains = options.resname;
  if (options.name) filters.atomnameContains = options.name;
  if (options.type) filters.atomTypeEquals = options.type;
  if (options.chargeMin !== undefined) filters.chargeMin = parseNumber(options.chargeMin, '--charge-min');
  if (options.chargeMax !== undefined) filters.chargeMax = parseNumber(options.chargeMax, '--charge-max');
  return filters;
}

export async function executeAtoms(options: AtomsCommandOptions): Promise<void> {
  try {
    const filters = buildFilters(options);
    const limit = options.limit ? parseInt(options.limit, 10) : undefined;
    const client = await createClient(options);
    const response = await client.queryAtoms(filters, limit);
    console.log(options.format === 'json' ? formatJson(response) : formatQueryResult(response));
  } catch (error) {
    exitWithError(error);
  }
}
