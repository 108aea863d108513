import type { ParmLensConfig } from '../config.js';

/** 部分的な設定（各セクションも部分指定可） */
export type PartialParmLensConfig = {
  [K in keyof ParmLensConfig]?: ParmLensConfig[K] extends object
    ? Partial<ParmLensConfig[K]>
    : ParmLensConfig[K];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectSection(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`config.${name} must be an object`);
  }
  return value;
}

function optionalString(section: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`config.${path}.${key} must be a string`);
  }
  return value;
}

function optionalNumber(section: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`config.${path}.${key} must be a number`);
  }
  return value;
}

function optionalBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`config.${path}.${key} must be a boolean`);
  }
  return value;
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialParmLensConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialParmLensConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  // server設定のバリデーション
  if (config.server !== undefined) {
    const server = expectSection(config.server, 'server');
    const port = optionalNumber(server, 'port', 'server');
    if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
      throw new Error('config.server.port must be between 1 and 65535');
    }
    result.server = { host: optionalString(server, 'host', 'server'), port };
  }

  // parm7設定のバリデーション
  if (config.parm7 !== undefined) {
    const parm7 = expectSection(config.parm7, 'parm7');
    let tokenSections: string[] | undefined;
    if (parm7.tokenSections !== undefined) {
      const value = parm7.tokenSections;
      if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new Error('config.parm7.tokenSections must be an array of strings');
      }
      tokenSections = value;
    }
    const chargeScale = optionalNumber(parm7, 'chargeScale', 'parm7');
    if (chargeScale !== undefined && chargeScale <= 0) {
      throw new Error('config.parm7.chargeScale must be positive');
    }
    result.parm7 = { tokenSections, chargeScale };
  }

  // query設定のバリデーション
  if (config.query !== undefined) {
    const query = expectSection(config.query, 'query');
    const maxResults = optionalNumber(query, 'maxResults', 'query');
    if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < 1)) {
      throw new Error('config.query.maxResults must be a positive integer');
    }
    result.query = { maxResults };
  }

  // worker設定のバリデーション
  if (config.worker !== undefined) {
    const worker = expectSection(config.worker, 'worker');
    result.worker = { enabled: optionalBoolean(worker, 'enabled', 'worker') };
  }

  // logging設定のバリデーション
  if (config.logging !== undefined) {
    const logging = expectSection(config.logging, 'logging');
    result.logging = { timings: optionalBoolean(logging, 'timings', 'logging') };
  }

  return result;
}
