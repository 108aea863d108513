/**
 * server start コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { resolveServerConfig } from '../start.js';

describe('resolveServerConfig', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `.test-server-start-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.parmlens.json');
    await fs.mkdir(testDir, { recursive: true });
    await fs.writeFile(
      configPath,
      JSON.stringify({ server: { port: 25000 }, worker: { enabled: true }, logging: { timings: false } })
    );
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルの値を使う', async () => {
    const config = await resolveServerConfig({ config: configPath });
    expect(config.server).toEqual({ host: 'localhost', port: 25000 });
    expect(config.worker.enabled).toBe(true);
    expect(config.logging.timings).toBe(false);
    expect(config.query.maxResults).toBe(50000);
  });

  it('コマンドラインオプションが設定ファイルより優先される', async () => {
    const config = await resolveServerConfig({
      config: configPath,
      host: '127.0.0.1',
      port: '26000',
      worker: false,
      timings: true,
    });
    expect(config.server).toEqual({ host: '127.0.0.1', port: 26000 });
    expect(config.worker.enabled).toBe(false);
    expect(config.logging.timings).toBe(true);
  });

  it('--no-worker を指定しない場合（commanderの既定値true）は設定ファイルに従う', async () => {
    await fs.writeFile(configPath, JSON.stringify({ worker: { enabled: false } }));
    const config = await resolveServerConfig({ config: configPath, worker: true });
    expect(config.worker.enabled).toBe(false);
  });

  it('不正なポートはエラー', async () => {
    await expect(resolveServerConfig({ config: configPath, port: 'abc' })).rejects.toThrow('Invalid port: abc');
    await expect(resolveServerConfig({ config: configPath, port: '70000' })).rejects.toThrow('Invalid port: 70000');
  });
});
