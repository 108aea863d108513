/**
 * 接続先URL解決のテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { resolveBaseUrl } from '../client.js';

describe('resolveBaseUrl', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `.test-cli-client-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.parmlens.json');
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('--server が最優先で末尾のスラッシュは落とす', async () => {
    await fs.writeFile(configPath, JSON.stringify({ server: { port: 25000 } }));

    await expect(resolveBaseUrl({ server: 'http://example.test:9000//', config: configPath })).resolves.toBe(
      'http://example.test:9000'
    );
  });

  it('設定ファイルのホストとポートを使う', async () => {
    await fs.writeFile(configPath, JSON.stringify({ server: { host: '127.0.0.1', port: 25000 } }));

    await expect(resolveBaseUrl({ config: configPath })).resolves.toBe('http://127.0.0.1:25000');
  });

  it('全インターフェース待ち受けのホストは localhost に読み替える', async () => {
    await fs.writeFile(configPath, JSON.stringify({ server: { host: '0.0.0.0', port: 25001 } }));

    await expect(resolveBaseUrl({ config: configPath })).resolves.toBe('http://localhost:25001');
  });

  it('設定ファイルが無ければ既定のポート', async () => {
    await expect(resolveBaseUrl({ config: path.join(testDir, 'missing.json') })).resolves.toBe(
      'http://localhost:24310'
    );
  });
});
