import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ParmLensService } from '../parmlens-service.js';
import { MINI_PARM7_PATH, testConfig } from '../../__tests__/helpers.js';

describe('ParmLensService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stop() はロード直後のテーブル構築を取り消す', async () => {
    const service = new ParmLensService(testConfig({ worker: { enabled: true } }));
    service.start();
    await service.load({ parm7Path: MINI_PARM7_PATH });

    service.stop();
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(service.getStatus().model).toEqual({
      loaded: true,
      path: MINI_PARM7_PATH,
      natoms: 6,
      tablesReady: false,
      selectionReady: false,
    });
  });

  it('取り消した後でもテーブルは要求時に構築する', async () => {
    const service = new ParmLensService(testConfig({ worker: { enabled: true } }));
    await service.load({ parm7Path: MINI_PARM7_PATH });
    service.stop();

    const { bond_types } = await service.getTables();

    expect(bond_types.rows).toHaveLength(4);
    expect(service.getStatus().model.tablesReady).toBe(true);
  });
});
