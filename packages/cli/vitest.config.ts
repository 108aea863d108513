import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    include: ['src/**/__tests__/**/*.test.ts'],

    // 出力設定: テスト失敗時のみ詳細を表示
    reporters: ['default'],

    // テスト環境
    environment: 'node',
  },
});
