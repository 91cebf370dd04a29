import { defineConfig } from 'vitest/config';

/**
 * ワークスペース全体のユニットテスト設定
 *
 * 実行: npm test
 * DB・Redis・外部サーバーには接続しない（fetch / pg はテスト内でフェイクに差し替え）
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
