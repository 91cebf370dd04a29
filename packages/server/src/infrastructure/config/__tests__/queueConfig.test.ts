import { describe, it, expect, afterEach, vi } from 'vitest';
import { getQueueConfig } from '../queueConfig.js';

describe('getQueueConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('REDIS_HOST がなければ null', () => {
    vi.stubEnv('REDIS_HOST', '');
    expect(getQueueConfig()).toBeNull();
  });

  it('ポートのデフォルトは 6379', () => {
    vi.stubEnv('REDIS_HOST', 'redis.test');
    vi.stubEnv('REDIS_PORT', '');

    expect(getQueueConfig()).toEqual({ redisHost: 'redis.test', redisPort: 6379 });
  });

  it('REDIS_PORT を読む', () => {
    vi.stubEnv('REDIS_HOST', 'redis.test');
    vi.stubEnv('REDIS_PORT', '6380');

    expect(getQueueConfig()).toEqual({ redisHost: 'redis.test', redisPort: 6380 });
  });

  it('定期パスの間隔はワーカーの設定なので、API 側では読まない', () => {
    vi.stubEnv('REDIS_HOST', 'redis.test');
    vi.stubEnv('REDIS_PORT', '');
    vi.stubEnv('VERIFICATION_REPEAT_MS', '-1');

    expect(getQueueConfig()).toEqual({ redisHost: 'redis.test', redisPort: 6379 });
  });
});
