import { z } from 'zod';
import type { DurationCacheDocument } from '@pvrcheck/common-types';

/** キャッシュドキュメントを保存するキー */
export const DURATION_CACHE_KEY = 'DurationProbeCache';

const documentSchema = z.record(z.string(), z.unknown());
const secondsSchema = z.number().int().positive();

/**
 * 保存済みドキュメントを検証する
 *
 * 形が壊れていれば空として扱い、不正なエントリだけを捨てる（次のパスで再プローブされる）
 */
export function parseCacheDocument(value: unknown): DurationCacheDocument {
  if (value === null || value === undefined) {
    return {};
  }

  const parsed = documentSchema.safeParse(value);
  if (!parsed.success) {
    console.warn('⚠️ [DurationCache] Stored document is not an object, ignoring it');
    return {};
  }

  const document: DurationCacheDocument = {};
  for (const [recordingId, seconds] of Object.entries(parsed.data)) {
    const entry = secondsSchema.safeParse(seconds);
    if (entry.success) {
      document[recordingId] = entry.data;
    } else {
      console.warn(`⚠️ [DurationCache] Dropping invalid entry ${recordingId}=${JSON.stringify(seconds)}`);
    }
  }
  return document;
}
