import { readFloatBE, readUIntBE } from './binary.js';

/**
 * Matroska / WebM Probe
 *
 * EBML 要素を辿り、Segment Info の Duration と TimestampScale から再生時間を求める。
 * Segment Info は通常ファイル先頭付近にあるため、先頭 64KiB 程度を渡す。
 */

export const EBML_HEADER_ID = 0x1a45dfa3;
export const SEGMENT_ID = 0x18538067;
export const SEGMENT_INFO_ID = 0x1549a966;
export const TIMESTAMP_SCALE_ID = 0x2ad7b1;
export const DURATION_ID = 0x4489;

/** TimestampScale の既定値（1 tick = 1ms） */
export const DEFAULT_TIMESTAMP_SCALE = 1_000_000;

const NANOSECONDS_PER_SECOND = 1_000_000_000;

/** 本体をスキップせず、中に入って探索するマスター要素 */
const DESCEND_IDS = new Set([EBML_HEADER_ID, SEGMENT_ID, SEGMENT_INFO_ID]);

export interface Vint {
  /** エンコード長（バイト） */
  length: number;
  value: number;
  /** 全ビットが1: サイズ不明（ライブ録画の Segment / Cluster など） */
  unknown: boolean;
}

function vintLength(first: number): number | null {
  if (first === 0) return null;
  // 先頭の0ビット数 + 1
  return Math.clz32(first) - 24 + 1;
}

/**
 * 要素サイズの VINT を読む（長さ表示ビットはマスクする）
 */
export function readVint(buf: Uint8Array, offset: number): Vint | null {
  if (offset >= buf.length) return null;
  const length = vintLength(buf[offset]);
  if (length === null || offset + length > buf.length) return null;

  const firstBits = buf[offset] & (0xff >> length);
  let value = firstBits;
  let allOnes = firstBits === 0xff >> length;
  for (let i = 1; i < length; i++) {
    const byte = buf[offset + i];
    value = value * 256 + byte;
    allOnes = allOnes && byte === 0xff;
  }

  return { length, value, unknown: allOnes };
}

/**
 * 要素IDを読む（長さ表示ビットは ID の一部として残す）
 */
export function readElementId(buf: Uint8Array, offset: number): { length: number; id: number } | null {
  if (offset >= buf.length) return null;
  const length = vintLength(buf[offset]);
  if (length === null || offset + length > buf.length) return null;

  let id = 0;
  for (let i = 0; i < length; i++) {
    id = id * 256 + buf[offset + i];
  }
  return { length, id };
}

/**
 * Segment Info の Duration から再生時間（秒）を返す。取得できない・0秒なら null
 */
export function extractMkvDuration(buf: Uint8Array): number | null {
  let offset = 0;
  let timestampScale = DEFAULT_TIMESTAMP_SCALE;
  let duration: number | null = null;

  while (offset < buf.length - 2) {
    const elementStart = offset;

    const element = readElementId(buf, offset);
    if (!element) break;
    offset += element.length;

    const size = readVint(buf, offset);
    if (!size) break;
    offset += size.length;

    const dataStart = offset;
    const dataEnd = size.unknown ? Number.POSITIVE_INFINITY : dataStart + size.value;

    if (DESCEND_IDS.has(element.id)) {
      continue;
    }

    if (element.id === TIMESTAMP_SCALE_ID) {
      if (dataEnd > buf.length || size.value > 8) break;
      if (size.value > 0) {
        const scale = readUIntBE(buf, dataStart, size.value);
        if (scale === null) break;
        timestampScale = scale;
      }
      offset = dataEnd;
    } else if (element.id === DURATION_ID) {
      if (dataEnd > buf.length) break;
      duration = readFloatBE(buf, dataStart, size.value);
      offset = dataEnd;
      if (duration !== null) break;
    } else if (!size.unknown && size.value > 0 && dataEnd <= buf.length) {
      offset = dataEnd;
    } else {
      // サイズ不明、または本体がバッファを越える要素はマスターとみなして中に入る
      offset = dataStart;
    }

    if (offset <= elementStart) break;
  }

  if (duration === null || !Number.isFinite(duration) || duration <= 0) {
    return null;
  }

  // Duration は TimestampScale 単位、TimestampScale は 1単位あたりのナノ秒
  const seconds = Math.floor((duration * timestampScale) / NANOSECONDS_PER_SECOND);
  return seconds > 0 ? seconds : null;
}
