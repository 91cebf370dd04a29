import { readAscii, readUInt32BE, readUInt64BE } from './binary.js';

/**
 * ISO-BMFF (MP4/M4V) Probe
 *
 * ボックスを先頭から辿り、moov 内の mvhd から timescale と duration を読む。
 * 通常のファイルでは moov が先頭付近にある前提（faststart）で、先頭 64KiB 程度を渡す。
 */

/** 中に入って探索を続けるコンテナボックス */
const CONTAINER_BOXES = new Set(['moov', 'trak', 'mdia']);

const BOX_HEADER_SIZE = 8;

/**
 * mvhd の本体（version バイト位置）から再生時間（秒）を読む
 */
function readMvhdDuration(buf: Uint8Array, versionOffset: number): number | null {
  if (versionOffset >= buf.length) return null;
  const version = buf[versionOffset];

  if (version === 0) {
    // version(1) + flags(3) + creation(4) + modification(4) = 12
    const timescale = readUInt32BE(buf, versionOffset + 12);
    const duration = readUInt32BE(buf, versionOffset + 16);
    if (timescale === null || duration === null || timescale === 0) return null;
    return Math.floor(duration / timescale);
  }

  // version 1: version(1) + flags(3) + creation(8) + modification(8) = 20
  const timescale = readUInt32BE(buf, versionOffset + 20);
  const duration = readUInt64BE(buf, versionOffset + 24);
  if (timescale === null || duration === null || timescale === 0) return null;
  return Number(duration / BigInt(timescale));
}

/**
 * 最初に見つかった mvhd の再生時間（秒）を返す。見つからない・壊れている・0秒なら null
 */
export function extractMp4Duration(buf: Uint8Array): number | null {
  let offset = 0;

  while (offset + BOX_HEADER_SIZE <= buf.length) {
    const boxSize = readUInt32BE(buf, offset);
    const boxType = readAscii(buf, offset + 4, 4);
    if (boxSize === null || boxType === null) return null;

    if (boxType === 'mvhd') {
      const seconds = readMvhdDuration(buf, offset + BOX_HEADER_SIZE);
      return seconds !== null && seconds > 0 ? seconds : null;
    }

    if (CONTAINER_BOXES.has(boxType)) {
      // ボックス全体は飛ばさず、ヘッダーの直後から子ボックスを読む
      offset += BOX_HEADER_SIZE;
      continue;
    }

    // size 0 は「バッファの残り全部」
    const size = boxSize === 0 ? buf.length - offset : boxSize;
    if (size < BOX_HEADER_SIZE) {
      // 前に進めない: 壊れた入力
      return null;
    }
    offset += size;
  }

  return null;
}
