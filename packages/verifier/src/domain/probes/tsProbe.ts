/**
 * MPEG-TS Probe
 *
 * TSパケット内の PES ヘッダーから PTS を取り出し、先頭と末尾の差分で再生時間を求める。
 * 純粋関数のみ（I/O なし）。
 *
 * 既知の制限: 33bit PTS は約26.5時間で一周するが、ラップアラウンドは補正しない。
 */

export const TS_PACKET_SIZE = 188;
export const TS_SYNC_BYTE = 0x47;

/** PTS は 90kHz クロック */
export const PTS_CLOCK_HZ = 90_000;

/** PES ヘッダーを読むのに必要な最小バイト数（start code〜PTS末尾） */
const PES_HEADER_MIN_BYTES = 14;

function isPesStreamWithPts(streamId: number): boolean {
  // audio: 0xC0-0xDF, video: 0xE0-0xEF
  return (streamId >= 0xc0 && streamId <= 0xdf) || (streamId >= 0xe0 && streamId <= 0xef);
}

/**
 * PES ヘッダー内の 5 バイトから 33bit PTS を復元する
 *
 * [4bit prefix][3bit PTS][marker] [8bit PTS] [7bit PTS][marker] [8bit PTS] [7bit PTS][marker]
 * 32bit を超えるためビット演算ではなく乗算で組み立てる
 */
export function parsePts(buf: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 5 > buf.length) return null;
  const b0 = buf[offset];
  const b1 = buf[offset + 1];
  const b2 = buf[offset + 2];
  const b3 = buf[offset + 3];
  const b4 = buf[offset + 4];

  return (
    ((b0 >> 1) & 0x07) * 2 ** 30 +
    b1 * 2 ** 22 +
    (b2 >> 1) * 2 ** 15 +
    b3 * 2 ** 7 +
    (b4 >> 1)
  );
}

/**
 * 最初の同期バイトまで読み飛ばす（オフセット0で揃っている前提にしない）
 */
function findSyncOffset(buf: Uint8Array): number {
  let offset = 0;
  while (offset < buf.length - TS_PACKET_SIZE) {
    if (buf[offset] === TS_SYNC_BYTE) break;
    offset++;
  }
  return offset;
}

/**
 * 1パケット分の PES ヘッダーから PTS を読む。該当しなければ null
 */
function readPacketPts(buf: Uint8Array, offset: number): number | null {
  const payloadUnitStart = (buf[offset + 1] & 0x40) !== 0;
  const hasPayload = (buf[offset + 3] & 0x10) !== 0;
  const hasAdaptation = (buf[offset + 3] & 0x20) !== 0;

  if (!payloadUnitStart || !hasPayload) return null;

  let payloadOffset = offset + 4;
  if (hasAdaptation) {
    payloadOffset += 1 + buf[payloadOffset];
  }

  if (payloadOffset + PES_HEADER_MIN_BYTES > buf.length) return null;

  // PES start code: 0x00 0x00 0x01
  if (buf[payloadOffset] !== 0x00 || buf[payloadOffset + 1] !== 0x00 || buf[payloadOffset + 2] !== 0x01) {
    return null;
  }

  if (!isPesStreamWithPts(buf[payloadOffset + 3])) return null;

  const ptsDtsFlags = buf[payloadOffset + 7];
  if ((ptsDtsFlags & 0x80) === 0) return null;

  return parsePts(buf, payloadOffset + 9);
}

/**
 * バッファ内の PTS を先頭から順に visitor に渡す。visitor が false を返したら打ち切り
 */
function scanPts(buf: Uint8Array, visitor: (pts: number) => boolean): void {
  let offset = findSyncOffset(buf);

  while (offset + TS_PACKET_SIZE <= buf.length) {
    if (buf[offset] !== TS_SYNC_BYTE) {
      // 同期ずれ: 1バイトずつ再同期
      offset++;
      continue;
    }

    const pts = readPacketPts(buf, offset);
    if (pts !== null && !visitor(pts)) return;

    offset += TS_PACKET_SIZE;
  }
}

export function extractFirstPts(buf: Uint8Array): number | null {
  let first: number | null = null;
  scanPts(buf, (pts) => {
    first = pts;
    return false;
  });
  return first;
}

export function extractLastPts(buf: Uint8Array): number | null {
  let last: number | null = null;
  scanPts(buf, (pts) => {
    last = pts;
    return true;
  });
  return last;
}

/**
 * 先頭バッファの最初の PTS と末尾バッファの最後の PTS から再生時間（秒）を求める
 *
 * Range 非対応サーバーでは head と tail に同じバッファを渡す。
 * PTS が取れない、last <= first、または 0 秒の場合は null（0 は返さない）
 */
export function probeTsDuration(head: Uint8Array, tail: Uint8Array): number | null {
  const firstPts = extractFirstPts(head);
  const lastPts = extractLastPts(tail);

  if (firstPts === null || lastPts === null || lastPts <= firstPts) {
    return null;
  }

  const seconds = Math.floor((lastPts - firstPts) / PTS_CLOCK_HZ);
  return seconds > 0 ? seconds : null;
}
