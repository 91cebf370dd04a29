/**
 * ビッグエンディアンのバイト読み取りヘルパー
 *
 * 範囲外の読み取りは例外ではなく null を返す
 */

function view(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

function inBounds(buf: Uint8Array, offset: number, length: number): boolean {
  return offset >= 0 && offset + length <= buf.length;
}

export function readUInt32BE(buf: Uint8Array, offset: number): number | null {
  if (!inBounds(buf, offset, 4)) return null;
  return view(buf).getUint32(offset);
}

export function readUInt64BE(buf: Uint8Array, offset: number): bigint | null {
  if (!inBounds(buf, offset, 8)) return null;
  return view(buf).getBigUint64(offset);
}

/**
 * 1〜8バイトの符号なし整数（2^53 を超える値は精度が落ちる）
 */
export function readUIntBE(buf: Uint8Array, offset: number, length: number): number | null {
  if (length < 1 || length > 8 || !inBounds(buf, offset, length)) return null;
  let value = 0;
  for (let i = 0; i < length; i++) {
    value = value * 256 + buf[offset + i];
  }
  return value;
}

/**
 * IEEE-754 浮動小数点（4バイト: single / 8バイト: double）
 */
export function readFloatBE(buf: Uint8Array, offset: number, length: number): number | null {
  if (!inBounds(buf, offset, length)) return null;
  if (length === 4) return view(buf).getFloat32(offset);
  if (length === 8) return view(buf).getFloat64(offset);
  return null;
}

export function readAscii(buf: Uint8Array, offset: number, length: number): string | null {
  if (!inBounds(buf, offset, length)) return null;
  return String.fromCharCode(...buf.subarray(offset, offset + length));
}
