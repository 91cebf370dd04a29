import { describe, it, expect } from 'vitest';
import { extractMp4Duration } from '../mp4Probe.js';
import { box, concat, mvhdV0, mvhdV1, opaqueBox } from './builders.js';

describe('extractMp4Duration', () => {
  it('moov 直下の mvhd (version 0) から秒数を返す', () => {
    const buf = concat(opaqueBox('ftyp', 16), box('moov', mvhdV0(1000, 5_400_000)));
    expect(extractMp4Duration(buf)).toBe(5400);
  });

  it('moov > trak > mdia の入れ子も辿る', () => {
    const buf = box('moov', box('trak', box('mdia', mvhdV0(1000, 5_400_000))));
    expect(extractMp4Duration(buf)).toBe(5400);
  });

  it('version 1 の 64bit duration を読む', () => {
    const buf = box('moov', mvhdV1(1000, 5_400_000n));
    expect(extractMp4Duration(buf)).toBe(5400);
  });

  it('2^32 を超える duration でも精度を落とさない', () => {
    const buf = box('moov', mvhdV1(48_000, 48_000n * 100_000n));
    expect(extractMp4Duration(buf)).toBe(100_000);
  });

  it('端数は切り捨て', () => {
    const buf = box('moov', mvhdV0(90_000, 90_000 * 60 + 89_999));
    expect(extractMp4Duration(buf)).toBe(60);
  });

  it('moov 以外のボックスは丸ごと読み飛ばす', () => {
    const buf = concat(opaqueBox('ftyp', 20), opaqueBox('free', 100), box('moov', mvhdV0(600, 600 * 42)));
    expect(extractMp4Duration(buf)).toBe(42);
  });

  it('最初の mvhd を採用する', () => {
    const buf = concat(box('moov', mvhdV0(1, 10)), box('moov', mvhdV0(1, 20)));
    expect(extractMp4Duration(buf)).toBe(10);
  });

  it('timescale 0 は null', () => {
    expect(extractMp4Duration(box('moov', mvhdV0(0, 5_400_000)))).toBeNull();
  });

  it('0 秒は null', () => {
    expect(extractMp4Duration(box('moov', mvhdV0(1000, 999)))).toBeNull();
  });

  it('サイズが 8 未満のボックスは壊れた入力として null', () => {
    const buf = new Uint8Array([0x00, 0x00, 0x00, 0x04, 0x66, 0x72, 0x65, 0x65, 0x00, 0x00]);
    expect(extractMp4Duration(buf)).toBeNull();
  });

  it('mvhd が途中で切れていれば null', () => {
    const full = box('moov', mvhdV0(1000, 5_400_000));
    // moov(8) + mvhd header(8) + version/flags/creation(8)
    expect(extractMp4Duration(full.subarray(0, 24))).toBeNull();
  });

  it('moov がバッファ外（先頭に巨大な mdat）なら null', () => {
    const mdatHeader = new Uint8Array([0x10, 0x00, 0x00, 0x00, 0x6d, 0x64, 0x61, 0x74]);
    expect(extractMp4Duration(concat(mdatHeader, new Uint8Array(64)))).toBeNull();
  });

  it('空バッファは null', () => {
    expect(extractMp4Duration(new Uint8Array(0))).toBeNull();
  });
});
