import { describe, it, expect } from 'vitest';
import { compositeFrame, opacityToAlpha, toRgba } from './compositor.js';
import { GifExportError, GifExportErrorCode } from './errors.js';
import type { MaskFrame, RgbFrame } from './types.js';

function frame2x1(): RgbFrame {
  return { width: 2, height: 1, channels: 3, data: Uint8Array.from([10, 20, 30, 40, 50, 60]) };
}

describe('opacityToAlpha', () => {
  it('scales and rounds opacity to 0-255', () => {
    expect(opacityToAlpha(0)).toBe(0);
    expect(opacityToAlpha(1)).toBe(255);
    expect(opacityToAlpha(0.5)).toBe(128); // 127.5 rounds up
    expect(opacityToAlpha(0.2)).toBe(51);
  });

  it('clamps out-of-range values', () => {
    expect(opacityToAlpha(-0.3)).toBe(0);
    expect(opacityToAlpha(1.7)).toBe(255);
    expect(opacityToAlpha(Number.NaN)).toBe(0);
  });
});

describe('compositeFrame', () => {
  it('returns the color bytes unchanged without alpha compositing', () => {
    const frame = frame2x1();
    const out = compositeFrame(frame, undefined, false);
    expect(out).toBe(frame.data);
  });

  it('ignores a mask when compositing is off', () => {
    const mask: MaskFrame = { width: 2, height: 1, data: [0, 0] };
    expect(Array.from(compositeFrame(frame2x1(), mask, false))).toEqual([10, 20, 30, 40, 50, 60]);
  });

  it('interleaves the mask as a fourth channel', () => {
    const mask: MaskFrame = { width: 2, height: 1, data: [1, 0.2] };
    expect(Array.from(compositeFrame(frame2x1(), mask, true))).toEqual([10, 20, 30, 255, 40, 50, 60, 51]);
  });

  it('treats a missing mask as fully opaque', () => {
    expect(Array.from(compositeFrame(frame2x1(), undefined, true))).toEqual([10, 20, 30, 255, 40, 50, 60, 255]);
  });

  it('drops the alpha of a 4-channel frame when compositing is off', () => {
    const rgba: RgbFrame = { width: 1, height: 2, channels: 4, data: Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]) };
    expect(Array.from(compositeFrame(rgba, undefined, false))).toEqual([1, 2, 3, 5, 6, 7]);
  });

  it('replaces the alpha of a 4-channel frame with the mask', () => {
    const rgba: RgbFrame = { width: 1, height: 2, channels: 4, data: Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]) };
    const mask: MaskFrame = { width: 1, height: 2, data: [0, 1] };
    expect(Array.from(compositeFrame(rgba, mask, true))).toEqual([1, 2, 3, 0, 5, 6, 7, 255]);
  });

  it('rejects a frame whose buffer does not match its size', () => {
    const bad: RgbFrame = { width: 2, height: 2, channels: 3, data: new Uint8Array(5) };
    let caught: unknown;
    try {
      compositeFrame(bad, undefined, false);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GifExportError);
    expect(caught).toMatchObject({ code: GifExportErrorCode.FRAME_FORMAT });
  });

  it('rejects a mask of the wrong size', () => {
    const mask: MaskFrame = { width: 1, height: 1, data: [1] };
    expect(() => compositeFrame(frame2x1(), mask, true)).toThrow(/does not match frame 2x1/);
  });
});

describe('toRgba', () => {
  it('keeps the alpha of a 4-channel frame when no mask is given', () => {
    const rgba: RgbFrame = { width: 1, height: 1, channels: 4, data: Uint8Array.from([9, 8, 7, 6]) };
    expect(Array.from(toRgba(rgba))).toEqual([9, 8, 7, 6]);
  });

  it('makes 3-channel frames opaque', () => {
    expect(Array.from(toRgba(frame2x1()))).toEqual([10, 20, 30, 255, 40, 50, 60, 255]);
  });
});
