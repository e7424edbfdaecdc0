/**
 * Pixel compositor
 *
 * Turns a color frame (plus an optional opacity mask) into the raw byte layout
 * the encoders read: rgb24 or rgba, row-major, no padding.
 */

import { GifExportError, GifExportErrorCode } from './errors.js';
import type { MaskFrame, RgbFrame } from './types.js';

function assertFrameShape(frame: RgbFrame): void {
  const expected = frame.width * frame.height * frame.channels;
  if (frame.data.length !== expected) {
    throw new GifExportError(
      `Frame of ${frame.width}x${frame.height}x${frame.channels} should hold ${expected} bytes, got ${frame.data.length}`,
      GifExportErrorCode.FRAME_FORMAT
    );
  }
}

function assertMaskShape(frame: RgbFrame, mask: MaskFrame): void {
  if (mask.width !== frame.width || mask.height !== frame.height || mask.data.length !== frame.width * frame.height) {
    throw new GifExportError(
      `Mask of ${mask.width}x${mask.height} (${mask.data.length} values) does not match frame ${frame.width}x${frame.height}`,
      GifExportErrorCode.FRAME_FORMAT
    );
  }
}

/**
 * Scale an opacity in 0-1 to an 8-bit alpha sample
 */
export function opacityToAlpha(opacity: number): number {
  const value = Math.round(opacity * 255);
  if (!(value > 0)) return 0; // also catches NaN
  return value > 255 ? 255 : value;
}

/**
 * Interleave color and alpha into RGBA. Without a mask every pixel is opaque.
 */
export function toRgba(frame: RgbFrame, mask?: MaskFrame): Uint8Array {
  assertFrameShape(frame);
  if (mask) assertMaskShape(frame, mask);

  const pixels = frame.width * frame.height;
  const src = frame.data;
  const stride = frame.channels;
  const out = new Uint8Array(pixels * 4);

  for (let p = 0; p < pixels; p++) {
    const s = p * stride;
    const d = p * 4;
    out[d] = src[s];
    out[d + 1] = src[s + 1];
    out[d + 2] = src[s + 2];
    if (mask) {
      out[d + 3] = opacityToAlpha(mask.data[p]);
    } else {
      out[d + 3] = stride === 4 ? src[s + 3] : 255;
    }
  }

  return out;
}

function toRgb(frame: RgbFrame): Uint8Array {
  const pixels = frame.width * frame.height;
  const out = new Uint8Array(pixels * 3);
  for (let p = 0; p < pixels; p++) {
    out[p * 3] = frame.data[p * 4];
    out[p * 3 + 1] = frame.data[p * 4 + 1];
    out[p * 3 + 2] = frame.data[p * 4 + 2];
  }
  return out;
}

/**
 * Produce the bytes written to the entry encoder for one frame.
 *
 * With `compositeAlpha` the result is RGBA, alpha taken from the mask
 * (opaque where there is none). Without it the result is rgb24: a 3-channel
 * frame is returned as is, a 4-channel frame loses its alpha.
 */
export function compositeFrame(frame: RgbFrame, mask: MaskFrame | undefined, compositeAlpha: boolean): Uint8Array {
  if (compositeAlpha) {
    // a 4-channel frame's own alpha is replaced by the mask
    return toRgba(frame, mask ?? opaqueMask(frame));
  }

  assertFrameShape(frame);
  return frame.channels === 3 ? frame.data : toRgb(frame);
}

function opaqueMask(frame: RgbFrame): MaskFrame {
  return {
    width: frame.width,
    height: frame.height,
    data: new Float32Array(frame.width * frame.height).fill(1),
  };
}
