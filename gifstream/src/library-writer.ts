/**
 * Library GIF export
 *
 * Encodes in-process with gifenc, one frame at a time. No external
 * binaries; the finished GIF is held in memory until it is written out.
 */

import { promises as fs } from 'fs';
import { toRgba } from './compositor.js';
import { GifExportError, GifExportErrorCode, describeCause } from './errors.js';
import { logger } from './logger.js';
import { parseLibraryGifOptions, resolveClipTiming, type LibraryGifOptionsInput } from './options.js';
import { countFrames, type FrameSource, type ProgressCallback } from './types.js';

export type GifencModule = typeof import('gifenc');

export interface WriteGifWithLibraryOptions extends LibraryGifOptionsInput {
  onProgress?: ProgressCallback;
  /** Defaults to importing gifenc */
  loadLibrary?: () => Promise<GifencModule>;
}

export interface LibraryExportResult {
  filename: string;
  framesWritten: number;
  framesTotal: number;
  bytes: number;
}

const importGifenc = (): Promise<GifencModule> => import('gifenc');

async function loadEncoder(load: () => Promise<GifencModule>): Promise<GifencModule> {
  try {
    return await load();
  } catch (error) {
    throw new GifExportError(
      `Writing a GIF without external encoders requires the gifenc package (npm install gifenc): ${describeCause(error)}`,
      GifExportErrorCode.MISSING_DEPENDENCY,
      { cause: error }
    );
  }
}

export async function writeGifWithLibrary(
  clip: FrameSource,
  filename: string,
  options: WriteGifWithLibraryOptions = {}
): Promise<LibraryExportResult> {
  const { onProgress, loadLibrary = importGifenc, ...rest } = options;
  const opts = parseLibraryGifOptions(rest);
  const { fps, duration } = resolveClipTiming(clip, opts.fps);

  const { GIFEncoder, quantize, applyPalette } = await loadEncoder(loadLibrary);

  const withMask = opts.withMask && clip.hasMask;
  // transparency needs a palette format that keeps alpha
  const format = withMask ? 'rgba4444' : opts.format;
  const delay = Math.round(1000 / fps);
  const framesTotal = countFrames(duration, fps);

  if (opts.verbose) {
    logger.info(`Building file ${filename} with gifenc`, { colors: opts.colors, format });
  }

  const encoder = GIFEncoder();
  let framesWritten = 0;

  for await (const { t, frame } of clip.iterateFrames(fps)) {
    const rgba = toRgba(frame, withMask ? clip.getMaskFrame(t) : undefined);
    const palette = quantize(rgba, opts.colors, { format, oneBitAlpha: withMask });
    const index = applyPalette(rgba, palette, format);
    const transparentIndex = withMask ? palette.findIndex(color => color[3] === 0) : -1;

    encoder.writeFrame(index, frame.width, frame.height, {
      palette,
      delay,
      repeat: opts.loop,
      transparent: transparentIndex >= 0,
      transparentIndex: Math.max(transparentIndex, 0),
    });

    framesWritten += 1;
    onProgress?.(framesWritten, framesTotal);
  }

  if (framesWritten !== framesTotal) {
    logger.warn(`Clip yielded ${framesWritten} frames, expected ${framesTotal}`, { filename });
  }

  encoder.finish();
  const bytes = encoder.bytes();
  await fs.writeFile(filename, bytes);

  if (opts.verbose) {
    logger.info(`File ${filename} is ready`, { bytes: bytes.length });
  }

  return { filename, framesWritten, framesTotal, bytes: bytes.length };
}
