/**
 * Stream writer
 *
 * Pulls frames from a clip, composites them and writes them, in order, to the
 * entry stage of a running pipeline.
 */

import type { Writable } from 'stream';
import { compositeFrame } from './compositor.js';
import { GifExportError, GifExportErrorCode, invalidConfiguration, streamWriteFailed } from './errors.js';
import { logger } from './logger.js';
import type { Pipeline } from './process-pipeline.js';
import { countFrames, type FrameSource, type ProgressCallback } from './types.js';

export interface StreamFramesOptions {
  fps: number;
  /** Interleave the clip's mask as a fourth channel */
  compositeAlpha: boolean;
  /** Destination file, named in write errors */
  filename: string;
  onProgress?: ProgressCallback;
  /** Extra sentence appended to write errors */
  failureHint?: string;
}

export interface StreamStats {
  framesWritten: number;
  framesTotal: number;
}

/**
 * Write one chunk and wait until the stream has handed it on.
 * A full pipe keeps the promise pending until the encoder reads.
 */
export function writeChunk(sink: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (sink.destroyed || sink.writableEnded) {
      reject(Object.assign(new Error('Cannot write to a closed encoder input'), { code: 'ERR_STREAM_DESTROYED' }));
      return;
    }
    sink.write(chunk, error => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export async function streamFrames(
  source: FrameSource,
  pipeline: Pipeline,
  options: StreamFramesOptions
): Promise<StreamStats> {
  const { fps, compositeAlpha, filename, onProgress, failureHint } = options;
  const sink = pipeline.input;
  if (!sink) {
    throw invalidConfiguration('The first encoder stage does not read frames from a pipe');
  }

  // fixed before the first frame, whatever the source ends up yielding
  const framesTotal = countFrames(source.duration, fps);
  let framesWritten = 0;

  for await (const { t, frame } of source.iterateFrames(fps)) {
    // the encoder was told the clip size; every frame must match it
    if (frame.width !== source.width || frame.height !== source.height) {
      throw new GifExportError(
        `Frame at t=${t} is ${frame.width}x${frame.height}, expected ${source.width}x${source.height}`,
        GifExportErrorCode.FRAME_FORMAT
      );
    }

    const mask = compositeAlpha ? source.getMaskFrame(t) : undefined;
    const bytes = compositeFrame(frame, mask, compositeAlpha);

    try {
      await writeChunk(sink, bytes);
    } catch (error) {
      throw streamWriteFailed(filename, pipeline.inputError ?? error, failureHint);
    }

    framesWritten += 1;
    onProgress?.(framesWritten, framesTotal);
  }

  if (framesWritten !== framesTotal) {
    logger.warn(`Clip yielded ${framesWritten} frames, expected ${framesTotal}`, { filename });
  }

  return { framesWritten, framesTotal };
}
