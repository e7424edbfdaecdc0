/**
 * Piped GIF export
 *
 * Streams a clip through ffmpeg (and optionally ImageMagick) without holding
 * the animation in memory or writing intermediate files.
 */

import { resolveBinaries } from './config.js';
import { logger } from './logger.js';
import { parseGifOptions, resolveClipTiming, type GifOptionsInput, type Program } from './options.js';
import { buildEncodingPlan } from './plan.js';
import { startPipeline, type StageLauncher } from './process-pipeline.js';
import { finishPipeline } from './shutdown.js';
import { streamFrames, type StreamStats } from './stream-writer.js';
import type { EncoderStageSpec, FrameSource, ProgressCallback, StageExit } from './types.js';

export interface WriteGifOptions extends GifOptionsInput {
  onProgress?: ProgressCallback;
  /** Replaces process spawning, mainly for tests */
  launcher?: StageLauncher;
  /** SIGKILL stages that have not exited this long after their input closed */
  killAfterMs?: number;
}

export interface GifExportResult extends StreamStats {
  filename: string;
  stages: EncoderStageSpec[];
  exits: StageExit[];
}

const IMAGEMAGICK_HINT =
  'This can happen when ImageMagick is not installed, or when IMAGEMAGICK_BINARY does not point at its convert binary.';

function failureHint(program: Program): string | undefined {
  return program === 'imagemagick' ? IMAGEMAGICK_HINT : undefined;
}

/**
 * Export `clip` as an animated GIF at `filename`, overwriting it.
 *
 * Encoder processes are always reaped before this resolves or rejects.
 * A failed export may leave a partial file behind.
 */
export async function writeGif(
  clip: FrameSource,
  filename: string,
  options: WriteGifOptions = {}
): Promise<GifExportResult> {
  const { onProgress, launcher, killAfterMs, ...rest } = options;
  const opts = parseGifOptions(rest);
  const { fps } = resolveClipTiming(clip, opts.fps);
  const withMask = opts.withMask && clip.hasMask;

  if (opts.program === 'ffmpeg' && (opts.optimize !== 'none' || opts.colors !== undefined)) {
    logger.debug('Optimization options only apply to the imagemagick program; ignoring them');
  }

  const stages = buildEncodingPlan({
    program: opts.program,
    optimize: opts.optimize,
    loop: opts.loop,
    dispose: opts.dispose,
    fuzz: opts.fuzz,
    colors: opts.colors,
    fps,
    width: clip.width,
    height: clip.height,
    withMask,
    filename,
    binaries: resolveBinaries(opts.binaries),
  });

  if (opts.verbose) {
    logger.info(`Building file ${filename}`, { stages: stages.map(s => s.name) });
    logger.info('Generating GIF frames...');
  }

  const pipeline = await startPipeline(stages, { launcher });

  let stats: StreamStats;
  let exits: StageExit[];
  try {
    stats = await streamFrames(clip, pipeline, {
      fps,
      compositeAlpha: withMask,
      filename,
      onProgress,
      failureHint: failureHint(opts.program),
    });
  } finally {
    if (opts.verbose && opts.program === 'imagemagick') {
      logger.info('Optimizing the GIF with ImageMagick...');
    }
    exits = await finishPipeline(pipeline, { killAfterMs });
  }

  if (opts.verbose) {
    logger.info(`File ${filename} is ready`);
  }

  return { filename, stages, exits, ...stats };
}
