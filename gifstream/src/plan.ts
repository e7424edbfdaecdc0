/**
 * Encoding plan builder
 *
 * Assembles the encoder invocations for an export as data. Nothing here
 * touches the filesystem or starts a process.
 *
 *   ffmpeg:                  frames -ffmpeg-> gif
 *   imagemagick, no opt:     frames -ffmpeg-> bmp stream -convert-> gif
 *   imagemagick, opt:        frames -ffmpeg-> bmp stream -convert-> gif -convert-> optimized gif
 */

import type { BinaryPaths } from './config.js';
import { invalidConfiguration } from './errors.js';
import type { Optimize, Program } from './options.js';
import type { EncoderStageSpec } from './types.js';

export interface EncodingPlanRequest {
  program: Program;
  optimize: Optimize;
  loop: number;
  dispose: boolean;
  fuzz: number;
  colors?: number;
  fps: number;
  width: number;
  height: number;
  withMask: boolean;
  filename: string;
  binaries: BinaryPaths;
}

/** GIF frame delays are counted in hundredths of a second */
export function gifDelay(fps: number): number {
  return Math.round(100 / fps);
}

/** ImageMagick disposal codes: 2 restores to background, 1 leaves the frame in place */
export function disposalCode(dispose: boolean): number {
  return dispose ? 2 : 1;
}

function stage(spec: EncoderStageSpec): EncoderStageSpec {
  return Object.freeze({ ...spec, args: Object.freeze([...spec.args]) });
}

/**
 * ffmpeg arguments that read raw frames from stdin
 */
function rawInputArgs(request: EncodingPlanRequest): string[] {
  return [
    '-y',
    '-loglevel', 'error',
    '-f', 'rawvideo',
    '-vcodec', 'rawvideo',
    '-r', request.fps.toFixed(2),
    '-s', `${request.width}x${request.height}`,
    '-pix_fmt', request.withMask ? 'rgba' : 'rgb24',
    '-i', '-',
  ];
}

export function buildEncodingPlan(request: EncodingPlanRequest): EncoderStageSpec[] {
  const { binaries, filename } = request;

  if (request.program === 'ffmpeg') {
    return [
      stage({
        name: 'ffmpeg-gif',
        program: binaries.ffmpeg,
        args: [
          ...rawInputArgs(request),
          '-r', request.fps.toFixed(2),
          '-loop', String(request.loop),
          filename,
        ],
        input: 'pipe',
        output: 'file',
      }),
    ];
  }

  const optimized = request.optimize !== 'none';

  const decode = stage({
    name: 'ffmpeg-bmp',
    program: binaries.ffmpeg,
    args: [...rawInputArgs(request), '-f', 'image2pipe', '-vcodec', 'bmp', '-'],
    input: 'pipe',
    output: 'pipe',
  });

  const assemble = stage({
    name: 'convert-gif',
    program: binaries.imagemagick,
    args: [
      '-delay', String(gifDelay(request.fps)),
      '-dispose', String(disposalCode(request.dispose)),
      '-loop', String(request.loop),
      '-',
      '-coalesce',
      optimized ? 'gif:-' : filename,
    ],
    input: 'pipe',
    output: optimized ? 'pipe' : 'file',
  });

  if (!optimized) {
    return [decode, assemble];
  }

  const optimize = stage({
    name: 'convert-optimize',
    program: binaries.imagemagick,
    args: [
      '-',
      '-layers', request.optimize,
      '-fuzz', `${request.fuzz}%`,
      ...(request.colors !== undefined ? ['-colors', String(request.colors)] : []),
      filename,
    ],
    input: 'pipe',
    output: 'file',
  });

  return [decode, assemble, optimize];
}

/**
 * Check that stages chain: a stage pipes its output exactly when the next
 * stage reads a pipe, and only the last stage writes a file.
 */
export function validatePlan(stages: readonly EncoderStageSpec[]): void {
  if (stages.length === 0) {
    throw invalidConfiguration('An encoding plan needs at least one stage');
  }

  stages.forEach((current, i) => {
    const next = stages[i + 1];
    if (next === undefined) return;

    if (current.output === 'file') {
      throw invalidConfiguration(`Only the last stage may write the destination file, not "${current.name}"`);
    }
    if ((current.output === 'pipe') !== (next.input === 'pipe')) {
      throw invalidConfiguration(
        `Stage "${current.name}" output (${current.output}) does not match stage "${next.name}" input (${next.input})`
      );
    }
  });
}
