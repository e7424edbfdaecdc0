/**
 * Core types for gifstream
 */

/**
 * One video frame: interleaved 8-bit samples, row-major, no row padding.
 * `data.length` is `width * height * channels`.
 */
export interface RgbFrame {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Uint8Array;
}

/**
 * Per-pixel opacity, 0 (transparent) to 1 (opaque)
 */
export interface MaskFrame {
  width: number;
  height: number;
  data: ArrayLike<number>;
}

export interface TimedFrame {
  t: number;     // seconds from clip start
  frame: RgbFrame;
}

/**
 * Anything that can produce frames for export.
 *
 * `iterateFrames` must be lazy: a frame is only rendered when the export
 * loop asks for it.
 */
export interface FrameSource {
  readonly duration: number;
  readonly fps?: number;
  readonly width: number;
  readonly height: number;
  readonly hasMask: boolean;

  iterateFrames(fps: number): Iterable<TimedFrame> | AsyncIterable<TimedFrame>;
  getMaskFrame(t: number): MaskFrame | undefined;
}

export type ProgressCallback = (framesDone: number, framesTotal: number) => void;

/** Where an encoder stage reads from */
export type StageInput = 'none' | 'pipe';

/** Where an encoder stage writes to; `file` means the program writes the destination itself */
export type StageOutput = 'none' | 'pipe' | 'file';

/**
 * Declarative description of one encoder invocation
 */
export interface EncoderStageSpec {
  readonly name: string;
  readonly program: string;
  readonly args: readonly string[];
  readonly input: StageInput;
  readonly output: StageOutput;
}

export interface StageExit {
  name: string;
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Number of frames an export of `duration` seconds at `fps` produces
 */
export function countFrames(duration: number, fps: number): number {
  return Math.floor(duration * fps) + 1;
}
