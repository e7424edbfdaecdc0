/**
 * Export option schemas
 *
 * Validates caller options before any encoder is launched.
 */

import { z } from 'zod';
import { invalidConfiguration } from './errors.js';
import type { FrameSource } from './types.js';

/**
 * Which program drives the piped export.
 * `ffmpeg` encodes the GIF in a single stage; `imagemagick` uses ffmpeg to
 * decode raw frames into bitmaps and ImageMagick to assemble the GIF.
 */
export const ProgramSchema = z.enum(['ffmpeg', 'imagemagick']);

export type Program = z.infer<typeof ProgramSchema>;

/**
 * ImageMagick `-layers` modes offered for the final optimization pass
 */
export const OptimizeSchema = z.enum(['none', 'OptimizePlus', 'OptimizeTransparency']);

export type Optimize = z.infer<typeof OptimizeSchema>;

export const BinaryOverridesSchema = z.object({
  ffmpeg: z.string().min(1).optional(),
  imagemagick: z.string().min(1).optional(),
});

const fpsSchema = z.number().finite().positive();

/**
 * Options for the piped encoder export
 */
export const GifOptionsSchema = z.object({
  fps: fpsSchema.optional(),
  program: ProgramSchema.default('imagemagick'),
  optimize: OptimizeSchema.default('OptimizeTransparency'),
  fuzz: z.number().int().min(0).max(100).default(1),
  loop: z.number().int().min(0).max(65535).default(0),
  dispose: z.boolean().default(true),
  colors: z.number().int().min(2).max(256).optional(),
  withMask: z.boolean().default(true),
  verbose: z.boolean().default(false),
  binaries: BinaryOverridesSchema.default({}),
});

export type GifOptionsInput = z.input<typeof GifOptionsSchema>;
export type GifOptions = z.output<typeof GifOptionsSchema>;

/**
 * gifenc palette formats. rgba4444 keeps one bit of alpha.
 */
export const QuantizeFormatSchema = z.enum(['rgb565', 'rgb444', 'rgba4444']);

export type QuantizeFormat = z.infer<typeof QuantizeFormatSchema>;

/**
 * Options for the single-call library export
 */
export const LibraryGifOptionsSchema = z.object({
  fps: fpsSchema.optional(),
  loop: z.number().int().min(0).max(65535).default(0),
  colors: z.number().int().min(2).max(256).default(256),
  format: QuantizeFormatSchema.default('rgb565'),
  withMask: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export type LibraryGifOptionsInput = z.input<typeof LibraryGifOptionsSchema>;
export type LibraryGifOptions = z.output<typeof LibraryGifOptionsSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export function parseGifOptions(input: GifOptionsInput): GifOptions {
  const result = GifOptionsSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfiguration(`Invalid GIF export options: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

export function parseLibraryGifOptions(input: LibraryGifOptionsInput): LibraryGifOptions {
  const result = LibraryGifOptionsSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfiguration(`Invalid GIF export options: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Check that a clip can be exported and pick the frame rate.
 * An explicit `fps` wins over the clip's own.
 */
export function resolveClipTiming(clip: FrameSource, fps: number | undefined): { fps: number; duration: number } {
  const rate = fps ?? clip.fps;
  if (rate === undefined || !Number.isFinite(rate) || rate <= 0) {
    throw invalidConfiguration('No frame rate: pass `fps` or export a clip that defines one');
  }
  if (!Number.isFinite(clip.duration) || clip.duration < 0) {
    throw invalidConfiguration(`Clip duration must be a finite number of seconds, got ${clip.duration}`);
  }
  if (!Number.isInteger(clip.width) || !Number.isInteger(clip.height) || clip.width <= 0 || clip.height <= 0) {
    throw invalidConfiguration(`Clip size must be positive integers, got ${clip.width}x${clip.height}`);
  }
  return { fps: rate, duration: clip.duration };
}
