/**
 * Encoder binary configuration
 *
 * Paths come from per-call overrides first, then the environment, then the
 * program names as found on PATH.
 */

export interface BinaryPaths {
  ffmpeg: string;
  imagemagick: string;
}

export const DEFAULT_BINARIES: BinaryPaths = {
  ffmpeg: 'ffmpeg',
  imagemagick: 'convert',
};

export const BINARY_ENV: Record<keyof BinaryPaths, string> = {
  ffmpeg: 'FFMPEG_BINARY',
  imagemagick: 'IMAGEMAGICK_BINARY',
};

export function resolveBinaries(
  overrides: Partial<BinaryPaths> = {},
  env: NodeJS.ProcessEnv = process.env
): BinaryPaths {
  const pick = (key: keyof BinaryPaths): string => {
    const fromEnv = env[BINARY_ENV[key]];
    return overrides[key] ?? (fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_BINARIES[key]);
  };

  return {
    ffmpeg: pick('ffmpeg'),
    imagemagick: pick('imagemagick'),
  };
}
