import { describe, it, expect } from 'vitest';
import { resolveBinaries } from './config.js';

describe('resolveBinaries', () => {
  it('falls back to the program names on PATH', () => {
    expect(resolveBinaries({}, {})).toEqual({ ffmpeg: 'ffmpeg', imagemagick: 'convert' });
  });

  it('reads paths from the environment', () => {
    const env = { FFMPEG_BINARY: '/usr/local/bin/ffmpeg', IMAGEMAGICK_BINARY: '/usr/local/bin/magick' };
    expect(resolveBinaries({}, env)).toEqual({ ffmpeg: '/usr/local/bin/ffmpeg', imagemagick: '/usr/local/bin/magick' });
  });

  it('ignores empty environment values', () => {
    expect(resolveBinaries({}, { FFMPEG_BINARY: '' }).ffmpeg).toBe('ffmpeg');
  });

  it('lets per-call overrides win over the environment', () => {
    const env = { FFMPEG_BINARY: '/env/ffmpeg', IMAGEMAGICK_BINARY: '/env/convert' };
    expect(resolveBinaries({ imagemagick: '/opt/convert' }, env)).toEqual({
      ffmpeg: '/env/ffmpeg',
      imagemagick: '/opt/convert',
    });
  });
});
