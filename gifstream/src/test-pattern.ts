/**
 * Test pattern clip
 *
 * A synthetic clip for trying out encoders: a red/green gradient with a white
 * bar sweeping left to right over the clip's duration. With `mask` enabled the
 * bar is opaque and the background half transparent.
 */

import { countFrames, type FrameSource, type MaskFrame, type RgbFrame, type TimedFrame } from './types.js';

export interface TestPatternConfig {
  width: number;
  height: number;
  duration: number;   // seconds
  fps: number;
  barWidth: number;   // pixels
  mask: boolean;
}

const DEFAULT_CONFIG: TestPatternConfig = {
  width: 64,
  height: 48,
  duration: 2,
  fps: 10,
  barWidth: 8,
  mask: false,
};

const BACKGROUND_OPACITY = 0.5;

const ramp = (position: number, size: number): number =>
  size > 1 ? Math.round((255 * position) / (size - 1)) : 0;

export class TestPatternClip implements FrameSource {
  private config: TestPatternConfig;

  constructor(config: Partial<TestPatternConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get width(): number {
    return this.config.width;
  }

  get height(): number {
    return this.config.height;
  }

  get duration(): number {
    return this.config.duration;
  }

  get fps(): number {
    return this.config.fps;
  }

  get hasMask(): boolean {
    return this.config.mask;
  }

  /**
   * Left edge of the bar at time `t`
   */
  barPosition(t: number): number {
    const { width, barWidth, duration } = this.config;
    const travel = Math.max(0, width - barWidth);
    if (duration <= 0) return 0;
    const progress = Math.min(1, Math.max(0, t / duration));
    return Math.floor(progress * travel);
  }

  getFrame(t: number): RgbFrame {
    const { width, height, barWidth } = this.config;
    const data = new Uint8Array(width * height * 3);
    const barX = this.barPosition(t);

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const idx = (y * width + x) * 3;
        if (x >= barX && x < barX + barWidth) {
          data[idx] = 255;
          data[idx + 1] = 255;
          data[idx + 2] = 255;
        } else {
          data[idx] = ramp(x, width);
          data[idx + 1] = ramp(y, height);
          data[idx + 2] = 0;
        }
      }
    }

    return { width, height, channels: 3, data };
  }

  getMaskFrame(t: number): MaskFrame | undefined {
    if (!this.config.mask) return undefined;

    const { width, height, barWidth } = this.config;
    const data = new Float32Array(width * height).fill(BACKGROUND_OPACITY);
    const barX = this.barPosition(t);

    for (let y = 0; y < height; y++) {
      for (let x = barX; x < Math.min(width, barX + barWidth); x++) {
        data[y * width + x] = 1;
      }
    }

    return { width, height, data };
  }

  *iterateFrames(fps: number): Generator<TimedFrame> {
    const total = countFrames(this.config.duration, fps);
    for (let i = 0; i < total; i++) {
      const t = i / fps;
      yield { t, frame: this.getFrame(t) };
    }
  }
}
