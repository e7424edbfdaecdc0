/**
 * gifstream CLI commands
 *
 * `render` exports the test pattern through one of the backends,
 * `inspect` reports what a GIF file contains.
 */

import { Command, InvalidArgumentError } from 'commander';
import cliProgress from 'cli-progress';
import { statSync } from 'fs';
import { readGifInfoFromFile } from './gif-info.js';
import { writeGifWithLibrary } from './library-writer.js';
import { logger } from './logger.js';
import { OptimizeSchema } from './options.js';
import { TestPatternClip } from './test-pattern.js';
import type { ProgressCallback } from './types.js';
import { writeGif } from './write-gif.js';

const BACKENDS = ['ffmpeg', 'imagemagick', 'gifenc'] as const;
type Backend = (typeof BACKENDS)[number];

interface RenderOptions {
  backend: string;
  optimize: string;
  fuzz: string;
  loop: string;
  dispose: boolean;
  colors?: string;
  fps: string;
  duration: string;
  size: string;
  mask: boolean;
  killAfter?: string;
  progress: boolean;
  verbose: boolean;
}

function parseSize(value: string): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(value);
  if (!match) {
    throw new InvalidArgumentError(`Expected WIDTHxHEIGHT, got "${value}"`);
  }
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

function parseBackend(value: string): Backend {
  const backend = BACKENDS.find(b => b === value);
  if (!backend) {
    throw new InvalidArgumentError(`Backend must be one of ${BACKENDS.join(', ')}`);
  }
  return backend;
}

/**
 * Progress bar driven by the export's progress callback
 */
function createProgressReporter(): { onProgress: ProgressCallback; stop: () => void } {
  const bar = new cliProgress.SingleBar({
    format: '   {bar} {percentage}% | {value}/{total} frames | {eta_formatted}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
  });
  let started = false;

  return {
    onProgress: (done, total) => {
      if (!started) {
        bar.start(total, 0);
        started = true;
      }
      bar.update(done);
    },
    stop: () => {
      if (started) bar.stop();
    },
  };
}

async function render(output: string, options: RenderOptions): Promise<void> {
  const backend = parseBackend(options.backend);
  const { width, height } = parseSize(options.size);
  const fps = parseFloat(options.fps);
  const loop = parseInt(options.loop, 10);
  const colors = options.colors !== undefined ? parseInt(options.colors, 10) : undefined;

  const clip = new TestPatternClip({
    width,
    height,
    fps,
    duration: parseFloat(options.duration),
    mask: options.mask,
  });

  if (options.verbose) {
    logger.setLevel('debug');
    logger.enableDebug();
  }

  const reporter = options.progress ? createProgressReporter() : undefined;

  try {
    if (backend === 'gifenc') {
      await writeGifWithLibrary(clip, output, {
        fps,
        loop,
        colors,
        withMask: options.mask,
        verbose: options.verbose,
        onProgress: reporter?.onProgress,
      });
    } else {
      const optimize = OptimizeSchema.safeParse(options.optimize);
      if (!optimize.success) {
        throw new InvalidArgumentError(`Optimization must be one of ${OptimizeSchema.options.join(', ')}`);
      }
      await writeGif(clip, output, {
        fps,
        program: backend,
        optimize: optimize.data,
        fuzz: parseInt(options.fuzz, 10),
        loop,
        dispose: options.dispose,
        colors,
        withMask: options.mask,
        verbose: options.verbose,
        killAfterMs: options.killAfter !== undefined ? parseInt(options.killAfter, 10) : undefined,
        onProgress: reporter?.onProgress,
      });
    }
  } finally {
    reporter?.stop();
  }

  const stats = statSync(output);
  console.log(`Created ${output} (${stats.size} bytes)`);
}

async function inspect(file: string): Promise<void> {
  const info = await readGifInfoFromFile(file);
  const loop = info.loopCount === null ? 'plays once' : info.loopCount === 0 ? 'loops forever' : `loops ${info.loopCount}x`;
  console.log(`${file}: GIF${info.version} ${info.width}x${info.height}, ${info.frameCount} frames, ${loop}`);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('gifstream')
    .description('Stream video frames into animated GIFs through ffmpeg and ImageMagick')
    .version('1.0.0');

  program
    .command('render <output>')
    .description('Render the test pattern to a GIF file')
    .option('-b, --backend <name>', `Encoder backend: ${BACKENDS.join(', ')}`, 'imagemagick')
    .option('--optimize <mode>', 'ImageMagick layer optimization: none, OptimizePlus, OptimizeTransparency', 'OptimizeTransparency')
    .option('--fuzz <percent>', 'Treat colors closer than this as equal', '1')
    .option('-l, --loop <count>', 'Loop count, 0 loops forever', '0')
    .option('--no-dispose', 'Leave each frame in place instead of restoring the background')
    .option('-c, --colors <count>', 'Maximum palette size')
    .option('-f, --fps <num>', 'Frames per second', '10')
    .option('-t, --duration <seconds>', 'Clip duration in seconds', '2')
    .option('-s, --size <WxH>', 'Frame size', '64x48')
    .option('-m, --mask', 'Export with a transparency mask', false)
    .option('--kill-after <ms>', 'Kill encoders still running this long after the last frame')
    .option('-p, --progress', 'Show a progress bar', false)
    .option('-v, --verbose', 'Verbose output', false)
    .action(render);

  program
    .command('inspect <file>')
    .description('Print size, frame count and loop count of a GIF')
    .action(inspect);

  return program;
}
