/**
 * Process pipeline
 *
 * Launches the stages of an encoding plan as OS processes, chained stdout to
 * stdin, and owns their handles until shutdown.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { invalidConfiguration, isGifExportError, launchFailed, describeCause } from './errors.js';
import { logger } from './logger.js';
import { validatePlan } from './plan.js';
import type { EncoderStageSpec, StageExit } from './types.js';

/**
 * The part of a child process the pipeline relies on.
 * `ChildProcess` satisfies it; tests supply in-process fakes.
 */
export interface StageProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface StageStdio {
  /** `pipe` for the entry stage, the upstream stage's stdout for later ones */
  stdin: 'pipe' | 'ignore' | Readable;
  stdout: 'pipe' | 'ignore';
}

export type StageLauncher = (spec: EncoderStageSpec, stdio: StageStdio) => StageProcess;

export interface RunningStage {
  readonly spec: EncoderStageSpec;
  readonly process: StageProcess;
  /** Settles once when the process exits */
  readonly exited: Promise<StageExit>;
}

export interface Pipeline {
  readonly stages: readonly RunningStage[];
  /** Frame sink: stdin of the first stage */
  readonly input: Writable | null;
  /** stdout of the last stage, only when it pipes its output */
  readonly output: Readable | null;
  /** First error the frame sink reported, e.g. EPIPE */
  inputError: Error | null;
  /** Set by the first shutdown; later shutdowns reuse it */
  teardown: Promise<StageExit[]> | null;
}

export interface StartPipelineOptions {
  launcher?: StageLauncher;
}

/**
 * Default launcher: spawn the program with stderr discarded
 */
export const spawnStage: StageLauncher = (spec, stdio) => {
  const child = spawn(spec.program, [...spec.args], {
    stdio: [stdio.stdin, stdio.stdout, 'ignore'],
    windowsHide: true,
  });

  const upstream = stdio.stdin;
  if (typeof upstream !== 'string') {
    // The child has its own copy of the pipe. Ours must be closed or the
    // upstream stage never sees EPIPE when this one exits.
    child.once('spawn', () => upstream.destroy());
  }

  return child;
};

function watchExit(name: string, proc: StageProcess): Promise<StageExit> {
  return new Promise(resolve => {
    if (proc.exitCode !== null || proc.signalCode !== null) {
      resolve({ name, code: proc.exitCode, signal: proc.signalCode });
      return;
    }
    proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ name, code, signal });
    });
  });
}

function waitForSpawn(proc: StageProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      proc.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      proc.off('spawn', onSpawn);
      reject(error);
    };
    proc.once('spawn', onSpawn);
    proc.once('error', onError);
  });
}

function stdioFor(spec: EncoderStageSpec, previous: RunningStage | undefined): StageStdio {
  const stdout = spec.output === 'pipe' ? 'pipe' : 'ignore';

  if (spec.input === 'none') {
    return { stdin: 'ignore', stdout };
  }
  if (!previous) {
    return { stdin: 'pipe', stdout };
  }
  if (!previous.process.stdout) {
    throw invalidConfiguration(`Stage "${spec.name}" reads from "${previous.spec.name}", which exposes no stdout`);
  }
  return { stdin: previous.process.stdout, stdout };
}

/**
 * Stop stages that were started before a later stage failed to launch,
 * and wait until each one has exited.
 */
export async function terminateStages(stages: readonly RunningStage[]): Promise<StageExit[]> {
  const exits: StageExit[] = [];

  for (const stage of stages) {
    const { process: proc } = stage;
    proc.stdin?.destroy();
    proc.stdout?.destroy();
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill('SIGTERM');
    }
    exits.push(await stage.exited);
  }

  return exits;
}

/**
 * Launch every stage in order. Resolves once all of them are running.
 *
 * If a stage cannot be started, the stages before it are terminated and
 * reaped before the launch error is thrown.
 */
export async function startPipeline(
  stages: readonly EncoderStageSpec[],
  options: StartPipelineOptions = {}
): Promise<Pipeline> {
  validatePlan(stages);

  const launch = options.launcher ?? spawnStage;
  const running: RunningStage[] = [];

  for (const spec of stages) {
    try {
      const stdio = stdioFor(spec, running[running.length - 1]);
      const proc = launch(spec, stdio);
      const exited = watchExit(spec.name, proc);

      await waitForSpawn(proc);

      proc.on('error', (error: Error) => {
        logger.warn(`Encoder stage "${spec.name}" reported an error`, { error: error.message });
      });

      running.push({ spec, process: proc, exited });
      logger.debug('Started encoder stage', { name: spec.name, pid: proc.pid, args: spec.args });
    } catch (error) {
      logger.error(`Encoder stage "${spec.name}" failed to start`, { error: describeCause(error) });
      await terminateStages(running);
      throw isGifExportError(error) ? error : launchFailed(spec.program, error);
    }
  }

  const first = running[0];
  const last = running[running.length - 1];

  const pipeline: Pipeline = {
    stages: running,
    input: first.spec.input === 'pipe' ? first.process.stdin : null,
    output: last.spec.output === 'pipe' ? last.process.stdout : null,
    inputError: null,
    teardown: null,
  };

  pipeline.input?.on('error', (error: Error) => {
    pipeline.inputError ??= error;
    logger.debug('Frame sink error', { error: error.message });
  });

  return pipeline;
}
