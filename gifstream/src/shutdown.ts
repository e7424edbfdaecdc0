/**
 * Pipeline shutdown
 *
 * Closes the frame sink and reaps every stage, first to last. Runs on the
 * success path and on the failure path alike.
 */

import { logger } from './logger.js';
import type { Pipeline, RunningStage } from './process-pipeline.js';
import type { StageExit } from './types.js';

export interface FinishPipelineOptions {
  /** SIGKILL a stage still running this long after shutdown reached it */
  killAfterMs?: number;
}

async function reap(stage: RunningStage, killAfterMs: number | undefined): Promise<StageExit> {
  if (killAfterMs === undefined) {
    return stage.exited;
  }

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<'timeout'>(resolve => {
    timer = setTimeout(() => resolve('timeout'), killAfterMs);
  });

  const result = await Promise.race([stage.exited, timedOut]);
  clearTimeout(timer);

  if (result !== 'timeout') {
    return result;
  }

  logger.warn(`Encoder stage "${stage.spec.name}" still running after ${killAfterMs} ms, killing it`);
  stage.process.kill('SIGKILL');
  return stage.exited;
}

async function teardown(pipeline: Pipeline, options: FinishPipelineOptions): Promise<StageExit[]> {
  const { input } = pipeline;
  if (input && !input.destroyed && !input.writableEnded) {
    input.end();
  }

  const exits: StageExit[] = [];
  for (const stage of pipeline.stages) {
    exits.push(await reap(stage, options.killAfterMs));
  }

  for (const exit of exits) {
    if (exit.code !== 0) {
      logger.warn(`Encoder stage "${exit.name}" ended abnormally`, { code: exit.code, signal: exit.signal });
    }
  }

  return exits;
}

/**
 * Close the entry stream and wait for every stage to exit.
 * Calling it again returns the first call's result.
 */
export function finishPipeline(pipeline: Pipeline, options: FinishPipelineOptions = {}): Promise<StageExit[]> {
  if (!pipeline.teardown) {
    pipeline.teardown = teardown(pipeline, options);
  }
  return pipeline.teardown;
}
