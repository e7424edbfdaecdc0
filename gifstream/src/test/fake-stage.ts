/**
 * In-process stand-ins for encoder processes
 *
 * A FakeStageProcess behaves like a spawned encoder as far as the pipeline
 * can tell: it emits `spawn` (or `error`), reads its stdin, writes its stdout
 * once the input ends, and emits `exit`.
 */

import { EventEmitter } from 'events';
import { PassThrough, Writable, type Readable } from 'stream';
import type { StageLauncher, StageProcess, StageStdio } from '../process-pipeline.js';
import type { EncoderStageSpec } from '../types.js';

export interface FakeStageBehavior {
  /** Emit this instead of `spawn` */
  spawnError?: Error;
  /** Throw from the launcher itself */
  throwOnLaunch?: Error;
  /** Reject writes with EPIPE once this many chunks have arrived, then exit 1 */
  failAfterChunks?: number;
  /** Ignore end of input; only a kill ends the process */
  hang?: boolean;
  /** Exit code after a normal end of input */
  exitCode?: number;
  /** Bytes written to stdout from everything read */
  transform?: (input: Buffer) => Buffer;
}

let nextPid = 4000;

export function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

export class FakeStageProcess extends EventEmitter implements StageProcess {
  readonly pid: number;
  readonly stdin: Writable | null;
  readonly stdout: PassThrough | null;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  readonly chunks: Buffer[] = [];
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  exitCount = 0;
  inputEnded = false;

  constructor(
    readonly spec: EncoderStageSpec,
    readonly stdio: StageStdio,
    private readonly behavior: FakeStageBehavior = {}
  ) {
    super();
    this.pid = nextPid++;
    this.stdout = stdio.stdout === 'pipe' ? new PassThrough() : null;
    this.stdin = stdio.stdin === 'pipe' ? this.createInput() : null;

    if (typeof stdio.stdin !== 'string') {
      this.consume(stdio.stdin);
    }

    process.nextTick(() => {
      if (behavior.spawnError) {
        this.emit('error', behavior.spawnError);
        return;
      }
      this.emit('spawn');
      if (stdio.stdin === 'ignore') {
        this.onInputEnd();
      }
    });
  }

  get received(): Buffer {
    return Buffer.concat(this.chunks);
  }

  get running(): boolean {
    return this.exitCode === null && this.signalCode === null;
  }

  private createInput(): Writable {
    return new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        const limit = this.behavior.failAfterChunks;
        if (limit !== undefined && this.chunks.length >= limit) {
          callback(errnoError('EPIPE', 'write EPIPE'));
          setImmediate(() => this.exit(1, null));
          return;
        }
        this.chunks.push(chunk);
        callback();
      },
      final: callback => {
        callback();
        this.onInputEnd();
      },
    });
  }

  private consume(upstream: Readable): void {
    upstream.on('data', (chunk: Buffer) => this.chunks.push(chunk));
    upstream.on('end', () => this.onInputEnd());
  }

  private onInputEnd(): void {
    this.inputEnded = true;
    if (this.behavior.hang || !this.running) return;

    if (this.stdout) {
      const { transform } = this.behavior;
      this.stdout.end(transform ? transform(this.received) : this.received);
    }
    setImmediate(() => this.exit(this.behavior.exitCode ?? 0, null));
  }

  private exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.running) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.exitCount++;
    if (this.stdout && !this.stdout.writableEnded) {
      this.stdout.end();
    }
    this.emit('exit', code, signal);
    this.emit('close', code, signal);
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    if (!this.running) return false;
    const name: NodeJS.Signals = typeof signal === 'string' ? signal : 'SIGTERM';
    setImmediate(() => this.exit(null, name));
    return true;
  }
}

/**
 * Launcher handing out fake stages, with per-stage behavior keyed by stage name
 */
export class FakeLauncher {
  readonly processes: FakeStageProcess[] = [];

  constructor(private readonly behaviors: Record<string, FakeStageBehavior> = {}) {}

  readonly launch: StageLauncher = (spec, stdio) => {
    const behavior = this.behaviors[spec.name] ?? {};
    if (behavior.throwOnLaunch) {
      throw behavior.throwOnLaunch;
    }
    const proc = new FakeStageProcess(spec, stdio, behavior);
    this.processes.push(proc);
    return proc;
  };

  get(name: string): FakeStageProcess {
    const proc = this.processes.find(p => p.spec.name === name);
    if (!proc) {
      throw new Error(`No fake stage named ${name}`);
    }
    return proc;
  }
}
