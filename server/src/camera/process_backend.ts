import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { Logger } from '../logger.js';
import type { BackendName, CameraBackend, CaptureConfig, Frame } from './camera.types.js';
import { CaptureError, DeviceUnavailableError } from './errors.js';

export interface CaptureProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess;

export const spawnCapture: SpawnCapture = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export type ProcessBackendOptions = {
  logger: Logger;
  openTimeoutMs?: number;
  captureTimeoutMs?: number;
  killTimeoutMs?: number;
  spawnProcess?: SpawnCapture;
};

interface FrameSplitter {
  push(chunk: Buffer): Buffer[];
}

/**
 * Base for backends that read frames from a long-running capture command's
 * stdout. The newest complete frame is kept; `read` hands out each frame at
 * most once and waits for the next one otherwise.
 */
export abstract class ProcessBackend extends EventEmitter implements CameraBackend {
  abstract readonly name: BackendName;

  protected readonly logger: Logger;
  private readonly openTimeoutMs: number;
  private readonly captureTimeoutMs: number;
  private readonly killTimeoutMs: number;
  private readonly spawnProcess: SpawnCapture;

  private proc: CaptureProcess | null = null;
  private latest: Frame | null = null;
  private lastReturnedSeq = 0;
  private seq = 0;
  private exited = false;
  private closing = false;

  constructor(options: ProcessBackendOptions) {
    super();
    this.logger = options.logger;
    this.openTimeoutMs = options.openTimeoutMs ?? 5000;
    this.captureTimeoutMs = options.captureTimeoutMs ?? 2000;
    this.killTimeoutMs = options.killTimeoutMs ?? 2000;
    this.spawnProcess = options.spawnProcess ?? spawnCapture;
  }

  protected abstract buildCommand(config: CaptureConfig): [string, ...string[]];
  protected abstract createSplitter(config: CaptureConfig): FrameSplitter;
  protected abstract toFrame(data: Buffer, seq: number, config: CaptureConfig): Frame;

  async open(config: CaptureConfig): Promise<void> {
    if (this.proc) return;
    const [command, ...args] = this.buildCommand(config);
    const splitter = this.createSplitter(config);

    let proc: CaptureProcess;
    try {
      proc = this.spawnProcess(command, args);
    } catch (error) {
      throw new DeviceUnavailableError(`Failed to spawn ${command}`, { cause: error });
    }
    this.proc = proc;
    this.exited = false;
    this.closing = false;
    this.logger.info({ command, args }, 'capture process started');

    proc.stdout.on('data', (chunk: Buffer) => {
      for (const data of splitter.push(chunk)) {
        this.seq += 1;
        this.latest = Object.freeze(this.toFrame(data, this.seq, config));
        this.emit('frame', this.latest);
      }
    });

    proc.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf8').trim();
      if (text) {
        this.logger.warn({ stderr: text }, `${command} reported`);
      }
    });

    proc.on('error', (error) => {
      this.logger.error({ err: error }, 'capture process error');
      this.markExited(null, null);
    });

    proc.on('exit', (code, signal) => {
      if (!this.closing) {
        this.logger.error({ code, signal }, 'capture process exited');
      }
      this.markExited(code, signal);
    });

    try {
      await this.waitForFrame(this.openTimeoutMs);
    } catch (error) {
      await this.close();
      throw new DeviceUnavailableError(
        `${this.name} camera did not produce a frame (${error instanceof Error ? error.message : String(error)})`,
        { cause: error }
      );
    }
  }

  async read(): Promise<Frame> {
    if (!this.proc) {
      throw new CaptureError(`${this.name} backend is not open`);
    }
    if (this.latest && this.latest.seq > this.lastReturnedSeq) {
      return this.take(this.latest);
    }
    if (this.exited) {
      throw new CaptureError(`${this.name} capture process has exited`);
    }
    try {
      return this.take(await this.waitForFrame(this.captureTimeoutMs));
    } catch (error) {
      throw new CaptureError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.proc = null;
    this.closing = true;
    this.latest = null;

    if (!this.exited) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.off('exit', onExit);
          proc.kill('SIGKILL');
          resolve();
        }, this.killTimeoutMs);
        const onExit = () => {
          clearTimeout(timer);
          resolve();
        };
        this.once('exit', onExit);
        proc.kill('SIGTERM');
      });
    }
    this.logger.info('capture process stopped');
  }

  private take(frame: Frame): Frame {
    this.lastReturnedSeq = frame.seq;
    return frame;
  }

  private markExited(code: number | null, signal: NodeJS.Signals | null) {
    if (this.exited) return;
    this.exited = true;
    this.emit('exit', code, signal);
  }

  private waitForFrame(timeoutMs: number): Promise<Frame> {
    if (this.exited) {
      return Promise.reject(new Error('process_exited'));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error('capture_timeout'));
      }, timeoutMs);

      const onFrame = (frame: Frame) => {
        cleanup();
        resolve(frame);
      };

      const onExit = () => {
        cleanup();
        reject(new Error('process_exited'));
      };

      const cleanup = () => {
        clearTimeout(timer);
        this.off('frame', onFrame);
        this.off('exit', onExit);
      };

      this.on('frame', onFrame);
      this.on('exit', onExit);
    });
  }
}
