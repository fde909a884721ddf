import { EventEmitter } from 'events';
import type { Logger } from '../logger.js';
import type { FrameBuffer } from '../stream/frame_buffer.js';
import type { CameraBackend, CaptureConfig, Frame, SourceState, SourceStats } from './camera.types.js';
import { CaptureError, DeviceUnavailableError } from './errors.js';

export type FrameSourceOptions = {
  logger: Logger;
  captureRetryMs?: number;
};

const FPS_WINDOW = 30;

/**
 * Owns one camera backend and runs the acquisition loop that feeds the
 * frame buffer. Emits `state` whenever the source state changes.
 */
export class FrameSource extends EventEmitter {
  private readonly backend: CameraBackend;
  private readonly buffer: FrameBuffer;
  private readonly logger: Logger;
  private readonly captureRetryMs: number;

  private state: SourceState = 'idle';
  private running = false;
  private deviceOpen = false;
  private timer: NodeJS.Timeout | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  private framesCaptured = 0;
  private captureErrors = 0;
  private lastFrameAt: number | null = null;
  private recent: number[] = [];

  constructor(backend: CameraBackend, buffer: FrameBuffer, options: FrameSourceOptions) {
    super();
    this.backend = backend;
    this.buffer = buffer;
    this.logger = options.logger;
    this.captureRetryMs = options.captureRetryMs ?? 100;
  }

  /** Opens the device and starts the loop. Overlapping calls share one attempt. */
  start(config: CaptureConfig): Promise<void> {
    if (this.state === 'running') return Promise.resolve();
    this.starting ??= this.launch(config).finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async launch(config: CaptureConfig): Promise<void> {
    if (this.state === 'stopped') {
      throw new Error('Frame source has been stopped');
    }

    try {
      await this.backend.open(config);
    } catch (error) {
      const unavailable = error instanceof DeviceUnavailableError
        ? error
        : new DeviceUnavailableError(`Failed to open ${this.backend.name} camera`, { cause: error });
      this.logger.error({ err: unavailable, backend: this.backend.name }, 'camera unavailable');
      this.setState('unavailable');
      throw unavailable;
    }
    this.deviceOpen = true;

    if (this.stopping) {
      // stop() was called while the device was opening
      await this.closeDevice();
      return;
    }

    const interval = 1000 / config.fps;
    this.running = true;
    this.setState('running');
    this.logger.info(
      { backend: this.backend.name, width: config.width, height: config.height, fps: config.fps },
      'camera started'
    );
    this.schedule(interval, 0);
  }

  async captureOnce(): Promise<Frame> {
    try {
      return await this.backend.read();
    } catch (error) {
      throw error instanceof CaptureError
        ? error
        : new CaptureError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  getState(): SourceState {
    return this.state;
  }

  stats(): SourceStats {
    return {
      state: this.state,
      backend: this.backend.name,
      framesCaptured: this.framesCaptured,
      captureErrors: this.captureErrors,
      lastFrameAt: this.lastFrameAt,
      measuredFps: this.measuredFps()
    };
  }

  private schedule(interval: number, delay: number) {
    this.timer = setTimeout(() => {
      void this.tick(interval);
    }, delay);
  }

  private async tick(interval: number): Promise<void> {
    this.timer = null;
    if (!this.running) return;
    const startedAt = Date.now();
    let delay: number;

    try {
      const frame = await this.captureOnce();
      if (!this.running) return;
      this.buffer.publish(frame);
      this.recordFrame(frame.capturedAt);
      delay = Math.max(0, interval - (Date.now() - startedAt));
    } catch (error) {
      if (!this.running) return;
      this.captureErrors += 1;
      this.logger.warn({ err: error }, 'frame capture failed');
      delay = this.captureRetryMs;
    }

    this.schedule(interval, delay);
  }

  private async shutdown(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.setState('stopped');
    await this.closeDevice();
  }

  private async closeDevice(): Promise<void> {
    if (!this.deviceOpen) return;
    this.deviceOpen = false;
    try {
      await this.backend.close();
      this.logger.info({ backend: this.backend.name }, 'camera released');
    } catch (error) {
      this.logger.error({ err: error, backend: this.backend.name }, 'camera release failed');
    }
  }

  private recordFrame(capturedAt: number) {
    this.framesCaptured += 1;
    this.lastFrameAt = capturedAt;
    this.recent.push(capturedAt);
    if (this.recent.length > FPS_WINDOW) {
      this.recent.shift();
    }
  }

  private measuredFps(): number {
    if (this.recent.length < 2) return 0;
    const span = this.recent[this.recent.length - 1] - this.recent[0];
    if (span <= 0) return 0;
    return Number((((this.recent.length - 1) * 1000) / span).toFixed(1));
  }

  private setState(state: SourceState) {
    if (this.state === state) return;
    this.state = state;
    this.emit('state', state);
  }
}
