import crypto from 'crypto';
import type { Logger } from '../logger.js';
import type { Frame } from '../camera/camera.types.js';
import { EncodeError } from '../camera/errors.js';
import type { FrameBuffer } from './frame_buffer.js';
import type { JpegEncoder } from './jpeg.js';
import { BOUNDARY, formatPart } from './multipart.js';
import type { StreamSink } from './sink.js';

export type PublisherOptions = {
  fps: number;
  logger: Logger;
  boundary?: string;
};

export type ServeOptions = {
  signal?: AbortSignal;
  remoteAddress?: string;
};

export type SessionInfo = {
  id: string;
  remoteAddress?: string;
  startedAt: number;
  partsSent: number;
  bytesSent: number;
  framesDropped: number;
  placeholdersSent: number;
  lastSeq: number | null;
};

export type SessionSummary = {
  id: string;
  partsSent: number;
  bytesSent: number;
  framesDropped: number;
  durationMs: number;
};

type ActiveSession = {
  info: SessionInfo;
  controller: AbortController;
};

type SessionFrames = {
  lastJpeg: Buffer | null;
  lastBadFrame: Frame | null;
};

/**
 * Turns the frame buffer into one MJPEG part stream per client. Each
 * `serve` call is an independent loop that ends when a write fails or the
 * session is aborted.
 */
export class StreamPublisher {
  private readonly buffer: FrameBuffer;
  private readonly encoder: JpegEncoder;
  private readonly logger: Logger;
  private readonly boundary: string;
  readonly intervalMs: number;
  private readonly active = new Map<string, ActiveSession>();

  constructor(buffer: FrameBuffer, encoder: JpegEncoder, options: PublisherOptions) {
    if (!(options.fps > 0)) {
      throw new RangeError(`Stream fps must be positive, got ${options.fps}`);
    }
    this.buffer = buffer;
    this.encoder = encoder;
    this.logger = options.logger;
    this.boundary = options.boundary ?? BOUNDARY;
    this.intervalMs = 1000 / options.fps;
  }

  async serve(sink: StreamSink, options: ServeOptions = {}): Promise<SessionSummary> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const info: SessionInfo = {
      id: crypto.randomUUID(),
      remoteAddress: options.remoteAddress,
      startedAt: Date.now(),
      partsSent: 0,
      bytesSent: 0,
      framesDropped: 0,
      placeholdersSent: 0,
      lastSeq: null
    };
    const frames: SessionFrames = { lastJpeg: null, lastBadFrame: null };
    this.active.set(info.id, { info, controller });
    this.logger.info({ session: info.id, remoteAddress: info.remoteAddress }, 'stream client connected');

    try {
      while (!controller.signal.aborted) {
        const iterationStart = Date.now();
        const jpeg = this.nextJpeg(info, frames);

        if (jpeg) {
          const part = formatPart(jpeg, this.boundary);
          try {
            await sink.write(part);
          } catch (error) {
            this.logger.debug({ session: info.id, err: error }, 'stream write failed');
            break;
          }
          info.partsSent += 1;
          info.bytesSent += part.length;
        }

        const elapsed = Date.now() - iterationStart;
        await sleep(Math.max(0, this.intervalMs - elapsed), controller.signal);
      }
    } finally {
      this.active.delete(info.id);
      options.signal?.removeEventListener('abort', onAbort);
    }

    const summary: SessionSummary = {
      id: info.id,
      partsSent: info.partsSent,
      bytesSent: info.bytesSent,
      framesDropped: info.framesDropped,
      durationMs: Date.now() - info.startedAt
    };
    this.logger.info(summary, 'stream client disconnected');
    return summary;
  }

  sessions(): SessionInfo[] {
    return Array.from(this.active.values(), ({ info }) => ({ ...info }));
  }

  get clientCount(): number {
    return this.active.size;
  }

  shutdown(): void {
    for (const { controller } of this.active.values()) {
      controller.abort();
    }
  }

  /**
   * Picks the bytes for the next part. A frame that fails to encode is
   * counted and logged once per session; the last good JPEG is sent in its
   * place until a new frame arrives.
   */
  private nextJpeg(info: SessionInfo, frames: SessionFrames): Buffer | null {
    const frame = this.buffer.readLatest();
    if (frame && frame === frames.lastBadFrame) {
      return frames.lastJpeg;
    }
    try {
      if (!frame) {
        const placeholder = this.encoder.placeholder();
        info.placeholdersSent += 1;
        return placeholder;
      }
      const jpeg = this.encoder.encode(frame);
      info.lastSeq = frame.seq;
      frames.lastJpeg = jpeg;
      return jpeg;
    } catch (error) {
      info.framesDropped += 1;
      frames.lastBadFrame = frame;
      if (error instanceof EncodeError) {
        this.logger.warn({ session: info.id, seq: frame?.seq, err: error }, 'frame dropped');
      } else {
        this.logger.error({ session: info.id, seq: frame?.seq, err: error }, 'unexpected encoder failure');
      }
      return frames.lastJpeg;
    }
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
