import type { AppConfig } from '../config.js';
import type { FrameSource } from '../camera/frame_source.js';
import type { StreamPublisher } from '../stream/publisher.js';
import type { StreamStatus } from '../ws/schemas.js';

export type StatusDeps = {
  config: AppConfig;
  source: FrameSource;
  publisher: StreamPublisher;
};

export type HttpStatus = {
  status: 'ok';
  camera: 'active' | 'unavailable' | 'stopped' | 'idle';
  resolution: string;
  backend: string;
  fps: number;
  clients: number;
  framesCaptured: number;
  captureErrors: number;
};

export function describeStatus({ config, source, publisher }: StatusDeps): HttpStatus {
  const stats = source.stats();
  return {
    status: 'ok',
    camera: stats.state === 'running' ? 'active' : stats.state,
    resolution: `${config.capture.width}x${config.capture.height}`,
    backend: stats.backend,
    fps: config.capture.fps,
    clients: publisher.clientCount,
    framesCaptured: stats.framesCaptured,
    captureErrors: stats.captureErrors
  };
}

export function describeStreamStatus({ config, source, publisher }: StatusDeps): StreamStatus {
  const stats = source.stats();
  return {
    type: 'stream_status',
    camera: stats.state,
    backend: stats.backend,
    resolution: `${config.capture.width}x${config.capture.height}`,
    captureFps: config.capture.fps,
    streamFps: config.streamFps,
    measuredFps: stats.measuredFps,
    framesCaptured: stats.framesCaptured,
    captureErrors: stats.captureErrors,
    clients: publisher.clientCount,
    lastFrameAt: stats.lastFrameAt,
    ts_ms: Date.now()
  };
}
