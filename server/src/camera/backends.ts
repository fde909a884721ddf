import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { CameraBackend } from './camera.types.js';
import { MockBackend } from './backend_mock.js';
import { RpicamBackend } from './backend_rpicam.js';
import { V4l2Backend } from './backend_v4l2.js';
import type { SpawnCapture } from './process_backend.js';

export function createBackend(config: AppConfig, logger: Logger, spawnProcess?: SpawnCapture): CameraBackend {
  const common = {
    logger,
    openTimeoutMs: config.openTimeoutMs,
    captureTimeoutMs: config.captureTimeoutMs,
    spawnProcess
  };

  switch (config.backend) {
    case 'rpicam':
      return new RpicamBackend({ ...common, command: config.rpicamPath, quality: config.jpegQuality });
    case 'v4l2':
      return new V4l2Backend({ ...common, ffmpegPath: config.ffmpegPath });
    case 'mock':
      return new MockBackend({ pattern: config.mockPattern });
  }
}
