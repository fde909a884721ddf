import type { CaptureConfig, Frame } from './camera.types.js';
import { JpegFrameSplitter } from './frame_parsers.js';
import { ProcessBackend, type ProcessBackendOptions } from './process_backend.js';

export type RpicamBackendOptions = ProcessBackendOptions & {
  command?: string;
  quality?: number;
};

/**
 * Raspberry Pi camera module via `rpicam-vid` (`libcamera-vid` on older
 * images), which hands us ready-made JPEGs so no encode is needed later.
 */
export class RpicamBackend extends ProcessBackend {
  readonly name = 'rpicam' as const;
  private readonly command: string;
  private readonly quality: number;

  constructor(options: RpicamBackendOptions) {
    super(options);
    this.command = options.command ?? 'rpicam-vid';
    this.quality = options.quality ?? 80;
  }

  protected buildCommand(config: CaptureConfig): [string, ...string[]] {
    return [
      this.command,
      '-t', '0',
      '-n',
      '--codec', 'mjpeg',
      '--width', String(config.width),
      '--height', String(config.height),
      '--framerate', String(config.fps),
      '--quality', String(this.quality),
      '-o', '-'
    ];
  }

  protected createSplitter(): JpegFrameSplitter {
    return new JpegFrameSplitter();
  }

  protected toFrame(data: Buffer, seq: number, config: CaptureConfig): Frame {
    return {
      kind: 'jpeg',
      width: config.width,
      height: config.height,
      data,
      seq,
      capturedAt: Date.now()
    };
  }
}
