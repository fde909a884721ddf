import { BYTES_PER_PIXEL, type CaptureConfig, type Frame } from './camera.types.js';
import { RawFrameAssembler } from './frame_parsers.js';
import { ProcessBackend, type ProcessBackendOptions } from './process_backend.js';

export type V4l2BackendOptions = ProcessBackendOptions & {
  ffmpegPath?: string;
};

/**
 * Generic USB (UVC) camera read through ffmpeg's v4l2 demuxer. ffmpeg
 * converts to the requested pixel format and writes packed raw frames.
 */
export class V4l2Backend extends ProcessBackend {
  readonly name = 'v4l2' as const;
  private readonly ffmpegPath: string;

  constructor(options: V4l2BackendOptions) {
    super(options);
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  }

  protected buildCommand(config: CaptureConfig): [string, ...string[]] {
    return [
      this.ffmpegPath,
      '-f', 'v4l2',
      '-framerate', String(config.fps),
      '-video_size', `${config.width}x${config.height}`,
      '-i', config.device,
      '-pix_fmt', config.pixelFormat,
      '-f', 'rawvideo',
      '-v', 'error',
      'pipe:1'
    ];
  }

  protected createSplitter(config: CaptureConfig): RawFrameAssembler {
    return new RawFrameAssembler(config.width * config.height * BYTES_PER_PIXEL[config.pixelFormat]);
  }

  protected toFrame(data: Buffer, seq: number, config: CaptureConfig): Frame {
    return {
      kind: 'raw',
      format: config.pixelFormat,
      width: config.width,
      height: config.height,
      data,
      seq,
      capturedAt: Date.now()
    };
  }
}
