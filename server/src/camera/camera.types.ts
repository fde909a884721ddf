export type PixelFormat = 'rgb24' | 'bgr24' | 'rgba' | 'gray';

export const BYTES_PER_PIXEL: Record<PixelFormat, number> = {
  rgb24: 3,
  bgr24: 3,
  rgba: 4,
  gray: 1
};

type FrameBase = {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
  readonly seq: number;         // per-backend, increments by one
  readonly capturedAt: number;  // epoch ms
};

export type RawFrame = FrameBase & {
  readonly kind: 'raw';
  readonly format: PixelFormat;
};

export type JpegFrame = FrameBase & {
  readonly kind: 'jpeg';
};

export type Frame = RawFrame | JpegFrame;

export type CaptureConfig = {
  device: string;
  width: number;
  height: number;
  fps: number;
  pixelFormat: PixelFormat;
};

export type BackendName = 'rpicam' | 'v4l2' | 'mock';

export interface CameraBackend {
  readonly name: BackendName;
  open(config: CaptureConfig): Promise<void>;
  read(): Promise<Frame>;
  close(): Promise<void>;
}

export type SourceState = 'idle' | 'running' | 'unavailable' | 'stopped';

export type SourceStats = {
  state: SourceState;
  backend: BackendName;
  framesCaptured: number;
  captureErrors: number;
  lastFrameAt: number | null;
  measuredFps: number;
};
