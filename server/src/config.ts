import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CAMERA_BACKEND: z.enum(['rpicam', 'v4l2', 'mock']).default('rpicam'),
  CAMERA_DEVICE: z.string().min(1).default('/dev/video0'),
  CAMERA_WIDTH: z.coerce.number().int().positive().default(640),
  CAMERA_HEIGHT: z.coerce.number().int().positive().default(480),
  CAMERA_FPS: z.coerce.number().positive().max(120).default(15),
  CAMERA_PIXEL_FORMAT: z.enum(['rgb24', 'bgr24', 'rgba', 'gray']).default('bgr24'),
  STREAM_FPS: z.coerce.number().positive().max(120).default(15),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  CAPTURE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  CAPTURE_RETRY_MS: z.coerce.number().int().nonnegative().default(100),
  OPEN_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MOCK_PATTERN: z.enum(['solid', 'gradient', 'checkerboard', 'bars']).default('gradient'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  RPICAM_PATH: z.string().min(1).default('rpicam-vid'),
  STATUS_WS_PATH: z.string().startsWith('/').default('/ws'),
  STATUS_INTERVAL_MS: z.coerce.number().int().positive().default(1000)
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment');
  }

  const env = parsed.data;

  return {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    backend: env.CAMERA_BACKEND,
    capture: {
      device: env.CAMERA_DEVICE,
      width: env.CAMERA_WIDTH,
      height: env.CAMERA_HEIGHT,
      fps: env.CAMERA_FPS,
      pixelFormat: env.CAMERA_PIXEL_FORMAT
    },
    streamFps: env.STREAM_FPS,
    jpegQuality: env.JPEG_QUALITY,
    captureTimeoutMs: env.CAPTURE_TIMEOUT_MS,
    captureRetryMs: env.CAPTURE_RETRY_MS,
    openTimeoutMs: env.OPEN_TIMEOUT_MS,
    mockPattern: env.MOCK_PATTERN,
    ffmpegPath: env.FFMPEG_PATH,
    rpicamPath: env.RPICAM_PATH,
    statusWsPath: env.STATUS_WS_PATH,
    statusIntervalMs: env.STATUS_INTERVAL_MS
  };
}
