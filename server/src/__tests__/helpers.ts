import { createLogger } from '../logger.js';
import type { JpegFrame, PixelFormat, RawFrame } from '../camera/camera.types.js';

export const silentLogger = createLogger('silent');

export function rawFrame(
  seq: number,
  options: { width?: number; height?: number; format?: PixelFormat; data?: Buffer } = {}
): RawFrame {
  const width = options.width ?? 10;
  const height = options.height ?? 1;
  return {
    kind: 'raw',
    format: options.format ?? 'gray',
    width,
    height,
    data: options.data ?? Buffer.alloc(width * height, seq),
    seq,
    capturedAt: 1_000 + seq
  };
}

export function jpegFrame(seq: number, data: Buffer): JpegFrame {
  return { kind: 'jpeg', width: 4, height: 2, data, seq, capturedAt: 1_000 + seq };
}
