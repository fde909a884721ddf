import jpeg from 'jpeg-js';
import { BYTES_PER_PIXEL, type Frame, type RawFrame } from '../camera/camera.types.js';
import { EncodeError } from '../camera/errors.js';
import { isCompleteJpeg } from '../camera/frame_parsers.js';

export type JpegEncoderOptions = {
  quality?: number;
  placeholderWidth?: number;
  placeholderHeight?: number;
  placeholderColor?: [number, number, number];
};

export class JpegEncoder {
  private readonly quality: number;
  private readonly placeholderSize: { width: number; height: number };
  private readonly placeholderColor: [number, number, number];
  private readonly encoded = new WeakMap<Frame, Buffer>();
  private readonly failed = new WeakMap<Frame, EncodeError>();
  private placeholderJpeg: Buffer | null = null;

  constructor(options: JpegEncoderOptions = {}) {
    this.quality = options.quality ?? 80;
    this.placeholderSize = {
      width: options.placeholderWidth ?? 640,
      height: options.placeholderHeight ?? 480
    };
    this.placeholderColor = options.placeholderColor ?? [32, 32, 32];
  }

  /**
   * Returns JPEG bytes for a frame. Each frame object is encoded at most
   * once; a frame that failed rethrows its original error.
   */
  encode(frame: Frame): Buffer {
    const cached = this.encoded.get(frame);
    if (cached) return cached;
    const failure = this.failed.get(frame);
    if (failure) throw failure;

    try {
      const bytes = this.encodeFrame(frame);
      this.encoded.set(frame, bytes);
      return bytes;
    } catch (error) {
      if (error instanceof EncodeError) {
        this.failed.set(frame, error);
      }
      throw error;
    }
  }

  private encodeFrame(frame: Frame): Buffer {
    if (frame.kind === 'raw') {
      return this.encodeRgba(toRgba(frame), frame.width, frame.height);
    }
    if (!isCompleteJpeg(frame.data)) {
      throw new EncodeError(`Frame ${frame.seq} is not a complete JPEG (${frame.data.length} bytes)`);
    }
    return frame.data;
  }

  placeholder(): Buffer {
    if (!this.placeholderJpeg) {
      const { width, height } = this.placeholderSize;
      const [r, g, b] = this.placeholderColor;
      const rgba = Buffer.alloc(width * height * 4);
      for (let i = 0; i < rgba.length; i += 4) {
        rgba[i] = r;
        rgba[i + 1] = g;
        rgba[i + 2] = b;
        rgba[i + 3] = 255;
      }
      this.placeholderJpeg = this.encodeRgba(rgba, width, height);
    }
    return this.placeholderJpeg;
  }

  private encodeRgba(data: Buffer, width: number, height: number): Buffer {
    try {
      return jpeg.encode({ data, width, height }, this.quality).data;
    } catch (error) {
      throw new EncodeError('JPEG encoding failed', { cause: error });
    }
  }
}

export function toRgba(frame: RawFrame): Buffer {
  const { width, height, format, data } = frame;
  const pixels = width * height;
  if (pixels <= 0) {
    throw new EncodeError(`Invalid frame size ${width}x${height}`);
  }
  const expected = pixels * BYTES_PER_PIXEL[format];
  if (data.length !== expected) {
    throw new EncodeError(`Frame ${frame.seq} has ${data.length} bytes, expected ${expected} for ${format}`);
  }
  if (format === 'rgba') return data;

  const out = Buffer.alloc(pixels * 4);
  for (let p = 0, i = 0, o = 0; p < pixels; p++, o += 4) {
    switch (format) {
      case 'rgb24':
        out[o] = data[i];
        out[o + 1] = data[i + 1];
        out[o + 2] = data[i + 2];
        i += 3;
        break;
      case 'bgr24':
        out[o] = data[i + 2];
        out[o + 1] = data[i + 1];
        out[o + 2] = data[i];
        i += 3;
        break;
      case 'gray':
        out[o] = data[i];
        out[o + 1] = data[i];
        out[o + 2] = data[i];
        i += 1;
        break;
    }
    out[o + 3] = 255;
  }
  return out;
}
