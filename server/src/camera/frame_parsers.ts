const SOI = 0xd8;
const EOI = 0xd9;
const MARKER = 0xff;

/**
 * Cuts a rawvideo byte stream into fixed-size frames. Every returned buffer
 * is a fresh copy, so callers may hold on to it while more data arrives.
 */
export class RawFrameAssembler {
  private buffer: Buffer;
  private offset = 0;

  constructor(private readonly frameSize: number) {
    if (!Number.isInteger(frameSize) || frameSize <= 0) {
      throw new RangeError(`Invalid frame size: ${frameSize}`);
    }
    this.buffer = Buffer.alloc(frameSize * 2);
  }

  push(chunk: Buffer): Buffer[] {
    if (this.offset + chunk.length > this.buffer.length) {
      const grown = Buffer.alloc(Math.max(this.buffer.length * 2, this.offset + chunk.length));
      this.buffer.copy(grown, 0, 0, this.offset);
      this.buffer = grown;
    }
    chunk.copy(this.buffer, this.offset);
    this.offset += chunk.length;

    const frames: Buffer[] = [];
    let start = 0;
    while (this.offset - start >= this.frameSize) {
      frames.push(Buffer.from(this.buffer.subarray(start, start + this.frameSize)));
      start += this.frameSize;
    }
    if (start > 0) {
      this.buffer.copyWithin(0, start, this.offset);
      this.offset -= start;
    }
    return frames;
  }

  get pending(): number {
    return this.offset;
  }
}

/**
 * Splits a concatenated MJPEG byte stream on SOI / EOI markers.
 * Bytes before the first SOI are discarded.
 */
export class JpegFrameSplitter {
  private buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes = 8 * 1024 * 1024) {}

  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);

    const frames: Buffer[] = [];
    for (;;) {
      const start = findMarker(this.buffer, SOI, 0);
      if (start === -1) {
        // keep a trailing 0xFF in case the SOI straddles two chunks
        const last = this.buffer[this.buffer.length - 1];
        this.buffer = last === MARKER ? Buffer.from([MARKER]) : Buffer.alloc(0);
        break;
      }
      const end = findMarker(this.buffer, EOI, start + 2);
      if (end === -1) {
        this.buffer = this.buffer.subarray(start);
        if (this.buffer.length > this.maxFrameBytes) {
          this.buffer = Buffer.alloc(0);
        }
        break;
      }
      frames.push(Buffer.from(this.buffer.subarray(start, end + 2)));
      this.buffer = this.buffer.subarray(end + 2);
    }
    return frames;
  }

  get pending(): number {
    return this.buffer.length;
  }
}

function findMarker(buffer: Buffer, code: number, from: number): number {
  for (let i = from; i < buffer.length - 1; i++) {
    if (buffer[i] === MARKER && buffer[i + 1] === code) return i;
  }
  return -1;
}

export function isCompleteJpeg(data: Buffer): boolean {
  const n = data.length;
  return n >= 4 && data[0] === MARKER && data[1] === SOI && data[n - 2] === MARKER && data[n - 1] === EOI;
}
