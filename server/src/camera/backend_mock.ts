import type { CameraBackend, CaptureConfig, Frame } from './camera.types.js';
import { CaptureError, DeviceUnavailableError } from './errors.js';

export type MockPattern = 'solid' | 'gradient' | 'checkerboard' | 'bars';

export type MockBackendOptions = {
  pattern?: MockPattern;
  color?: [number, number, number];
  failOpen?: boolean;
};

/**
 * Synthetic camera. Frames are generated on demand in rgb24, so the
 * acquisition loop alone decides the cadence.
 */
export class MockBackend implements CameraBackend {
  readonly name = 'mock' as const;
  pattern: MockPattern;
  private readonly color: [number, number, number];
  private readonly failOpen: boolean;
  private config: CaptureConfig | null = null;
  private seq = 0;
  openCount = 0;
  closeCount = 0;

  constructor(options: MockBackendOptions = {}) {
    this.pattern = options.pattern ?? 'gradient';
    this.color = options.color ?? [40, 120, 60];
    this.failOpen = options.failOpen ?? false;
  }

  async open(config: CaptureConfig): Promise<void> {
    if (this.failOpen) {
      throw new DeviceUnavailableError('mock camera configured to fail');
    }
    this.openCount += 1;
    this.config = config;
  }

  async read(): Promise<Frame> {
    const config = this.config;
    if (!config) {
      throw new CaptureError('mock backend is not open');
    }
    const { width, height } = config;
    const data = Buffer.alloc(width * height * 3);
    const t = this.seq++;

    switch (this.pattern) {
      case 'solid':
        this.drawSolid(data);
        break;
      case 'gradient':
        this.drawGradient(data, width, height, t);
        break;
      case 'checkerboard':
        this.drawCheckerboard(data, width, height, t);
        break;
      case 'bars':
        this.drawBars(data, width, height, t);
        break;
    }

    const frame: Frame = {
      kind: 'raw',
      format: 'rgb24',
      width,
      height,
      data,
      seq: this.seq,
      capturedAt: Date.now()
    };
    return Object.freeze(frame);
  }

  async close(): Promise<void> {
    if (!this.config) return;
    this.config = null;
    this.closeCount += 1;
  }

  private drawSolid(data: Buffer): void {
    const [r, g, b] = this.color;
    for (let i = 0; i < data.length; i += 3) {
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
    }
  }

  private drawGradient(data: Buffer, w: number, h: number, t: number): void {
    const speed = t * 0.02;
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const i = (y * w + x) * 3;
        const v = (Math.sin((x / w) * Math.PI + speed) + Math.sin((y / h) * Math.PI + speed * 0.7)) * 0.5;
        const bright = Math.floor(((v + 1) / 2) * 255);
        data[i] = bright >> 1;
        data[i + 1] = bright;
        data[i + 2] = bright >> 2;
      }
    }
  }

  private drawCheckerboard(data: Buffer, w: number, h: number, t: number): void {
    const size = 16;
    const offset = Math.floor(t * 0.5);
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const i = (y * w + x) * 3;
        const bright = (Math.floor((x + offset) / size) + Math.floor(y / size)) % 2 === 0 ? 230 : 25;
        data[i] = bright;
        data[i + 1] = bright;
        data[i + 2] = bright;
      }
    }
  }

  private drawBars(data: Buffer, w: number, h: number, t: number): void {
    const bars: [number, number, number][] = [
      [255, 255, 255], [255, 255, 0], [0, 255, 255], [0, 255, 0],
      [255, 0, 255], [255, 0, 0], [0, 0, 255], [0, 0, 0]
    ];
    const barWidth = Math.max(1, Math.floor(w / bars.length));
    const offset = t % w;
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        const i = (y * w + x) * 3;
        const [r, g, b] = bars[Math.min(bars.length - 1, Math.floor(((x + offset) % w) / barWidth))];
        data[i] = r;
        data[i + 1] = g;
        data[i + 2] = b;
      }
    }
  }
}
