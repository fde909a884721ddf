import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { RpicamBackend } from '../camera/backend_rpicam.js';
import { V4l2Backend } from '../camera/backend_v4l2.js';
import { CaptureError, DeviceUnavailableError } from '../camera/errors.js';
import type { CaptureConfig } from '../camera/camera.types.js';
import { silentLogger } from './helpers.js';

class MockProcess extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = vi.fn((signal?: NodeJS.Signals) => {
    setImmediate(() => this.emit('exit', null, signal ?? 'SIGTERM'));
    return true;
  });
}

const config: CaptureConfig = { device: '/dev/video2', width: 4, height: 2, fps: 10, pixelFormat: 'rgb24' };

const JPEG_A = Buffer.from([0xff, 0xd8, 0x0a, 0xff, 0xd9]);
const JPEG_B = Buffer.from([0xff, 0xd8, 0x0b, 0xff, 0xd9]);

function rpicam(proc: MockProcess, options: { openTimeoutMs?: number; captureTimeoutMs?: number; killTimeoutMs?: number } = {}) {
  const spawnProcess = vi.fn(() => proc);
  const backend = new RpicamBackend({ logger: silentLogger, spawnProcess, ...options });
  return { backend, spawnProcess };
}

describe('RpicamBackend', () => {
  it('spawns rpicam-vid and resolves open on the first frame', async () => {
    const proc = new MockProcess();
    const { backend, spawnProcess } = rpicam(proc);

    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;

    expect(spawnProcess).toHaveBeenCalledWith('rpicam-vid', [
      '-t', '0', '-n', '--codec', 'mjpeg',
      '--width', '4', '--height', '2', '--framerate', '10',
      '--quality', '80', '-o', '-'
    ]);
    const frame = await backend.read();
    expect(frame).toMatchObject({ kind: 'jpeg', seq: 1, width: 4, height: 2 });
    expect(frame.data).toEqual(JPEG_A);
    expect(Object.isFrozen(frame)).toBe(true);
  });

  it('hands out each frame once and waits for the next', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc);
    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;
    await backend.read();

    const next = backend.read();
    proc.stdout.emit('data', JPEG_B);

    const frame = await next;
    expect(frame.seq).toBe(2);
    expect(frame.data).toEqual(JPEG_B);
  });

  it('fails a read with CaptureError when no frame arrives in time', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc, { captureTimeoutMs: 30 });
    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;
    await backend.read();

    await expect(backend.read()).rejects.toThrow(CaptureError);
  });

  it('fails a read with CaptureError once the process has exited', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc);
    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;
    await backend.read();

    proc.emit('exit', 1, null);

    await expect(backend.read()).rejects.toThrow('rpicam capture process has exited');
  });

  it('rejects reads before open', async () => {
    const { backend } = rpicam(new MockProcess());
    await expect(backend.read()).rejects.toThrow(CaptureError);
  });

  it('maps a spawn failure to DeviceUnavailableError', async () => {
    const backend = new RpicamBackend({
      logger: silentLogger,
      spawnProcess: () => {
        throw new Error('spawn rpicam-vid ENOENT');
      }
    });

    await expect(backend.open(config)).rejects.toThrow(DeviceUnavailableError);
  });

  it('maps an early exit to DeviceUnavailableError without killing', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc);

    const opening = backend.open(config);
    proc.emit('exit', 255, null);

    await expect(opening).rejects.toThrow(DeviceUnavailableError);
    expect(proc.kill).not.toHaveBeenCalled();
  });

  it('terminates the process when the first frame never arrives', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc, { openTimeoutMs: 30 });

    await expect(backend.open(config)).rejects.toThrow('rpicam camera did not produce a frame (capture_timeout)');
    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('escalates to SIGKILL when the process ignores SIGTERM', async () => {
    const proc = new MockProcess();
    proc.kill.mockImplementation(() => true);
    const { backend } = rpicam(proc, { killTimeoutMs: 20 });
    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;

    await backend.close();

    expect(proc.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
  });

  it('closes only once', async () => {
    const proc = new MockProcess();
    const { backend } = rpicam(proc);
    const opening = backend.open(config);
    proc.stdout.emit('data', JPEG_A);
    await opening;

    await backend.close();
    await backend.close();

    expect(proc.kill).toHaveBeenCalledTimes(1);
  });
});

describe('V4l2Backend', () => {
  it('runs ffmpeg and assembles raw frames of the configured size', async () => {
    const proc = new MockProcess();
    const spawnProcess = vi.fn(() => proc);
    const backend = new V4l2Backend({ logger: silentLogger, spawnProcess, ffmpegPath: '/usr/bin/ffmpeg' });
    const small: CaptureConfig = { ...config, width: 2, height: 1 };
    const bytes = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

    const opening = backend.open(small);
    proc.stdout.emit('data', bytes.subarray(0, 4));
    proc.stdout.emit('data', bytes.subarray(4));
    await opening;

    expect(spawnProcess).toHaveBeenCalledWith('/usr/bin/ffmpeg', [
      '-f', 'v4l2', '-framerate', '10', '-video_size', '2x1',
      '-i', '/dev/video2', '-pix_fmt', 'rgb24',
      '-f', 'rawvideo', '-v', 'error', 'pipe:1'
    ]);
    const frame = await backend.read();
    expect(frame).toMatchObject({ kind: 'raw', format: 'rgb24', seq: 2, width: 2, height: 1 });
    expect(frame.data).toEqual(Buffer.from([7, 8, 9, 10, 11, 12]));
  });
});
