import { EventEmitter } from 'events';
import type { Frame } from '../camera/camera.types.js';

/**
 * Single-slot cache of the latest frame. Publishing swaps one reference, so a
 * reader sees either the previous frame or the new one, never a mix. Stored
 * frames are frozen and their buffers are never written again.
 */
export class FrameBuffer extends EventEmitter {
  private latest: Frame | null = null;
  private published = 0;

  constructor() {
    super();
    this.setMaxListeners(0);
  }

  publish(frame: Frame): void {
    this.latest = Object.isFrozen(frame) ? frame : Object.freeze({ ...frame });
    this.published += 1;
    this.emit('frame', this.latest);
  }

  readLatest(): Frame | null {
    return this.latest;
  }

  get publishCount(): number {
    return this.published;
  }

  waitForNext(timeoutMs: number): Promise<Frame> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.off('frame', onFrame);
        reject(new Error('frame_timeout'));
      }, timeoutMs);

      const onFrame = (frame: Frame) => {
        clearTimeout(timer);
        this.off('frame', onFrame);
        resolve(frame);
      };

      this.on('frame', onFrame);
    });
  }
}
