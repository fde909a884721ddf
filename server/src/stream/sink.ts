import type { ServerResponse } from 'http';
import { ClientDisconnectedError } from '../camera/errors.js';

/** Write side of one streaming client. A rejected write means the client is gone. */
export interface StreamSink {
  write(chunk: Buffer): Promise<void>;
}

export class ResponseSink implements StreamSink {
  private readonly res: ServerResponse;
  private closed = false;
  private readonly pending = new Set<(error: Error) => void>();

  constructor(res: ServerResponse) {
    this.res = res;
    res.once('close', () => {
      this.closed = true;
      const error = new ClientDisconnectedError('connection closed by client');
      for (const fail of this.pending) fail(error);
      this.pending.clear();
    });
  }

  write(chunk: Buffer): Promise<void> {
    if (this.closed || this.res.destroyed || this.res.writableEnded) {
      return Promise.reject(new ClientDisconnectedError('connection already closed'));
    }
    return new Promise((resolve, reject) => {
      const fail = (error: Error) => {
        this.pending.delete(fail);
        reject(error);
      };
      this.pending.add(fail);
      this.res.write(chunk, (error) => {
        if (!this.pending.delete(fail)) return;
        if (error) {
          reject(new ClientDisconnectedError(error.message, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  end(): void {
    if (!this.res.writableEnded && !this.res.destroyed) {
      this.res.end();
    }
  }
}
