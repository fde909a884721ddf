abstract class StreamerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The camera could not be opened at startup. */
export class DeviceUnavailableError extends StreamerError {
  readonly code = 'device_unavailable';
}

/** A single read failed; the acquisition loop logs it and carries on. */
export class CaptureError extends StreamerError {
  readonly code = 'capture_failed';
}

export class EncodeError extends StreamerError {
  readonly code = 'encode_failed';
}

/** Raised by a sink once its client has gone away. */
export class ClientDisconnectedError extends StreamerError {
  readonly code = 'client_disconnected';
}
