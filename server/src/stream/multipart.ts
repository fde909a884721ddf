export const BOUNDARY = 'frame';
export const STREAM_CONTENT_TYPE = `multipart/x-mixed-replace; boundary=${BOUNDARY}`;

const CRLF = Buffer.from('\r\n');
const HEADER_END = Buffer.from('\r\n\r\n');

export function formatPart(jpeg: Buffer, boundary = BOUNDARY): Buffer {
  const head = `--${boundary}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, 'latin1'), jpeg, CRLF]);
}

export type MultipartPart = {
  headers: Record<string, string>;
  body: Buffer;
};

/**
 * Incremental reader for a multipart/x-mixed-replace body. Parts with a
 * Content-Length are cut by length, others at the next boundary line.
 */
export class MultipartReader {
  private buffer = Buffer.alloc(0);
  private readonly delimiter: Buffer;

  constructor(boundary = BOUNDARY) {
    this.delimiter = Buffer.from(`--${boundary}`, 'latin1');
  }

  push(chunk: Buffer): MultipartPart[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const parts: MultipartPart[] = [];

    for (;;) {
      const start = this.buffer.indexOf(this.delimiter);
      if (start === -1) break;
      const headerStart = start + this.delimiter.length + CRLF.length;
      const headerEnd = this.buffer.indexOf(HEADER_END, headerStart);
      if (headerEnd === -1) break;

      const headers = parseHeaders(this.buffer.subarray(headerStart, headerEnd).toString('latin1'));
      const bodyStart = headerEnd + HEADER_END.length;
      const length = headers['content-length'] === undefined ? NaN : Number(headers['content-length']);

      let bodyEnd: number;
      let next: number;
      if (Number.isInteger(length) && length >= 0) {
        bodyEnd = bodyStart + length;
        if (this.buffer.length < bodyEnd + CRLF.length) break;
        next = bodyEnd + CRLF.length;
      } else {
        const boundaryAt = this.buffer.indexOf(Buffer.concat([CRLF, this.delimiter]), bodyStart);
        if (boundaryAt === -1) break;
        bodyEnd = boundaryAt;
        next = boundaryAt + CRLF.length;
      }

      parts.push({ headers, body: Buffer.from(this.buffer.subarray(bodyStart, bodyEnd)) });
      this.buffer = this.buffer.subarray(next);
    }

    return parts;
  }
}

function parseHeaders(block: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of block.split('\r\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }
  return headers;
}

/** Reads the boundary parameter from a multipart Content-Type header. */
export function parseBoundary(contentType: string | null | undefined): string | null {
  if (!contentType || !/^multipart\//i.test(contentType.trim())) return null;
  const match = /;\s*boundary=(?:"([^"]+)"|([^;\s]+))/i.exec(contentType);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
}
