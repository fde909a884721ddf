#!/usr/bin/env node
import { MultipartReader, parseBoundary } from '../server/src/stream/multipart.js';

const baseUrl = process.argv[2] ?? 'http://localhost:5000';
const durationMs = Number(process.argv[3] ?? 5000);

if (!Number.isFinite(durationMs) || durationMs <= 0) {
  console.error('Usage: stream-probe <baseUrl?> <durationMs?>');
  process.exit(1);
}

async function probe() {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), durationMs);
  const res = await fetch(new URL('/video_feed', baseUrl), { signal: controller.signal });

  const contentType = res.headers.get('content-type');
  const boundary = parseBoundary(contentType);
  if (!res.ok || !res.body || !boundary) {
    clearTimeout(timer);
    throw new Error(`Unexpected response ${res.status} (${contentType ?? 'no content-type'})`);
  }
  console.log('connected', { status: res.status, contentType });

  const reader = new MultipartReader(boundary);
  const stream = res.body.getReader();
  const startedAt = Date.now();
  let parts = 0;
  let bytes = 0;
  let nonJpeg = 0;

  try {
    for (;;) {
      const { done, value } = await stream.read();
      if (done) break;
      for (const part of reader.push(Buffer.from(value))) {
        parts += 1;
        bytes += part.body.length;
        if (part.headers['content-type'] !== 'image/jpeg') nonJpeg += 1;
      }
    }
  } catch (error) {
    if (!controller.signal.aborted) throw error;
  } finally {
    clearTimeout(timer);
  }

  const seconds = (Date.now() - startedAt) / 1000;
  console.log('probe finished', {
    parts,
    nonJpeg,
    avgBytes: parts ? Math.round(bytes / parts) : 0,
    fps: Number((parts / seconds).toFixed(1))
  });
}

probe().catch((error) => {
  console.error('Probe failed', error);
  process.exit(1);
});
