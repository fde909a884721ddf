import { describe, it, expect, vi, afterEach } from 'vitest';
import http from 'http';
import { buildServer, type StreamServer } from '../http/app.js';
import { describeStreamStatus } from '../http/status.js';
import { loadConfig } from '../config.js';
import { MockBackend } from '../camera/backend_mock.js';
import { FrameSource } from '../camera/frame_source.js';
import { FrameBuffer } from '../stream/frame_buffer.js';
import { JpegEncoder } from '../stream/jpeg.js';
import { StreamPublisher } from '../stream/publisher.js';
import { StreamStatusSchema } from '../ws/schemas.js';
import { MultipartReader, type MultipartPart } from '../stream/multipart.js';
import { jpegFrame, rawFrame, silentLogger } from './helpers.js';

const config = loadConfig({ CAMERA_BACKEND: 'mock', CAMERA_WIDTH: '4', CAMERA_HEIGHT: '2', CAMERA_FPS: '10' });

let app: StreamServer | null = null;
let source: FrameSource | null = null;

async function setup(backend = new MockBackend({ pattern: 'solid' })) {
  const buffer = new FrameBuffer();
  const encoder = new JpegEncoder({ placeholderWidth: 4, placeholderHeight: 2 });
  const publisher = new StreamPublisher(buffer, encoder, { fps: 10, logger: silentLogger });
  source = new FrameSource(backend, buffer, { logger: silentLogger });
  app = await buildServer({ config, logger: silentLogger, buffer, source, encoder, publisher, snapshotWaitMs: 20 });
  return { app, buffer, source, publisher, encoder };
}

afterEach(async () => {
  await source?.stop();
  await app?.close();
  source = null;
  app = null;
});

describe('HTTP routes', () => {
  it('serves the viewer page', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('text/html');
    expect(res.body).toContain('<img class="feed" src="/video_feed"');
    expect(res.body).toContain("location.host + '/ws'");
  });

  it('answers the health check', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toEqual({ ok: true });
  });

  it('reports an idle camera before start', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      camera: 'idle',
      resolution: '4x2',
      backend: 'mock',
      fps: 10,
      clients: 0,
      framesCaptured: 0,
      captureErrors: 0
    });
  });

  it('reports an active camera once started', async () => {
    const { app, source } = await setup();
    await source.start(config.capture);

    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.json()).toMatchObject({ status: 'ok', camera: 'active', backend: 'mock' });
  });

  it('reports an unavailable camera and keeps serving', async () => {
    const { app, source } = await setup(new MockBackend({ failOpen: true }));
    await source.start(config.capture).catch(() => undefined);

    const status = await app.inject({ method: 'GET', url: '/status' });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(status.json()).toMatchObject({ camera: 'unavailable' });
    expect(health.statusCode).toBe(200);
  });

  it('returns 503 for a snapshot before any frame', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/snapshot.jpg' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: 'no_frame' });
  });

  it('returns the latest frame as a JPEG snapshot', async () => {
    const { app, buffer } = await setup();
    buffer.publish(rawFrame(1, { width: 4, height: 2, format: 'rgb24', data: Buffer.alloc(24, 90) }));

    const res = await app.inject({ method: 'GET', url: '/snapshot.jpg' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('image/jpeg');
    expect(res.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(res.rawPayload.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
  });

  it('waits briefly for the first frame of a snapshot', async () => {
    const { app, buffer } = await setup();
    const jpeg = Buffer.from([0xff, 0xd8, 0x42, 0xff, 0xd9]);

    const pending = app.inject({ method: 'GET', url: '/snapshot.jpg' });
    setTimeout(() => buffer.publish(jpegFrame(1, jpeg)), 5);
    const res = await pending;

    expect(res.statusCode).toBe(200);
    expect(res.rawPayload).toEqual(jpeg);
  });

  it('reports frames that cannot be encoded', async () => {
    const { app, buffer } = await setup();
    buffer.publish(jpegFrame(3, Buffer.from([0xff, 0xd8, 0x00, 0x00])));

    const res = await app.inject({ method: 'GET', url: '/snapshot.jpg' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'encode_failed' });
  });
});

async function openFeed(server: StreamServer) {
  await server.listen({ port: 0, host: '127.0.0.1' });
  const address = server.server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return new Promise<{ req: http.ClientRequest; res: http.IncomingMessage }>((resolve, reject) => {
    const req = http.get({ host: '127.0.0.1', port: address.port, path: '/video_feed' }, (res) => {
      resolve({ req, res });
    });
    req.on('error', reject);
  });
}

describe('GET /video_feed', () => {
  it('streams JPEG parts until the client disconnects', async () => {
    const { app, buffer, publisher } = await setup();
    buffer.publish(rawFrame(1, { width: 4, height: 2, format: 'rgb24', data: Buffer.alloc(24, 60) }));
    const { req, res } = await openFeed(app);
    const reader = new MultipartReader();
    const parts: MultipartPart[] = [];
    res.on('data', (chunk: Buffer) => parts.push(...reader.push(chunk)));
    res.on('error', () => undefined);

    await vi.waitFor(() => {
      expect(parts.length).toBeGreaterThanOrEqual(3);
    }, { timeout: 3000 });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('multipart/x-mixed-replace; boundary=frame');
    expect(res.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(parts[0].headers['content-type']).toBe('image/jpeg');
    expect(parts[0].body.subarray(0, 2)).toEqual(Buffer.from([0xff, 0xd8]));
    expect(publisher.clientCount).toBe(1);

    req.destroy();

    await vi.waitFor(() => {
      expect(publisher.clientCount).toBe(0);
    }, { timeout: 3000 });
  });

  it('ends the response when the publisher shuts down', async () => {
    const { app, publisher } = await setup();
    const { res } = await openFeed(app);
    const ended = new Promise<void>((resolve) => res.on('end', () => resolve()));
    res.resume();
    await vi.waitFor(() => {
      expect(publisher.clientCount).toBe(1);
    });

    publisher.shutdown();

    await ended;
    expect(publisher.clientCount).toBe(0);
  });

  it('answers HEAD with the stream headers and no session', async () => {
    const { app, publisher } = await setup();

    const res = await app.inject({ method: 'HEAD', url: '/video_feed' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('multipart/x-mixed-replace; boundary=frame');
    expect(res.body).toBe('');
    expect(publisher.clientCount).toBe(0);
  });
});

describe('describeStreamStatus', () => {
  it('produces a valid stream_status message', async () => {
    const { source, publisher } = await setup();
    await source.start(config.capture);

    const status = describeStreamStatus({ config, source, publisher });

    expect(StreamStatusSchema.parse(status)).toEqual(status);
    expect(status).toMatchObject({ camera: 'running', resolution: '4x2', captureFps: 10, streamFps: 15 });
  });
});
