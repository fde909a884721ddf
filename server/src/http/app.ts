import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { FrameSource } from '../camera/frame_source.js';
import { EncodeError } from '../camera/errors.js';
import type { FrameBuffer } from '../stream/frame_buffer.js';
import type { JpegEncoder } from '../stream/jpeg.js';
import type { StreamPublisher } from '../stream/publisher.js';
import { STREAM_CONTENT_TYPE } from '../stream/multipart.js';
import { ResponseSink } from '../stream/sink.js';
import { buildViewerPage } from './pages.js';
import { describeStatus } from './status.js';

export type ServerDeps = {
  config: AppConfig;
  logger: Logger;
  buffer: FrameBuffer;
  source: FrameSource;
  encoder: JpegEncoder;
  publisher: StreamPublisher;
  snapshotWaitMs?: number;
};

const NO_CACHE = 'no-cache, no-store, must-revalidate';

export async function buildServer(deps: ServerDeps) {
  const { config, buffer, encoder, publisher } = deps;
  const snapshotWaitMs = deps.snapshotWaitMs ?? 2000;
  const fastify = Fastify({ logger: deps.logger, forceCloseConnections: true });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Field Camera Streamer',
        version: '0.1.0'
      }
    }
  });
  await fastify.register(swaggerUI, { routePrefix: '/docs' });

  fastify.get('/', {
    schema: {
      description: 'Viewer page with the live feed and a status panel',
      response: {
        200: { type: 'string' }
      }
    }
  }, async (_, reply) => {
    reply.type('text/html').send(buildViewerPage({ title: 'Field Camera', wsPath: config.statusWsPath }));
  });

  fastify.get('/video_feed', {
    schema: {
      description: 'Endless multipart/x-mixed-replace MJPEG stream'
    }
  }, async (request, reply) => {
    reply.hijack();
    const res = reply.raw;
    res.writeHead(200, {
      'Content-Type': STREAM_CONTENT_TYPE,
      'Cache-Control': NO_CACHE,
      Pragma: 'no-cache',
      Connection: 'close'
    });
    if (request.method === 'HEAD') {
      res.end();
      return;
    }
    const sink = new ResponseSink(res);
    void publisher
      .serve(sink, { remoteAddress: request.ip })
      .finally(() => sink.end());
  });

  fastify.get('/status', {
    schema: {
      description: 'Camera and stream status',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            camera: { type: 'string', enum: ['active', 'unavailable', 'stopped', 'idle'] },
            resolution: { type: 'string' },
            backend: { type: 'string' },
            fps: { type: 'number' },
            clients: { type: 'number' },
            framesCaptured: { type: 'number' },
            captureErrors: { type: 'number' }
          }
        }
      }
    }
  }, async () => describeStatus(deps));

  fastify.get('/snapshot.jpg', {
    schema: {
      description: 'Latest frame as a single JPEG',
      response: {
        503: {
          type: 'object',
          properties: { error: { type: 'string' } }
        }
      }
    }
  }, async (request, reply) => {
    let frame = buffer.readLatest();
    if (!frame) {
      try {
        frame = await buffer.waitForNext(snapshotWaitMs);
      } catch (error) {
        request.log.debug({ err: error }, 'snapshot requested before first frame');
      }
    }
    if (!frame) {
      reply.code(503).send({ error: 'no_frame' });
      return;
    }

    let jpeg: Buffer;
    try {
      jpeg = encoder.encode(frame);
    } catch (error) {
      if (!(error instanceof EncodeError)) throw error;
      request.log.warn({ err: error, seq: frame.seq }, 'snapshot encode failed');
      reply.code(500).send({ error: error.code });
      return;
    }
    reply.header('Cache-Control', NO_CACHE).type('image/jpeg').send(jpeg);
  });

  fastify.get('/health', {
    schema: {
      description: 'Basic health check',
      response: {
        200: {
          type: 'object',
          properties: { ok: { type: 'boolean' } }
        }
      }
    }
  }, async () => ({ ok: true }));

  return fastify;
}

export type StreamServer = Awaited<ReturnType<typeof buildServer>>;
