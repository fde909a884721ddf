import { loadEnv } from './load_env.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createBackend } from './camera/backends.js';
import { DeviceUnavailableError } from './camera/errors.js';
import { FrameSource } from './camera/frame_source.js';
import { FrameBuffer } from './stream/frame_buffer.js';
import { JpegEncoder } from './stream/jpeg.js';
import { StreamPublisher } from './stream/publisher.js';
import { buildServer } from './http/app.js';
import { describeStreamStatus } from './http/status.js';
import { createStatusHub } from './ws/hub.js';

async function boot() {
  const envFiles = loadEnv();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.debug({ envFiles }, 'environment loaded');

  const buffer = new FrameBuffer();
  const backend = createBackend(config, logger.child({ component: 'backend' }));
  const source = new FrameSource(backend, buffer, {
    logger: logger.child({ component: 'frame_source' }),
    captureRetryMs: config.captureRetryMs
  });
  const encoder = new JpegEncoder({
    quality: config.jpegQuality,
    placeholderWidth: config.capture.width,
    placeholderHeight: config.capture.height
  });
  const publisher = new StreamPublisher(buffer, encoder, {
    fps: config.streamFps,
    logger: logger.child({ component: 'publisher' })
  });

  const fastify = await buildServer({ config, logger, buffer, source, encoder, publisher });
  const deps = { config, source, publisher };
  const hub = createStatusHub({
    server: fastify.server,
    path: config.statusWsPath,
    intervalMs: config.statusIntervalMs,
    getStatus: () => describeStreamStatus(deps),
    logger: logger.child({ component: 'status_hub' })
  });
  source.on('state', hub.broadcast);

  try {
    await source.start(config.capture);
  } catch (error) {
    if (!(error instanceof DeviceUnavailableError)) throw error;
    logger.warn('continuing without a camera; clients will receive placeholder frames');
  }

  await fastify.listen({ port: config.port, host: config.host });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'shutting down');
    publisher.shutdown();
    await hub.close();
    await fastify.close();
    await source.stop();
    logger.info('shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
    });
  }
}

boot().catch((error) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
