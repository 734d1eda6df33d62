import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { BoundedLog } from './bounded-log';
import { registerCaptureRoute } from './capture';
import { Env, parseRedactedHeaders } from './env';
import { CaptureMetrics, registerHealthRoutes } from './health';
import { logger } from './log';

export interface CatcherServer {
  fastify: FastifyInstance;
  captures: BoundedLog;
  metrics: CaptureMetrics;
}

export async function buildServer(env: Env): Promise<CatcherServer> {
  const captures = new BoundedLog();
  const metrics = new CaptureMetrics();

  const fastify = Fastify({
    logger: false, // We use our own logger
    bodyLimit: env.MAX_BODY_BYTES,
    disableRequestLogging: true, // We log manually
  });

  // Bodies reach the extractor as text so malformed JSON is captured instead of rejected
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  await fastify.register(multipart, {
    limits: {
      fileSize: env.MAX_BODY_BYTES,
    },
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error({ error, url: request.url, method: request.method }, 'Unhandled error');
    const statusCode = error.statusCode ?? 500;
    reply.status(statusCode).send({
      status: 'error',
      error: statusCode >= 500 ? 'Internal server error' : error.message,
    });
  });

  // Specific routes before catch-all
  if (env.EXPOSE_INTERNAL_ROUTES) {
    await registerHealthRoutes(fastify, captures, metrics);
  }
  await registerCaptureRoute(fastify, {
    captures,
    metrics,
    redactedHeaders: parseRedactedHeaders(env.REDACTED_HEADERS),
    maxBodyBytes: env.MAX_BODY_BYTES,
  });

  return { fastify, captures, metrics };
}
