import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { BoundedLog } from './bounded-log';
import { extractCapture } from './extract';
import { CaptureMetrics } from './health';
import { logger, logRequest } from './log';
import { redactHeaders } from './redact';
import { renderPage } from './render';
import type { InboundPayload } from './types';

export const CAPTURE_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'] as const;

export interface CaptureRouteOptions {
  captures: BoundedLog;
  metrics: CaptureMetrics;
  redactedHeaders: string[];
  maxBodyBytes: number;
}

interface ReadPayload {
  payload: InboundPayload;
  bytesIn: number;
}

/**
 * Collects the non-file fields of a multipart body. File parts are drained
 * and skipped. A stream that breaks mid-way keeps the fields read so far.
 */
async function readMultipart(request: FastifyRequest, requestId: string): Promise<ReadPayload> {
  const fields: Record<string, string> = {};
  let bytesIn = 0;

  try {
    for await (const part of request.parts()) {
      if (part.type === 'file') {
        const fileBuffer = await part.toBuffer();
        bytesIn += fileBuffer.length;
        logger.debug({ requestId, field: part.fieldname, size: fileBuffer.length }, 'Skipping uploaded file');
      } else {
        const value = typeof part.value === 'string' ? part.value : String(part.value);
        bytesIn += Buffer.byteLength(value);
        if (!(part.fieldname in fields)) {
          fields[part.fieldname] = value;
        }
      }
    }
  } catch (error) {
    logger.warn({ requestId, error }, 'Malformed multipart body');
  }

  return { payload: { kind: 'multipart', fields }, bytesIn };
}

function hasBoundary(contentType: string | undefined): boolean {
  return /;\s*boundary=/i.test(contentType ?? '');
}

/**
 * Reads an unparsed body as UTF-8 text, truncated to `maxBytes`.
 */
async function readRawText(request: FastifyRequest, maxBytes: number): Promise<ReadPayload> {
  const chunks: Buffer[] = [];
  for await (const chunk of request.raw) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  let bodyBuffer = Buffer.concat(chunks);
  if (bodyBuffer.length > maxBytes) {
    logger.warn({ requestId: request.id, size: bodyBuffer.length, maxBytes }, 'Request body truncated');
    bodyBuffer = bodyBuffer.subarray(0, maxBytes);
  }

  return { payload: { kind: 'text', text: bodyBuffer.toString('utf8') }, bytesIn: bodyBuffer.length };
}

async function readPayload(request: FastifyRequest, maxBodyBytes: number): Promise<ReadPayload> {
  if (request.isMultipart()) {
    // Without a boundary the parts cannot be split; keep the body as text
    if (!hasBoundary(request.headers['content-type'])) {
      return readRawText(request, maxBodyBytes);
    }
    return readMultipart(request, request.id);
  }
  if (typeof request.body === 'string') {
    return { payload: { kind: 'text', text: request.body }, bytesIn: Buffer.byteLength(request.body) };
  }
  return { payload: { kind: 'none' }, bytesIn: 0 };
}

export async function registerCaptureRoute(fastify: FastifyInstance, options: CaptureRouteOptions): Promise<void> {
  const { captures, metrics, redactedHeaders, maxBodyBytes } = options;

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const startTime = Date.now();
    const { payload, bytesIn } = await readPayload(request, maxBodyBytes);

    const extracted = extractCapture({
      method: request.method,
      url: request.url,
      rawHeaders: request.raw.rawHeaders,
      peerAddress: request.ip,
      payload,
    });
    const record = { ...extracted, headers: redactHeaders(extracted.headers, redactedHeaders) };

    // No await between prepend and snapshot: the page always reflects this insert and its trim.
    captures.prepend(record);
    const records = captures.snapshot();

    metrics.record(record.method, bytesIn);
    logRequest({
      id: record.id,
      method: record.method,
      path: record.path,
      bytesIn,
      ms: Date.now() - startTime,
    });

    return reply
      .status(200)
      .type('text/html; charset=utf-8')
      .send(renderPage({ records, baseUrl: `${request.protocol}://${request.hostname}/` }));
  };

  // Universal catch-all routes
  for (const url of ['/', '/*']) {
    fastify.route({ method: [...CAPTURE_METHODS], url, handler });
  }
}
