import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { BoundedLog } from './bounded-log';
import { logger } from './log';

const packageJsonSchema = z.object({ version: z.string() });

// Simple in-memory metrics
export class CaptureMetrics {
  private totalCaptured = 0;
  private byMethod: Record<string, number> = {};
  private bytesIn = 0;

  record(method: string, bytesIn: number): void {
    this.totalCaptured++;
    this.byMethod[method] = (this.byMethod[method] || 0) + 1;
    this.bytesIn += bytesIn;
  }

  toPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP total_captured Total number of requests captured`);
    lines.push(`# TYPE total_captured counter`);
    lines.push(`total_captured ${this.totalCaptured}`);

    lines.push(`# HELP captured_by_method Number of requests captured by HTTP method`);
    lines.push(`# TYPE captured_by_method counter`);
    for (const [method, count] of Object.entries(this.byMethod)) {
      lines.push(`captured_by_method{method="${method}"} ${count}`);
    }

    lines.push(`# HELP bytes_in Total bytes received in request bodies`);
    lines.push(`# TYPE bytes_in counter`);
    lines.push(`bytes_in ${this.bytesIn}`);

    return lines.join('\n') + '\n';
  }
}

export function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
    const parsed = packageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    logger.warn({ error }, 'Could not read package version');
    return '0.0.0';
  }
}

/**
 * Register /healthz and /metrics. Must run before the catch-all capture route.
 */
export async function registerHealthRoutes(
  fastify: FastifyInstance,
  captures: BoundedLog,
  metrics: CaptureMetrics
): Promise<void> {
  const version = readVersion();

  fastify.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      ok: true,
      captured: captures.size,
      capacity: captures.capacity,
      version,
    });
  });

  // Prometheus-compatible format
  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply
      .type('text/plain')
      .status(200)
      .send(metrics.toPrometheus());
  });
}
