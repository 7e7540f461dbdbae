// src/plugins/metrics.ts
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { register, collectDefaultMetrics, Gauge, Counter, Histogram } from 'prom-client';

export interface AppMetrics {
  conversationEvents: Counter<'input' | 'status'>;
}

declare module 'fastify' {
  interface FastifyInstance {
    metrics: AppMetrics;
  }
}

const PREFIX = 'gallery_assistant_';

/**
 * Metrics Plugin
 * Exposes Prometheus metrics at /metrics endpoint
 * Includes default Node.js metrics, HTTP timings and conversation counters
 */
async function metricsPlugin(fastify: FastifyInstance) {
  // Enable default metrics (heap, CPU, event loop, etc.)
  collectDefaultMetrics({
    register,
    prefix: PREFIX,
  });

  const heapGauge = new Gauge({
    name: `${PREFIX}heap_usage_bytes`,
    help: 'Current heap memory usage in bytes',
    registers: [register],
  });

  const httpRequestDuration = new Histogram({
    name: `${PREFIX}http_request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  const httpRequestsTotal = new Counter({
    name: `${PREFIX}http_requests_total`,
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status_code'],
    registers: [register],
  });

  // input: text | callback | voice; status: replied | failed | superseded
  const conversationEvents = new Counter({
    name: `${PREFIX}conversation_events_total`,
    help: 'Total number of inbound conversation events',
    labelNames: ['input', 'status'] as const,
    registers: [register],
  });

  heapGauge.set(process.memoryUsage().heapUsed);

  const heapInterval = setInterval(() => {
    heapGauge.set(process.memoryUsage().heapUsed);
  }, 10000);
  heapInterval.unref();

  fastify.addHook('onResponse', async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url ?? request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
    httpRequestsTotal.inc(labels);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', register.contentType);
    return register.metrics();
  });

  fastify.decorate('metrics', { conversationEvents });

  fastify.addHook('onClose', async () => {
    clearInterval(heapInterval);
  });

  fastify.log.info('Metrics plugin registered - /metrics endpoint available');
}

export default fp(metricsPlugin, {
  name: 'metrics-plugin',
});
