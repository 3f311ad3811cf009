import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import type { AppConfig } from './config/validation.js';
import { buildLoggerOptions, type LoggerSettings } from './lib/logger.js';
import { ProbeRunner } from './modules/readiness/probe-runner.js';
import { readinessRoutes } from './modules/readiness/readiness.controller.js';
import { ReadinessCoordinator } from './modules/readiness/readiness.service.js';
import type { ServiceSpec } from './modules/readiness/readiness.types.js';
import type { ExitPolicy } from './modules/reporting/reporting.types.js';
import type { APIError, HealthCheck } from './types.js';
import { APP_VERSION } from './version.js';

export interface CreateServerOptions {
  config: AppConfig;
  specs: readonly ServiceSpec[];
  /** Overrides the coordinator built on the server's logger (for testing). */
  coordinator?: ReadinessCoordinator;
  logger?: boolean | LoggerSettings;
  policy?: ExitPolicy;
  maxConcurrency?: number;
  deadlineMs?: number;
}

const SLOW_REQUEST_THRESHOLD = 1000; // ms

/**
 * Create a new Fastify server exposing on-demand readiness evaluation.
 * This factory pattern enables proper test isolation by creating separate instances.
 */
export async function createServer(options: CreateServerOptions) {
  const { config } = options;
  const fastify = Fastify({
    logger: options.logger ?? buildLoggerOptions(config),
    genReqId: () => randomUUID(),
  });

  // Security middleware
  await fastify.register(helmet);

  // CORS middleware
  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS'],
  });

  // Request lifecycle logging - track performance and requests
  fastify.addHook('onRequest', async (request) => {
    request.log.info({ requestId: request.id, method: request.method, url: request.url }, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = reply.elapsedTime;
    const slow = duration > SLOW_REQUEST_THRESHOLD;

    request.log[slow ? 'warn' : 'info'](
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        duration: `${duration.toFixed(2)}ms`,
      },
      slow ? 'Slow request detected' : 'Request completed'
    );
  });

  const coordinator =
    options.coordinator ?? new ReadinessCoordinator(new ProbeRunner({ logger: fastify.log }), fastify.log);

  // Liveness of the checker itself, independent of the services it verifies
  fastify.get<{ Reply: HealthCheck }>('/health', async (_request, reply) => {
    return reply.code(200).send({
      status: 'healthy',
      uptime: process.uptime(),
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  readinessRoutes(fastify, {
    coordinator,
    specs: options.specs,
    policy: options.policy ?? config.READINESS_POLICY,
    maxConcurrency: options.maxConcurrency ?? config.READINESS_CONCURRENCY,
    deadlineMs:
      options.deadlineMs ??
      (config.READINESS_DEADLINE_SECONDS === undefined ? undefined : config.READINESS_DEADLINE_SECONDS * 1000),
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    const errorResponse: APIError = {
      status: 'error',
      message: 'Endpoint not found',
      code: 'NOT_FOUND',
      timestamp: new Date().toISOString(),
      endpoint: request.url,
      requestId: request.id,
    };
    return reply.code(404).send(errorResponse);
  });

  // Global error handler
  fastify.setErrorHandler((error, request, reply) => {
    fastify.log.error(error);

    const errorResponse: APIError = {
      status: 'error',
      message: error.message || 'Internal server error',
      code: 'INTERNAL_ERROR',
      timestamp: new Date().toISOString(),
      endpoint: request.url,
      requestId: request.id,
    };

    return reply.code(500).send(errorResponse);
  });

  return fastify;
}
