// src/modules/readiness/readiness.controller.ts

import type { FastifyInstance } from 'fastify';
import { PolicyQuerySchema } from '../../lib/schemas.js';
import type { APIError, ApiResponse } from '../../types.js';
import { describeProbe } from '../probes/probes.service.js';
import { exitCodeFor, toReportDto } from '../reporting/reporter.js';
import type { ExitPolicy, ReadinessReportDto } from '../reporting/reporting.types.js';
import type { ReadinessCoordinator } from './readiness.service.js';
import type { ServiceSpec } from './readiness.types.js';

/**
 * @fileoverview REST endpoints for on-demand readiness evaluation.
 */

export interface ReadinessRouteDeps {
  coordinator: ReadinessCoordinator;
  specs: readonly ServiceSpec[];
  policy: ExitPolicy;
  maxConcurrency: number;
  deadlineMs?: number;
}

export interface DeclaredService {
  name: string;
  required: boolean;
  probes: string[];
}

export function readinessRoutes(fastify: FastifyInstance, deps: ReadinessRouteDeps) {
  // List the declared services and their probes
  fastify.get<{ Reply: ApiResponse<DeclaredService[]> }>('/readiness/services', async (_request, reply) => {
    const services = deps.specs.map((spec) => ({
      name: spec.name,
      required: spec.required,
      probes: spec.probes.map(describeProbe),
    }));

    return reply.code(200).send({
      status: 'success',
      data: services,
      timestamp: new Date().toISOString(),
    });
  });

  // Evaluate every declared service now
  fastify.get<{
    Querystring: { policy?: string };
    Reply: ApiResponse<ReadinessReportDto> | APIError;
  }>('/readiness', async (request, reply) => {
    const query = PolicyQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({
        status: 'error',
        message: 'policy must be "strict" or "lenient"',
        code: 'INVALID_QUERY',
        timestamp: new Date().toISOString(),
        endpoint: '/readiness',
        requestId: request.id,
      });
    }

    const policy = query.data.policy ?? deps.policy;

    try {
      const report = await deps.coordinator.evaluate(deps.specs, {
        maxConcurrency: deps.maxConcurrency,
        deadlineMs: deps.deadlineMs,
      });

      // Unhealthy under the policy maps to 503
      const statusCode = exitCodeFor(report.overallStatus, policy) === 0 ? 200 : 503;
      return reply.code(statusCode).send({
        status: 'success',
        data: toReportDto(report),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      request.log.error(error, 'Error evaluating readiness');
      return reply.code(500).send({
        status: 'error',
        message: 'Failed to evaluate readiness',
        code: 'READINESS_EVALUATION_FAILED',
        timestamp: new Date().toISOString(),
        endpoint: '/readiness',
        requestId: request.id,
      });
    }
  });
}
