// src/modules/readiness/readiness.service.ts

import type { FastifyBaseLogger } from 'fastify';
import pLimit from 'p-limit';
import type { ProbeRunner } from './probe-runner.js';
import {
  DEADLINE_DIAGNOSTIC,
  type EvaluateOptions,
  type OverallStatus,
  type ReadinessReport,
  type ReadinessSummary,
  type ServiceResult,
  type ServiceSpec,
} from './readiness.types.js';

/**
 * @fileoverview Runs the probe runner over a set of services and folds the
 * results into a {@link ReadinessReport}.
 */

/**
 * A required service that is not healthy (including degraded or skipped)
 * makes the run a critical failure; optional ones only a partial failure.
 */
export function deriveOverallStatus(results: readonly ServiceResult[]): OverallStatus {
  const notHealthy = results.filter((result) => result.finalStatus !== 'healthy');
  if (notHealthy.some((result) => result.service.required)) {
    return 'critical_failure';
  }
  return notHealthy.length > 0 ? 'partial_failure' : 'all_healthy';
}

export function summarize(results: readonly ServiceResult[]): ReadinessSummary {
  const summary: ReadinessSummary = { total: results.length, healthy: 0, unhealthy: 0, degraded: 0, skipped: 0 };
  for (const result of results) {
    summary[result.finalStatus] += 1;
  }
  return summary;
}

export function buildReport(results: readonly ServiceResult[], now: Date = new Date()): ReadinessReport {
  return Object.freeze({
    results: Object.freeze([...results]),
    generatedAt: now.toISOString(),
    overallStatus: deriveOverallStatus(results),
    summary: Object.freeze(summarize(results)),
  });
}

function skippedResult(spec: ServiceSpec): ServiceResult {
  return { service: spec, outcomes: [], finalStatus: 'skipped', durationMs: 0, diagnostic: DEADLINE_DIAGNOSTIC };
}

/**
 * Evaluates services concurrently, at most `maxConcurrency` at a time.
 *
 * Each task returns its own {@link ServiceResult}; nothing is shared between
 * tasks, and results keep the order of the input specs. When the global
 * deadline fires, running tasks are aborted and report what they recorded
 * so far; queued ones are dropped and reported as skipped with no outcomes.
 */
export class ReadinessCoordinator {
  private readonly logger: FastifyBaseLogger;

  constructor(
    private readonly runner: ProbeRunner,
    logger: FastifyBaseLogger
  ) {
    this.logger = logger.child({ component: 'ReadinessCoordinator' });
  }

  async evaluate(specs: readonly ServiceSpec[], options: EvaluateOptions): Promise<ReadinessReport> {
    const controller = new AbortController();
    const limit = pLimit(Math.max(1, options.maxConcurrency));
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<void>((resolve) => {
      if (options.deadlineMs === undefined) {
        return;
      }
      timer = setTimeout(() => {
        this.logger.warn({ deadlineMs: options.deadlineMs, pending: limit.pendingCount }, 'Readiness deadline exceeded');
        limit.clearQueue();
        controller.abort();
        resolve();
      }, options.deadlineMs);
    });

    this.logger.info(
      { services: specs.length, maxConcurrency: options.maxConcurrency, deadlineMs: options.deadlineMs },
      'Evaluating service readiness'
    );

    try {
      const results = await Promise.all(
        specs.map((spec) => {
          let started = false;
          const task = limit(() => {
            started = true;
            return this.runner.run(spec, { signal: controller.signal });
          });
          // A running task settles right after the abort and keeps its outcomes
          return Promise.race([task, deadline.then(() => (started ? task : skippedResult(spec)))]);
        })
      );

      const report = buildReport(results);
      this.logger.info({ overallStatus: report.overallStatus, ...report.summary }, 'Readiness evaluation complete');
      return report;
    } finally {
      clearTimeout(timer);
    }
  }
}
