// src/modules/readiness/probe-runner.ts

import type { FastifyBaseLogger } from 'fastify';
import { createDefaultCheckers, describeProbe, runCheck } from '../probes/probes.service.js';
import type { Probe, ProbeCheck, ProbeCheckers } from '../probes/probes.types.js';
import {
  DEADLINE_DIAGNOSTIC,
  TIMEOUT_DIAGNOSTIC,
  type ProbeOutcome,
  type ServiceResult,
  type ServiceSpec,
  type ServiceStatus,
} from './readiness.types.js';

export interface ProbeRunnerOptions {
  logger: FastifyBaseLogger;
  /** Replaces the default checker for individual probe variants. */
  checkers?: Partial<ProbeCheckers>;
  /** Environment read by `env` probes; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface RunOptions {
  /** Aborting stops the run; the result is then `skipped`. */
  signal?: AbortSignal;
}

const TIMED_OUT = Symbol('timeout');
const ABORTED = Symbol('aborted');

/** Delay before attempt `attempt + 1`, after `attempt` failures. */
export function backoffDelay(spec: ServiceSpec, attempt: number): number {
  const delay = spec.backoffMs * spec.backoffMultiplier ** (attempt - 1);
  return spec.maxBackoffMs === undefined ? delay : Math.min(delay, spec.maxBackoffMs);
}

/** Resolves `true` after `ms`, or `false` as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run one check bounded by `timeoutMs`. The check gets its own signal, which
 * aborts on timeout or when the run's signal aborts; the race guarantees the
 * attempt ends even when a checker ignores its signal.
 */
function attemptWithTimeout(
  checkers: ProbeCheckers,
  probe: Probe,
  timeoutMs: number,
  signal: AbortSignal
): Promise<ProbeCheck | typeof TIMED_OUT | typeof ABORTED> {
  const controller = new AbortController();

  return new Promise((resolve) => {
    const finish = (value: ProbeCheck | typeof TIMED_OUT | typeof ABORTED) => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      controller.abort();
      resolve(value);
    };
    const onAbort = () => finish(ABORTED);
    const timer = setTimeout(() => finish(TIMED_OUT), timeoutMs);
    signal.addEventListener('abort', onAbort, { once: true });

    runCheck(checkers, probe, controller.signal).then(finish, (error: unknown) =>
      finish({ ok: false, diagnostic: error instanceof Error ? error.message : String(error) })
    );
  });
}

/**
 * Executes the probes of a {@link ServiceSpec} under its retry policy.
 *
 * Probe failures (timeouts, refused connections, unmet predicates, checker
 * exceptions) are recorded as failed {@link ProbeOutcome}s; `run` never
 * rejects. The runner holds no per-run state and can be shared by
 * concurrent callers.
 */
export class ProbeRunner {
  private readonly logger: FastifyBaseLogger;
  private readonly checkers: ProbeCheckers;

  constructor(options: ProbeRunnerOptions) {
    this.logger = options.logger.child({ component: 'ProbeRunner' });
    this.checkers = { ...createDefaultCheckers(options.env), ...options.checkers };
  }

  async run(spec: ServiceSpec, options: RunOptions = {}): Promise<ServiceResult> {
    const signal = options.signal ?? new AbortController().signal;
    const startTime = Date.now();
    const outcomes: ProbeOutcome[] = [];
    let failedCritical = false;
    let failedOptional = false;

    for (const probe of spec.probes) {
      const label = describeProbe(probe);
      let succeeded = false;

      for (let attempt = 1; attempt <= spec.retries + 1; attempt++) {
        if (signal.aborted) {
          return this.skipped(spec, outcomes, startTime);
        }

        const attemptStart = Date.now();
        const result = await attemptWithTimeout(this.checkers, probe, spec.timeoutMs, signal);
        const latencyMs = Date.now() - attemptStart;

        if (result === ABORTED) {
          return this.skipped(spec, outcomes, startTime);
        }

        const check: ProbeCheck = result === TIMED_OUT ? { ok: false, diagnostic: TIMEOUT_DIAGNOSTIC } : result;
        outcomes.push({
          probe,
          succeeded: check.ok,
          latencyMs,
          diagnostic: check.diagnostic,
          attempt,
        });

        if (check.ok) {
          succeeded = true;
          break;
        }

        this.logger.debug(
          { service: spec.name, probe: label, attempt, latencyMs, diagnostic: check.diagnostic },
          'Probe attempt failed'
        );

        if (attempt <= spec.retries) {
          const completed = await sleep(backoffDelay(spec, attempt), signal);
          if (!completed) {
            return this.skipped(spec, outcomes, startTime);
          }
        }
      }

      if (!succeeded) {
        if (probe.critical) {
          failedCritical = true;
        } else {
          failedOptional = true;
        }
      }
    }

    const finalStatus: ServiceStatus = failedCritical ? 'unhealthy' : failedOptional ? 'degraded' : 'healthy';
    const durationMs = Date.now() - startTime;
    const logLevel = finalStatus === 'healthy' ? 'info' : 'warn';
    this.logger[logLevel]({ service: spec.name, status: finalStatus, durationMs }, 'Service checked');

    return { service: spec, outcomes, finalStatus, durationMs };
  }

  private skipped(spec: ServiceSpec, outcomes: ProbeOutcome[], startTime: number): ServiceResult {
    this.logger.warn({ service: spec.name }, 'Service check cancelled by deadline');
    return {
      service: spec,
      outcomes,
      finalStatus: 'skipped',
      durationMs: Date.now() - startTime,
      diagnostic: DEADLINE_DIAGNOSTIC,
    };
  }
}
