// src/modules/readiness/readiness.types.ts

import type { Probe } from '../probes/probes.types.js';

/**
 * @fileoverview Type definitions for the readiness module.
 */

export interface ServiceSpec {
  readonly name: string;
  readonly probes: readonly Probe[];
  /** Whether a failure of this service makes the whole run a critical failure. */
  readonly required: boolean;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly backoffMs: number;
  /** Growth factor applied to the backoff after each failed attempt; 1 keeps it constant. */
  readonly backoffMultiplier: number;
  readonly maxBackoffMs?: number;
}

export interface ProbeOutcome {
  readonly probe: Probe;
  readonly succeeded: boolean;
  readonly latencyMs: number;
  readonly diagnostic?: string;
  /** 1-based attempt number within the probe's retry budget. */
  readonly attempt: number;
}

export type ServiceStatus = 'healthy' | 'unhealthy' | 'degraded' | 'skipped';

export interface ServiceResult {
  readonly service: ServiceSpec;
  readonly outcomes: readonly ProbeOutcome[];
  readonly finalStatus: ServiceStatus;
  readonly durationMs: number;
  readonly diagnostic?: string;
}

export type OverallStatus = 'all_healthy' | 'partial_failure' | 'critical_failure';

export interface ReadinessSummary {
  total: number;
  healthy: number;
  unhealthy: number;
  degraded: number;
  skipped: number;
}

export interface ReadinessReport {
  readonly results: readonly ServiceResult[];
  readonly generatedAt: string;
  readonly overallStatus: OverallStatus;
  readonly summary: Readonly<ReadinessSummary>;
}

export interface EvaluateOptions {
  /** Upper bound on services probed at the same time. */
  maxConcurrency: number;
  /** Global deadline for the whole run; unset means no deadline. */
  deadlineMs?: number;
}

export const TIMEOUT_DIAGNOSTIC = 'timeout';
export const DEADLINE_DIAGNOSTIC = 'deadline exceeded';
