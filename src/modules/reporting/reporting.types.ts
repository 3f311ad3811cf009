// src/modules/reporting/reporting.types.ts

import type { ProbeType } from '../probes/probes.types.js';
import type { OverallStatus, ReadinessSummary, ServiceStatus } from '../readiness/readiness.types.js';

export type ReportFormat = 'text' | 'json';

/** `strict`: anything short of all-healthy fails. `lenient`: only critical failures do. */
export type ExitPolicy = 'strict' | 'lenient';

export interface ProbeOutcomeDto {
  probe: string;
  type: ProbeType;
  succeeded: boolean;
  latencyMs: number;
  diagnostic: string | null;
  attempt: number;
}

export interface ServiceResultDto {
  service: {
    name: string;
    required: boolean;
    timeoutMs: number;
    retries: number;
    backoffMs: number;
  };
  finalStatus: ServiceStatus;
  durationMs: number;
  diagnostic: string | null;
  outcomes: ProbeOutcomeDto[];
}

/** Machine-readable report, stable for CI consumers. */
export interface ReadinessReportDto {
  generatedAt: string;
  overallStatus: OverallStatus;
  summary: ReadinessSummary;
  results: ServiceResultDto[];
}
