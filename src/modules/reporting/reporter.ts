// src/modules/reporting/reporter.ts

import { describeProbe } from '../probes/probes.service.js';
import type { Probe } from '../probes/probes.types.js';
import type {
  OverallStatus,
  ProbeOutcome,
  ReadinessReport,
  ServiceResult,
  ServiceStatus,
} from '../readiness/readiness.types.js';
import type { ExitPolicy, ReadinessReportDto, ReportFormat, ServiceResultDto } from './reporting.types.js';

const STATUS_GLYPHS: Record<ServiceStatus, string> = {
  healthy: '✓',
  degraded: '⚠',
  unhealthy: '✗',
  skipped: '○',
};

export function toReportDto(report: ReadinessReport): ReadinessReportDto {
  return {
    generatedAt: report.generatedAt,
    overallStatus: report.overallStatus,
    summary: { ...report.summary },
    results: report.results.map(toServiceResultDto),
  };
}

function toServiceResultDto(result: ServiceResult): ServiceResultDto {
  const { service } = result;
  return {
    service: {
      name: service.name,
      required: service.required,
      timeoutMs: service.timeoutMs,
      retries: service.retries,
      backoffMs: service.backoffMs,
    },
    finalStatus: result.finalStatus,
    durationMs: result.durationMs,
    diagnostic: result.diagnostic ?? null,
    outcomes: result.outcomes.map((outcome) => ({
      probe: describeProbe(outcome.probe),
      type: outcome.probe.type,
      succeeded: outcome.succeeded,
      latencyMs: outcome.latencyMs,
      diagnostic: outcome.diagnostic ?? null,
      attempt: outcome.attempt,
    })),
  };
}

function formatOverall(status: OverallStatus): string {
  return status.toUpperCase();
}

/** Last outcome of every probe that never succeeded, in declaration order. */
function failedProbes(result: ServiceResult): ProbeOutcome[] {
  const last = new Map<Probe, ProbeOutcome>();
  for (const outcome of result.outcomes) {
    last.set(outcome.probe, outcome);
  }
  return [...last.values()].filter((outcome) => !outcome.succeeded);
}

function renderText(report: ReadinessReport): string {
  const width = Math.max(0, ...report.results.map((result) => result.service.name.length));
  const lines = [`Readiness report (${report.generatedAt})`];

  for (const result of report.results) {
    const tag = result.service.required ? '' : ' (optional)';
    lines.push(
      `  ${STATUS_GLYPHS[result.finalStatus]} ${result.service.name.padEnd(width)}  ` +
        `${result.finalStatus.toUpperCase().padEnd(9)} ${result.durationMs}ms${tag}`
    );

    if (result.finalStatus === 'healthy') {
      continue;
    }
    if (result.diagnostic) {
      lines.push(`      -> ${result.diagnostic}`);
    }
    for (const outcome of failedProbes(result)) {
      const attempts = outcome.attempt === 1 ? '1 attempt' : `${outcome.attempt} attempts`;
      lines.push(`      -> ${describeProbe(outcome.probe)}: ${outcome.diagnostic ?? 'failed'} (${attempts})`);
    }
  }

  const { summary } = report;
  lines.push(
    `Summary: ${summary.healthy} healthy, ${summary.unhealthy} unhealthy, ${summary.degraded} degraded, ` +
      `${summary.skipped} skipped (${summary.total} total) - overall ${formatOverall(report.overallStatus)}`
  );

  return lines.join('\n');
}

/**
 * Render a report. Pure: the caller decides where the output goes and
 * which exit code follows from it (see {@link exitCodeFor}).
 */
export function render(report: ReadinessReport, format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(toReportDto(report), null, 2);
  }
  return renderText(report);
}

export function exitCodeFor(status: OverallStatus, policy: ExitPolicy): 0 | 1 {
  if (policy === 'lenient') {
    return status === 'critical_failure' ? 1 : 0;
  }
  return status === 'all_healthy' ? 0 : 1;
}
