// src/modules/probes/probes.service.ts

import { checkCommand } from './command.probe.js';
import { createEnvChecker } from './env.probe.js';
import { checkHttp } from './http.probe.js';
import type { Probe, ProbeCheck, ProbeCheckers } from './probes.types.js';
import { checkTcp } from './tcp.probe.js';

/**
 * @fileoverview Dispatch from a probe to the checker for its variant.
 */

export function createDefaultCheckers(env: NodeJS.ProcessEnv = process.env): ProbeCheckers {
  return {
    http: checkHttp,
    tcp: checkTcp,
    command: checkCommand,
    env: createEnvChecker(env),
  };
}

export function runCheck(checkers: ProbeCheckers, probe: Probe, signal: AbortSignal): Promise<ProbeCheck> {
  switch (probe.type) {
    case 'http':
      return checkers.http(probe, signal);
    case 'tcp':
      return checkers.tcp(probe, signal);
    case 'command':
      return checkers.command(probe, signal);
    case 'env':
      return checkers.env(probe, signal);
  }
}

/** One-line label used in logs and reports. */
export function describeProbe(probe: Probe): string {
  if (probe.name) {
    return probe.name;
  }
  switch (probe.type) {
    case 'http':
      return `http GET ${probe.url}`;
    case 'tcp':
      return `tcp ${probe.host}:${probe.port}`;
    case 'command':
      return `command ${probe.command}`;
    case 'env':
      return `env ${probe.variable}`;
  }
}
