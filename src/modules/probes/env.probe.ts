// src/modules/probes/env.probe.ts

import type { EnvProbe, ProbeCheck, ProbeChecker } from './probes.types.js';

/**
 * Build a checker for environment-variable presence. Values are never
 * echoed into diagnostics since they are often credentials.
 */
export function createEnvChecker(env: NodeJS.ProcessEnv = process.env): ProbeChecker<EnvProbe> {
  return async (probe: EnvProbe): Promise<ProbeCheck> => {
    const value = env[probe.variable];

    if (value === undefined || value === '') {
      return { ok: false, diagnostic: `${probe.variable} is not set` };
    }

    if (probe.pattern !== undefined) {
      let matcher: RegExp;
      try {
        matcher = new RegExp(probe.pattern);
      } catch {
        return { ok: false, diagnostic: `invalid pattern /${probe.pattern}/` };
      }
      if (!matcher.test(value)) {
        return { ok: false, diagnostic: `${probe.variable} does not match /${probe.pattern}/` };
      }
    }

    return { ok: true };
  };
}
