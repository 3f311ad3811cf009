// src/modules/probes/http.probe.ts

import axios from 'axios';
import type { BodyPredicate, HttpProbe, ProbeCheck } from './probes.types.js';

const MAX_REDIRECTS = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Resolve a dot path (`checks.db.status`) against a parsed JSON value.
 * Returns `undefined` when any segment is missing.
 */
export function readJsonPath(value: unknown, path: string): unknown {
  return path.split('.').reduce<unknown>((current, key) => (isRecord(current) ? current[key] : undefined), value);
}

/**
 * Evaluate a body predicate against a raw response body.
 * Health endpoints usually answer `{"status":"healthy"}`, so the JSON
 * predicate is the primary signal and `contains` the fallback.
 */
export function evaluateBody(predicate: BodyPredicate | undefined, body: string): ProbeCheck {
  if (!predicate) {
    return { ok: true };
  }

  if (predicate.contains !== undefined && !body.includes(predicate.contains)) {
    return { ok: false, diagnostic: `body does not contain "${predicate.contains}"` };
  }

  if (predicate.json) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return { ok: false, diagnostic: 'body is not valid JSON' };
    }

    const { path, equals } = predicate.json;
    const actual = readJsonPath(parsed, path);
    if (actual === undefined) {
      return { ok: false, diagnostic: `${path} is missing, expected ${JSON.stringify(equals)}` };
    }
    if (actual !== equals) {
      return { ok: false, diagnostic: `${path} is ${JSON.stringify(actual)}, expected ${JSON.stringify(equals)}` };
    }
  }

  return { ok: true };
}

/**
 * GET the probe URL and compare status and body.
 * Every status is accepted by axios so that the comparison happens here;
 * connection and DNS errors become failed checks.
 */
export async function checkHttp(probe: HttpProbe, signal: AbortSignal): Promise<ProbeCheck> {
  try {
    const response = await axios.get<unknown>(probe.url, {
      signal,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      maxRedirects: MAX_REDIRECTS,
    });

    if (!probe.expectedStatus.includes(response.status)) {
      return {
        ok: false,
        diagnostic: `HTTP ${response.status} (expected ${probe.expectedStatus.join(' or ')})`,
      };
    }

    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
    return evaluateBody(probe.body, body);
  } catch (error) {
    if (axios.isAxiosError(error) && error.code) {
      return { ok: false, diagnostic: `${error.code}: ${error.message}` };
    }
    return { ok: false, diagnostic: error instanceof Error ? error.message : 'Unknown error' };
  }
}
