// src/config/services.config.ts

import { readFile } from 'node:fs/promises';
import type { ZodIssue } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { type PolicyDefaults, type ServiceConfig, ServicesFileSchema } from '../lib/schemas.js';
import type { Probe } from '../modules/probes/probes.types.js';
import type { ServiceSpec } from '../modules/readiness/readiness.types.js';

/**
 * @fileoverview Loads the service declaration file into immutable
 * {@link ServiceSpec}s. Every problem is a {@link ConfigurationError}.
 */

export const BUILTIN_DEFAULTS = Object.freeze({
  timeoutSeconds: 5,
  retries: 2,
  backoffSeconds: 2,
  backoffMultiplier: 1,
});

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Replace `${VAR}` and `${VAR:-fallback}` in every string of a parsed JSON
 * value. Names of unset variables without a fallback are added to `missing`.
 */
export function expandPlaceholders(value: unknown, env: NodeJS.ProcessEnv, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER, (match: string, name: string, fallback: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined && resolved !== '') {
        return resolved;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      missing.add(name);
      return match;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandPlaceholders(item, env, missing));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandPlaceholders(item, env, missing)])
    );
  }
  return value;
}

function toServiceSpec(service: ServiceConfig, defaults: PolicyDefaults): ServiceSpec {
  const timeoutSeconds = service.timeoutSeconds ?? defaults.timeoutSeconds ?? BUILTIN_DEFAULTS.timeoutSeconds;
  const backoffSeconds = service.backoffSeconds ?? defaults.backoffSeconds ?? BUILTIN_DEFAULTS.backoffSeconds;
  const maxBackoffSeconds = service.maxBackoffSeconds ?? defaults.maxBackoffSeconds;

  return Object.freeze({
    name: service.name,
    probes: Object.freeze(service.probes.map((probe): Probe => Object.freeze(probe))),
    required: service.required,
    timeoutMs: secondsToMs(timeoutSeconds),
    retries: service.retries ?? defaults.retries ?? BUILTIN_DEFAULTS.retries,
    backoffMs: secondsToMs(backoffSeconds),
    backoffMultiplier: service.backoffMultiplier ?? defaults.backoffMultiplier ?? BUILTIN_DEFAULTS.backoffMultiplier,
    ...(maxBackoffSeconds !== undefined ? { maxBackoffMs: secondsToMs(maxBackoffSeconds) } : {}),
  });
}

/** Validate an already-parsed declaration and build the service specs. */
export function parseServiceSpecs(raw: unknown, env: NodeJS.ProcessEnv = process.env): ServiceSpec[] {
  const missing = new Set<string>();
  const expanded = expandPlaceholders(raw, env, missing);

  if (missing.size > 0) {
    throw new ConfigurationError(
      'Service configuration references unset environment variables',
      [...missing].map((name) => `${name} is not set and has no fallback`)
    );
  }

  const result = ServicesFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigurationError('Service configuration is invalid', result.error.issues.map(formatIssue));
  }

  const defaults = result.data.defaults ?? {};
  return result.data.services.map((service) => toServiceSpec(service, defaults));
}

/** Read, parse and validate the JSON declaration file at `path`. */
export async function loadServiceSpecs(path: string, env: NodeJS.ProcessEnv = process.env): Promise<ServiceSpec[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read service configuration: ${path}`, [reason]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Service configuration is not valid JSON: ${path}`, [reason]);
  }

  return parseServiceSpecs(raw, env);
}
