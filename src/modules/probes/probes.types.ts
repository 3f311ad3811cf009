// src/modules/probes/probes.types.ts

/**
 * @fileoverview Type definitions for the probes module.
 *
 * A probe is a single check against one dependency. Every variant resolves to
 * a {@link ProbeCheck}; failures are reported as data, never thrown.
 */

export type JsonScalar = string | number | boolean;

export interface BodyPredicate {
  /** Substring the raw response body must contain. */
  contains?: string;
  /** Dot path into the parsed JSON body and the value found there. */
  json?: {
    path: string;
    equals: JsonScalar;
  };
}

interface ProbeBase {
  /** Display label; defaults to a description built from the probe's target. */
  name?: string;
  /** A failing non-critical probe degrades its service instead of failing it. */
  critical: boolean;
}

export interface HttpProbe extends ProbeBase {
  type: 'http';
  url: string;
  expectedStatus: number[];
  body?: BodyPredicate;
}

export interface TcpProbe extends ProbeBase {
  type: 'tcp';
  host: string;
  port: number;
}

export interface CommandProbe extends ProbeBase {
  type: 'command';
  command: string;
  expectExitCode: number;
  stdoutIncludes?: string;
  /** Keywords that must not appear in stdout or stderr (case-insensitive). */
  outputExcludes?: string[];
}

export interface EnvProbe extends ProbeBase {
  type: 'env';
  variable: string;
  pattern?: string;
}

export type Probe = HttpProbe | TcpProbe | CommandProbe | EnvProbe;

export type ProbeType = Probe['type'];

export interface ProbeCheck {
  ok: boolean;
  diagnostic?: string;
}

export type ProbeChecker<P extends Probe = Probe> = (probe: P, signal: AbortSignal) => Promise<ProbeCheck>;

/** One checker per probe variant, keyed by the variant's `type`. */
export type ProbeCheckers = {
  [K in ProbeType]: ProbeChecker<Extract<Probe, { type: K }>>;
};
