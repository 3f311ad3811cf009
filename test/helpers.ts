import { pino } from 'pino';
import type { HttpProbe, ProbeCheck } from '../src/modules/probes/probes.types.js';
import type { ServiceSpec } from '../src/modules/readiness/readiness.types.js';

export const silentLogger = pino({ level: 'silent' });

export function httpProbe(url: string, overrides: Partial<HttpProbe> = {}): HttpProbe {
    return { type: 'http', url, expectedStatus: [200], critical: true, ...overrides };
}

export function makeSpec(name: string, overrides: Partial<ServiceSpec> = {}): ServiceSpec {
    return {
        name,
        probes: [httpProbe(`http://${name}.test/health`)],
        required: true,
        timeoutMs: 500,
        retries: 2,
        backoffMs: 1,
        backoffMultiplier: 1,
        ...overrides,
    };
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** A check that only settles if its signal aborts, and then as a failure. */
export function hangUntilAborted(signal: AbortSignal): Promise<ProbeCheck> {
    return new Promise((resolve) => {
        signal.addEventListener('abort', () => resolve({ ok: false, diagnostic: 'aborted' }), { once: true });
    });
}
