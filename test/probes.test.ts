import Fastify, { type FastifyInstance } from 'fastify';
import { createServer, type Server } from 'node:net';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { checkCommand, evaluateCommandOutput } from '../src/modules/probes/command.probe.js';
import { createEnvChecker } from '../src/modules/probes/env.probe.js';
import { checkHttp, evaluateBody, readJsonPath } from '../src/modules/probes/http.probe.js';
import { describeProbe } from '../src/modules/probes/probes.service.js';
import type { CommandProbe, EnvProbe, TcpProbe } from '../src/modules/probes/probes.types.js';
import { checkTcp } from '../src/modules/probes/tcp.probe.js';
import { httpProbe } from './helpers.js';

const LOOPBACK = '127.0.0.1';

function signal(): AbortSignal {
    return new AbortController().signal;
}

async function listen(server: Server): Promise<number> {
    await new Promise<void>((resolve) => server.listen(0, LOOPBACK, resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
    }
    return address.port;
}

/** A port that was free a moment ago, so connecting to it is refused. */
async function closedPort(): Promise<number> {
    const server = createServer();
    const port = await listen(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    return port;
}

describe('http probe', () => {
    let app: FastifyInstance;
    let baseUrl: string;

    beforeAll(async () => {
        app = Fastify({ logger: false });
        app.get('/health', async () => ({ status: 'healthy', checks: { db: 'up' } }));
        app.get('/down', async (_request, reply) => reply.code(503).send({ status: 'unhealthy' }));
        app.get('/plain', async (_request, reply) => reply.type('text/plain').send('qdrant - vector search engine'));
        app.get('/slow', async () => {
            await new Promise((resolve) => setTimeout(resolve, 200));
            return { status: 'healthy' };
        });
        baseUrl = await app.listen({ port: 0, host: LOOPBACK });
    });

    afterAll(async () => {
        await app.close();
    });

    it('succeeds on the expected status and matching JSON field', async () => {
        const probe = httpProbe(`${baseUrl}/health`, { body: { json: { path: 'checks.db', equals: 'up' } } });
        await expect(checkHttp(probe, signal())).resolves.toEqual({ ok: true });
    });

    it('fails on an unexpected status', async () => {
        await expect(checkHttp(httpProbe(`${baseUrl}/down`), signal())).resolves.toEqual({
            ok: false,
            diagnostic: 'HTTP 503 (expected 200)',
        });
    });

    it('accepts any of several expected statuses', async () => {
        const probe = httpProbe(`${baseUrl}/down`, { expectedStatus: [200, 503] });
        await expect(checkHttp(probe, signal())).resolves.toEqual({ ok: true });
    });

    it('fails when the JSON field has another value', async () => {
        const probe = httpProbe(`${baseUrl}/health`, { body: { json: { path: 'status', equals: 'ready' } } });
        await expect(checkHttp(probe, signal())).resolves.toEqual({
            ok: false,
            diagnostic: 'status is "healthy", expected "ready"',
        });
    });

    it('checks a plain-text body for a substring', async () => {
        const ok = httpProbe(`${baseUrl}/plain`, { body: { contains: 'qdrant' } });
        const missing = httpProbe(`${baseUrl}/plain`, { body: { contains: 'ollama' } });

        await expect(checkHttp(ok, signal())).resolves.toEqual({ ok: true });
        await expect(checkHttp(missing, signal())).resolves.toEqual({
            ok: false,
            diagnostic: 'body does not contain "ollama"',
        });
    });

    it('folds a refused connection into a failed check', async () => {
        const port = await closedPort();
        const result = await checkHttp(httpProbe(`http://${LOOPBACK}:${port}/health`), signal());

        expect(result.ok).toBe(false);
        expect(result.diagnostic).toMatch(/^ECONNREFUSED/);
    });

    it('stops waiting when the signal aborts', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 20);

        const started = Date.now();
        const result = await checkHttp(httpProbe(`${baseUrl}/slow`), controller.signal);

        expect(result.ok).toBe(false);
        expect(Date.now() - started).toBeLessThan(150);
    });
});

describe('evaluateBody', () => {
    it('passes without a predicate', () => {
        expect(evaluateBody(undefined, '')).toEqual({ ok: true });
    });

    it('reports a missing JSON field', () => {
        expect(evaluateBody({ json: { path: 'service.status', equals: 'healthy' } }, '{"service":{}}')).toEqual({
            ok: false,
            diagnostic: 'service.status is missing, expected "healthy"',
        });
    });

    it('reports a body that is not JSON', () => {
        expect(evaluateBody({ json: { path: 'status', equals: 'healthy' } }, '<html>')).toEqual({
            ok: false,
            diagnostic: 'body is not valid JSON',
        });
    });

    it('compares numbers and booleans strictly', () => {
        expect(evaluateBody({ json: { path: 'ready', equals: true } }, '{"ready":"true"}')).toEqual({
            ok: false,
            diagnostic: 'ready is "true", expected true',
        });
        expect(evaluateBody({ json: { path: 'models', equals: 2 } }, '{"models":2}')).toEqual({ ok: true });
    });
});

describe('readJsonPath', () => {
    it('follows object keys and array indexes', () => {
        expect(readJsonPath({ models: [{ name: 'llama3' }] }, 'models.0.name')).toBe('llama3');
        expect(readJsonPath({ a: null }, 'a.b')).toBeUndefined();
    });
});

describe('tcp probe', () => {
    let server: Server;
    let port: number;

    beforeAll(async () => {
        server = createServer((socket) => socket.end());
        port = await listen(server);
    });

    afterAll(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    function tcpProbe(target: number): TcpProbe {
        return { type: 'tcp', host: LOOPBACK, port: target, critical: true };
    }

    it('succeeds when the port accepts connections', async () => {
        await expect(checkTcp(tcpProbe(port), signal())).resolves.toEqual({ ok: true });
    });

    it('fails with the connection error when nothing listens', async () => {
        const target = await closedPort();
        const result = await checkTcp(tcpProbe(target), signal());

        expect(result).toEqual({ ok: false, diagnostic: `connect ECONNREFUSED ${LOOPBACK}:${target}` });
    });

    it('does not connect with an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(checkTcp(tcpProbe(port), controller.signal)).resolves.toEqual({ ok: false, diagnostic: 'aborted' });
    });
});

describe('command probe', () => {
    const node = `"${process.execPath}"`;

    function commandProbe(command: string, overrides: Partial<CommandProbe> = {}): CommandProbe {
        return { type: 'command', command, expectExitCode: 0, critical: true, ...overrides };
    }

    it('succeeds when the exit code and stdout match', async () => {
        const probe = commandProbe(`${node} -e "process.stdout.write('PONG')"`, { stdoutIncludes: 'PONG' });
        await expect(checkCommand(probe, signal())).resolves.toEqual({ ok: true });
    });

    it('reports the exit code and first stderr line on failure', async () => {
        const probe = commandProbe(`${node} -e "process.stderr.write('boom\\nmore'); process.exit(3)"`);
        await expect(checkCommand(probe, signal())).resolves.toEqual({ ok: false, diagnostic: 'exit code 3: boom' });
    });

    it('accepts a non-zero exit code when it is the expected one', async () => {
        const probe = commandProbe(`${node} -e "process.exit(1)"`, { expectExitCode: 1 });
        await expect(checkCommand(probe, signal())).resolves.toEqual({ ok: true });
    });

    it('kills the command when the signal aborts', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 50);

        const started = Date.now();
        const result = await checkCommand(commandProbe(`${node} -e "setTimeout(() => {}, 5000)"`), controller.signal);

        expect(result).toEqual({ ok: false, diagnostic: 'aborted' });
        expect(Date.now() - started).toBeLessThan(2000);
    });
});

describe('evaluateCommandOutput', () => {
    const probe: CommandProbe = {
        type: 'command',
        command: 'docker logs wellness_backend',
        expectExitCode: 0,
        outputExcludes: ['error', 'traceback'],
        critical: false,
    };

    it('flags excluded keywords in either stream, case-insensitively', () => {
        expect(evaluateCommandOutput(probe, { exitCode: 0, stdout: 'INFO started\n', stderr: 'Traceback (most recent call last)' })).toEqual({
            ok: false,
            diagnostic: 'output contains "traceback"',
        });
    });

    it('passes clean output', () => {
        expect(evaluateCommandOutput(probe, { exitCode: 0, stdout: 'INFO started\n', stderr: '' })).toEqual({ ok: true });
    });

    it('reports missing stdout text', () => {
        expect(
            evaluateCommandOutput({ ...probe, outputExcludes: undefined, stdoutIncludes: 'PONG' }, { exitCode: 0, stdout: 'LOADING', stderr: '' })
        ).toEqual({ ok: false, diagnostic: 'stdout does not contain "PONG"' });
    });
});

describe('env probe', () => {
    const check = createEnvChecker({ REDIS_URL: 'redis://cache:6379', EMPTY: '' });

    function envProbe(variable: string, pattern?: string): EnvProbe {
        return { type: 'env', variable, pattern, critical: true };
    }

    it('succeeds for a set variable', async () => {
        await expect(check(envProbe('REDIS_URL'), signal())).resolves.toEqual({ ok: true });
    });

    it('treats empty and unset variables as missing', async () => {
        await expect(check(envProbe('EMPTY'), signal())).resolves.toEqual({ ok: false, diagnostic: 'EMPTY is not set' });
        await expect(check(envProbe('NOPE'), signal())).resolves.toEqual({ ok: false, diagnostic: 'NOPE is not set' });
    });

    it('checks the value against the pattern without revealing it', async () => {
        await expect(check(envProbe('REDIS_URL', '^redis://'), signal())).resolves.toEqual({ ok: true });
        await expect(check(envProbe('REDIS_URL', '^https'), signal())).resolves.toEqual({
            ok: false,
            diagnostic: 'REDIS_URL does not match /^https/',
        });
    });

    it('reports a pattern that does not compile', async () => {
        await expect(check(envProbe('REDIS_URL', '(unclosed'), signal())).resolves.toEqual({
            ok: false,
            diagnostic: 'invalid pattern /(unclosed/',
        });
    });
});

describe('describeProbe', () => {
    it('labels each variant by its target', () => {
        expect(describeProbe(httpProbe('http://localhost:8000/health'))).toBe('http GET http://localhost:8000/health');
        expect(describeProbe({ type: 'tcp', host: 'db', port: 5432, critical: true })).toBe('tcp db:5432');
        expect(describeProbe({ type: 'command', command: 'redis-cli ping', expectExitCode: 0, critical: true })).toBe(
            'command redis-cli ping'
        );
        expect(describeProbe({ type: 'env', variable: 'QDRANT_URL', critical: true })).toBe('env QDRANT_URL');
    });

    it('prefers the probe name', () => {
        expect(describeProbe(httpProbe('http://localhost:8000/health', { name: 'backend health' }))).toBe('backend health');
    });
});
