import type { FastifyBaseLogger } from 'fastify';
import { loadServiceSpecs } from './config/services.config.js';
import { type AppConfig, validateAndLoadConfig } from './config/validation.js';
import { ConfigurationError, INVOCATION_ERROR_EXIT_CODE } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { CliOptionsSchema, type CliOptions } from './lib/schemas.js';
import type { ProbeCheckers } from './modules/probes/probes.types.js';
import { ProbeRunner } from './modules/readiness/probe-runner.js';
import { ReadinessCoordinator } from './modules/readiness/readiness.service.js';
import type { ServiceSpec } from './modules/readiness/readiness.types.js';
import { exitCodeFor, render } from './modules/reporting/reporter.js';
import type { ExitPolicy, ReportFormat } from './modules/reporting/reporting.types.js';
import { createServer } from './server.js';
import { APP_NAME, APP_VERSION } from './version.js';

export type CliCommand = 'check' | 'serve' | 'help' | 'version';

export interface ParsedArgs {
  command: CliCommand;
  options: CliOptions;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Replaces the pino logger built from the environment. */
  logger?: FastifyBaseLogger;
  /** Replaces probe checkers (for testing). */
  checkers?: Partial<ProbeCheckers>;
}

const COMMANDS: readonly CliCommand[] = ['check', 'serve', 'help', 'version'];

const FLAGS: Record<string, keyof CliOptions> = {
  '--config': 'config',
  '-c': 'config',
  '--format': 'format',
  '-f': 'format',
  '--concurrency': 'concurrency',
  '--deadline': 'deadline',
  '--policy': 'policy',
};

const USAGE = [
  `Usage: readiness [check|serve] [options]`,
  '',
  'Commands:',
  '  check (default)            Probe every declared service once and print the report',
  '  serve                      Start an HTTP server exposing GET /readiness',
  '',
  'Options:',
  '  -c, --config <path>        Service declaration file (env READINESS_CONFIG, default readiness.json)',
  '  -f, --format text|json     Report format (env READINESS_FORMAT, default text)',
  '      --concurrency <n>      Services probed at the same time (env READINESS_CONCURRENCY, default 4)',
  '      --deadline <seconds>   Global deadline for the run (env READINESS_DEADLINE_SECONDS)',
  '      --policy strict|lenient',
  '                             strict: any failure exits 1; lenient: only required failures do',
  '  -h, --help                 Show this help',
  '  -v, --version              Show the version',
  '',
  'Exit codes:',
  '  0  healthy under the policy',
  '  1  unhealthy under the policy',
  '  2  invocation error (bad flags or configuration)',
].join('\n');

function isCommand(token: string): token is CliCommand {
  return COMMANDS.some((command) => command === token);
}

/**
 * Parse argv (without the node and script entries).
 * Accepts `--flag value` and `--flag=value`.
 *
 * @throws ConfigurationError on unknown flags, missing values or invalid values.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let command: CliCommand = 'check';
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';

    if (token === '--help' || token === '-h') {
      return { command: 'help', options: {} };
    }
    if (token === '--version' || token === '-v') {
      return { command: 'version', options: {} };
    }
    if (i === 0 && isCommand(token)) {
      command = token;
      continue;
    }

    const [flag = '', inlineValue] = token.split(/=(.*)/s, 2);
    const key = FLAGS[flag];
    if (!key) {
      throw new ConfigurationError(`Unknown argument: ${token}`);
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('-'))) {
      throw new ConfigurationError(`Missing value for ${flag}`);
    }
    if (inlineValue === undefined) {
      i += 1;
    }
    raw[key] = value;
  }

  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid command-line arguments',
      result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return { command, options: result.data };
}

export function formatConfigurationError(error: ConfigurationError): string {
  return [`❌ ${error.message}`, ...error.issues.map((issue) => `   - ${issue}`)].join('\n');
}

interface RunSettings {
  configPath: string;
  format: ReportFormat;
  policy: ExitPolicy;
  maxConcurrency: number;
  deadlineMs?: number;
}

function resolveSettings(options: CliOptions, config: AppConfig): RunSettings {
  const deadlineSeconds = options.deadline ?? config.READINESS_DEADLINE_SECONDS;
  return {
    configPath: options.config ?? config.READINESS_CONFIG,
    format: options.format ?? config.READINESS_FORMAT,
    policy: options.policy ?? config.READINESS_POLICY,
    maxConcurrency: options.concurrency ?? config.READINESS_CONCURRENCY,
    deadlineMs: deadlineSeconds === undefined ? undefined : Math.round(deadlineSeconds * 1000),
  };
}

async function check(
  specs: readonly ServiceSpec[],
  settings: RunSettings,
  logger: FastifyBaseLogger,
  io: CliIo
): Promise<number> {
  const runner = new ProbeRunner({ logger, checkers: io.checkers, env: io.env });
  const coordinator = new ReadinessCoordinator(runner, logger);

  const report = await coordinator.evaluate(specs, {
    maxConcurrency: settings.maxConcurrency,
    deadlineMs: settings.deadlineMs,
  });

  io.stdout(render(report, settings.format));
  return exitCodeFor(report.overallStatus, settings.policy);
}

async function serve(specs: readonly ServiceSpec[], settings: RunSettings, config: AppConfig): Promise<number> {
  const fastify = await createServer({
    config,
    specs,
    policy: settings.policy,
    maxConcurrency: settings.maxConcurrency,
    deadlineMs: settings.deadlineMs,
  });

  await fastify.listen({ port: config.PORT, host: config.HOST });
  fastify.log.info(`🚀 ${APP_NAME} listening on http://${config.HOST}:${config.PORT}`);
  fastify.log.info('📋 Available endpoints:');
  fastify.log.info('    GET  /health              - Liveness of this server');
  fastify.log.info('    GET  /readiness           - Evaluate all declared services');
  fastify.log.info('    GET  /readiness/services  - Declared services and probes');

  // Graceful shutdown
  return new Promise((resolve) => {
    const shutdown = (signal: string) => {
      fastify.log.info(`Received ${signal}, shutting down gracefully`);
      fastify.close().then(
        () => resolve(0),
        (error: unknown) => {
          fastify.log.error({ error }, 'Error during shutdown');
          resolve(1);
        }
      );
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  });
}

/**
 * Run the CLI and return its exit code.
 * The report goes to `io.stdout`; usage and configuration errors to `io.stderr`.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let logger: FastifyBaseLogger | undefined = io.logger;

  try {
    const { command, options } = parseArgs(argv);

    if (command === 'help') {
      io.stdout(USAGE);
      return 0;
    }
    if (command === 'version') {
      io.stdout(`${APP_NAME} ${APP_VERSION}`);
      return 0;
    }

    const config = validateAndLoadConfig(io.env);
    logger ??= createLogger(config);

    const settings = resolveSettings(options, config);
    const specs = await loadServiceSpecs(settings.configPath, io.env);
    logger.debug({ configPath: settings.configPath, services: specs.length }, 'Service configuration loaded');

    if (command === 'serve') {
      return await serve(specs, settings, config);
    }
    return await check(specs, settings, logger, io);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(formatConfigurationError(error));
      io.stderr(`Run "readiness --help" for usage.`);
      return INVOCATION_ERROR_EXIT_CODE;
    }

    logger?.error({ err: error }, 'Readiness check failed unexpectedly');
    io.stderr(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return INVOCATION_ERROR_EXIT_CODE;
  }
}
