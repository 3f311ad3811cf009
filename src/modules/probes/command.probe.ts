// src/modules/probes/command.probe.ts

import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandProbe, ProbeCheck } from './probes.types.js';

const execAsync = promisify(exec);

const MAX_OUTPUT_BYTES = 1024 * 1024;

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

interface ExecFailure extends CommandOutput {
  message: string;
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

function readExecFailure(error: unknown): ExecFailure | null {
  if (!(error instanceof Error) || !('stdout' in error) || !('stderr' in error)) {
    return null;
  }
  const code = 'code' in error ? error.code : undefined;
  return {
    exitCode: typeof code === 'number' ? code : null,
    stdout: typeof error.stdout === 'string' ? error.stdout : '',
    stderr: typeof error.stderr === 'string' ? error.stderr : '',
    message: error.message,
  };
}

/**
 * Apply the probe's exit code and output predicates to a finished command.
 * `outputExcludes` scans stdout and stderr together, so a log tail piped
 * through the command can be checked for error keywords.
 */
export function evaluateCommandOutput(probe: CommandProbe, output: CommandOutput): ProbeCheck {
  if (output.exitCode !== probe.expectExitCode) {
    const detail = firstLine(output.stderr);
    const code = output.exitCode === null ? 'none' : String(output.exitCode);
    return { ok: false, diagnostic: detail ? `exit code ${code}: ${detail}` : `exit code ${code}` };
  }

  if (probe.stdoutIncludes !== undefined && !output.stdout.includes(probe.stdoutIncludes)) {
    return { ok: false, diagnostic: `stdout does not contain "${probe.stdoutIncludes}"` };
  }

  if (probe.outputExcludes?.length) {
    const combined = `${output.stdout}\n${output.stderr}`.toLowerCase();
    const found = probe.outputExcludes.find((keyword) => combined.includes(keyword.toLowerCase()));
    if (found !== undefined) {
      return { ok: false, diagnostic: `output contains "${found}"` };
    }
  }

  return { ok: true };
}

/**
 * Run the probe's command through the shell. A non-zero exit is not an
 * error here: it is compared against `expectExitCode` like any other exit.
 */
export async function checkCommand(probe: CommandProbe, signal: AbortSignal): Promise<ProbeCheck> {
  try {
    const { stdout, stderr } = await execAsync(probe.command, {
      signal,
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
    });
    return evaluateCommandOutput(probe, { exitCode: 0, stdout, stderr });
  } catch (error) {
    if (signal.aborted) {
      return { ok: false, diagnostic: 'aborted' };
    }
    const failure = readExecFailure(error);
    if (!failure) {
      return { ok: false, diagnostic: error instanceof Error ? error.message : 'Unknown error' };
    }
    if (failure.exitCode === null) {
      return { ok: false, diagnostic: firstLine(failure.message) };
    }
    return evaluateCommandOutput(probe, failure);
  }
}
