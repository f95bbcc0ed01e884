import execa from 'execa';
import { CommandSpawnError } from './errors.js';
import { logger } from './logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  // stdout and stderr merged in the order the child wrote them.
  all: string;
  exitCode: number;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

// Steps take the runner as a parameter so tests can substitute an in-process fake.
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

// No timeout: a hung child blocks the caller until it exits.
export async function run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  logger.debug({ command, args, cwd: options?.cwd }, 'Running command');
  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      reject: false,
      all: true,
    });
  } catch (err) {
    throw new CommandSpawnError(command, err instanceof Error ? err.message : String(err));
  }

  // ENOENT and friends resolve (reject: false) with no exit code and no signal.
  const exitCode: number | undefined = result.exitCode;
  if (exitCode === undefined && result.signal === undefined) {
    throw new CommandSpawnError(command, result instanceof Error ? result.message : 'process did not start');
  }

  const execResult: ExecResult = {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    all: result.all ?? '',
    exitCode: exitCode ?? 128,
    signal: result.signal ?? undefined,
  };
  logger.debug({ command, exitCode: execResult.exitCode, signal: execResult.signal }, 'Command finished');
  return execResult;
}
