import fs from 'fs/promises';
import path from 'path';
import { CommandSpawnError, EnvironmentCreationError } from '../shared/errors.js';
import type { CommandRunner, ExecResult } from '../shared/exec.js';
import type { RuntimeDescriptor } from '../runtime/types.js';
import type { VirtualEnvironment } from './types.js';

export function environmentLayout(root: string, platform: NodeJS.Platform): VirtualEnvironment {
  const windows = platform === 'win32';
  const binDir = path.join(root, windows ? 'Scripts' : 'bin');
  return { root, binDir, python: path.join(binDir, windows ? 'python.exe' : 'python') };
}

/** Shell command an operator runs to activate the environment. */
export function activationHint(venvDir: string, platform: NodeJS.Platform): string {
  return platform === 'win32'
    ? path.win32.join(venvDir, 'Scripts', 'activate')
    : `source ${path.posix.join(venvDir, 'bin', 'activate')}`;
}

export async function createEnvironment(
  runner: CommandRunner,
  runtime: RuntimeDescriptor,
  options: { projectDir: string; venvDir: string; platform: NodeJS.Platform }
): Promise<VirtualEnvironment> {
  let result: ExecResult;
  try {
    result = await runner(runtime.command, ['-m', 'venv', options.venvDir], { cwd: options.projectDir });
  } catch (err) {
    if (err instanceof CommandSpawnError) {
      throw new EnvironmentCreationError(`Could not start ${runtime.command} to create the environment`, err.context);
    }
    throw err;
  }
  if (result.exitCode !== 0) {
    throw new EnvironmentCreationError(
      `${runtime.command} -m venv ${options.venvDir} exited with ${result.exitCode}`,
      { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr }
    );
  }

  // Stands in for shell activation: later steps call the environment's interpreter directly.
  const environment = environmentLayout(path.resolve(options.projectDir, options.venvDir), options.platform);
  try {
    await fs.access(environment.python);
  } catch {
    throw new EnvironmentCreationError(`Environment interpreter missing after creation: ${environment.python}`, {
      python: environment.python,
    });
  }
  return environment;
}
