import { CommandSpawnError, DependencyInstallError } from '../shared/errors.js';
import type { CommandRunner, ExecResult } from '../shared/exec.js';
import { readManifest } from './manifest.js';
import type { DependencyManifest, VirtualEnvironment } from './types.js';

async function runPip(
  runner: CommandRunner,
  environment: VirtualEnvironment,
  pipArgs: string[],
  cwd: string
): Promise<ExecResult> {
  const description = `pip ${pipArgs.join(' ')}`;
  let result: ExecResult;
  try {
    result = await runner(environment.python, ['-m', 'pip', ...pipArgs], { cwd });
  } catch (err) {
    if (err instanceof CommandSpawnError) {
      const cause = String(err.context?.['cause'] ?? err.message);
      throw new DependencyInstallError(`Could not start ${description}`, {
        exitCode: -1,
        stdout: '',
        stderr: cause,
        all: cause,
      });
    }
    throw err;
  }
  if (result.exitCode !== 0) {
    throw new DependencyInstallError(`${description} exited with ${result.exitCode}`, {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      all: result.all,
    });
  }
  return result;
}

/**
 * Upgrades pip inside the environment, then installs the manifest with `-r`.
 * The manifest is checked first so nothing is installed when it is missing.
 */
export async function installDependencies(
  runner: CommandRunner,
  environment: VirtualEnvironment,
  options: { projectDir: string; manifestPath: string }
): Promise<DependencyManifest> {
  const manifest = await readManifest(options.manifestPath);
  await runPip(runner, environment, ['install', '--upgrade', 'pip'], options.projectDir);
  await runPip(runner, environment, ['install', '-r', manifest.path], options.projectDir);
  return manifest;
}
