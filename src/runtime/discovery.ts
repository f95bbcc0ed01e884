import { CommandSpawnError, RuntimeNotFoundError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CommandRunner } from '../shared/exec.js';
import type { ProbedRuntime } from './types.js';

/**
 * Returns the first candidate that starts and exits 0 on `--version`.
 * A non-zero exit counts as unresolved: the Windows Store alias for
 * `python3` exists on PATH but only prints an install hint.
 */
export async function discoverRuntime(
  runner: CommandRunner,
  candidates: readonly string[]
): Promise<ProbedRuntime> {
  for (const command of candidates) {
    try {
      const result = await runner(command, ['--version']);
      if (result.exitCode === 0) {
        return { command, versionOutput: `${result.stdout}\n${result.stderr}`.trim() };
      }
      logger.debug({ command, exitCode: result.exitCode }, 'Runtime candidate exited non-zero');
    } catch (err) {
      if (!(err instanceof CommandSpawnError)) throw err;
      logger.debug({ command }, 'Runtime candidate not found');
    }
  }
  throw new RuntimeNotFoundError(candidates);
}
