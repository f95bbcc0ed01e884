// Bootstraps the checkout in the working directory and returns the exit status:
// 0 on success, 1 on any failure.
import { runBootstrap } from './bootstrap.js';
import { resolveBootstrapConfig } from './config.js';
import type { BootstrapConfig } from './config.js';
import { consoleReporter } from './reporter.js';
import type { Reporter } from './reporter.js';
import { activationHint } from './environment/venv.js';
import { run } from './shared/exec.js';
import type { CommandRunner } from './shared/exec.js';
import { logger } from './shared/logger.js';

export interface MainOptions {
  runner?: CommandRunner;
  reporter?: Reporter;
  config?: Partial<BootstrapConfig>;
}

export function printNextSteps(reporter: Reporter, config: BootstrapConfig): void {
  reporter.heading('Bootstrap completed successfully');
  reporter.info('Next steps:');
  reporter.info(`1. Edit ${config.configPath} and fill in your own values`);
  reporter.info(`2. Activate the virtual environment: ${activationHint(config.venvDir, config.platform)}`);
  reporter.info('3. Start the bot: python yt_sum_bot.py');
}

export async function main(options: MainOptions = {}): Promise<number> {
  const config = resolveBootstrapConfig({ projectDir: process.cwd(), ...options.config });
  const reporter = options.reporter ?? consoleReporter;
  const report = await runBootstrap({ runner: options.runner ?? run, reporter, config });
  if (!report.ok) {
    logger.error({ code: report.error.code, context: report.error.context }, report.error.message);
    reporter.heading('Bootstrap failed');
    return 1;
  }
  printNextSteps(reporter, config);
  return 0;
}
