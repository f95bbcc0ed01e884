import { projectPath } from './config.js';
import type { BootstrapConfig } from './config.js';
import type { Reporter } from './reporter.js';
import { BootstrapError, DependencyInstallError } from './shared/errors.js';
import type { CommandRunner } from './shared/exec.js';
import { logger } from './shared/logger.js';
import { discoverRuntime } from './runtime/discovery.js';
import { checkRuntimeVersion } from './runtime/version.js';
import type { RuntimeDescriptor } from './runtime/types.js';
import { createEnvironment } from './environment/venv.js';
import { installDependencies } from './environment/install.js';
import type { DependencyManifest, VirtualEnvironment } from './environment/types.js';
import { materializeConfiguration } from './configuration/materialize.js';
import type { MaterializedConfiguration } from './configuration/materialize.js';
import { inspectConfiguration } from './configuration/readiness.js';
import type { ReadinessReport } from './configuration/readiness.js';

export type StepName =
  | 'discover-runtime'
  | 'check-version'
  | 'create-environment'
  | 'install-dependencies'
  | 'materialize-config';

const STEP_COUNT = 5;

export interface StepRecord {
  step: StepName;
  status: 'succeeded' | 'failed';
  detail: string;
}

export interface BootstrapDeps {
  runner: CommandRunner;
  reporter: Reporter;
  config: BootstrapConfig;
}

export type BootstrapReport =
  | {
      ok: true;
      steps: StepRecord[];
      runtime: RuntimeDescriptor;
      environment: VirtualEnvironment;
      manifest: DependencyManifest;
      configuration: MaterializedConfiguration;
      readiness: ReadinessReport | null;
    }
  | { ok: false; steps: StepRecord[]; error: BootstrapError };

/**
 * Runs the five bootstrap steps in order and stops at the first failure.
 * Steps already completed are not rolled back. Errors outside the bootstrap
 * taxonomy (permission problems on the project directory, say) are reported
 * as a failed step and then propagate.
 */
export async function runBootstrap(deps: BootstrapDeps): Promise<BootstrapReport> {
  const { runner, reporter, config } = deps;
  const steps: StepRecord[] = [];
  let index = 0;

  async function attempt<T>(
    step: StepName,
    title: string,
    action: () => Promise<T>,
    summarize: (value: T) => string
  ): Promise<T> {
    index += 1;
    reporter.step(index, STEP_COUNT, title);
    let value: T;
    try {
      value = await action();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      steps.push({ step, status: 'failed', detail: message });
      if (err instanceof DependencyInstallError) {
        reporter.passthrough(String(err.context?.['all'] ?? ''));
      }
      reporter.failure(message);
      logger.debug({ step, code: err instanceof BootstrapError ? err.code : undefined }, 'Bootstrap step failed');
      throw err;
    }
    const detail = summarize(value);
    steps.push({ step, status: 'succeeded', detail });
    reporter.success(detail);
    logger.debug({ step }, 'Bootstrap step succeeded');
    return value;
  }

  reporter.heading('YT_Sum bootstrap');
  try {
    const probed = await attempt(
      'discover-runtime',
      'Looking for Python',
      () => discoverRuntime(runner, config.runtimeCandidates),
      (p) => `Found ${p.command}: ${p.versionOutput}`
    );

    const runtime = await attempt(
      'check-version',
      `Checking Python version (${config.minimumVersion.major}.${config.minimumVersion.minor} or newer)`,
      async () => checkRuntimeVersion(probed, config.minimumVersion),
      (r) => `Python version is supported: ${r.versionText}`
    );

    const environment = await attempt(
      'create-environment',
      'Creating virtual environment',
      () =>
        createEnvironment(runner, runtime, {
          projectDir: config.projectDir,
          venvDir: config.venvDir,
          platform: config.platform,
        }),
      () => `Virtual environment ready: ${config.venvDir}`
    );

    const manifest = await attempt(
      'install-dependencies',
      `Installing dependencies from ${config.manifestPath}`,
      () =>
        installDependencies(runner, environment, {
          projectDir: config.projectDir,
          manifestPath: projectPath(config, config.manifestPath),
        }),
      (m) => `Installed ${m.specifiers.length} requirement(s) from ${config.manifestPath}`
    );

    const configuration = await attempt(
      'materialize-config',
      `Preparing ${config.configPath}`,
      () =>
        materializeConfiguration({
          templatePath: projectPath(config, config.templatePath),
          targetPath: projectPath(config, config.configPath),
        }),
      (c) =>
        c.outcome === 'created'
          ? `Created ${config.configPath} from ${config.templatePath}`
          : `${config.configPath} already exists, left unchanged`
    );
    if (configuration.outcome === 'created') {
      reporter.info('Edit it and fill in your own values before starting the bot.');
    }

    const readiness = await checkReadiness(reporter, configuration.targetPath, config);
    return { ok: true, steps, runtime, environment, manifest, configuration, readiness };
  } catch (err) {
    if (err instanceof BootstrapError) return { ok: false, steps, error: err };
    throw err;
  }
}

async function checkReadiness(
  reporter: Reporter,
  targetPath: string,
  config: BootstrapConfig
): Promise<ReadinessReport | null> {
  let readiness: ReadinessReport;
  try {
    readiness = await inspectConfiguration(targetPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    reporter.warn(`Could not inspect ${config.configPath}: ${reason}`);
    logger.warn({ configPath: targetPath, error: reason }, 'Configuration inspection failed');
    return null;
  }
  for (const issue of readiness.issues) {
    reporter.warn(`${config.configPath}: ${issue}`);
  }
  return readiness;
}
