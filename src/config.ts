// Bootstrap settings. Paths are relative to projectDir; the deployed bot reads
// config_prod/app.yaml and its dependencies from requirements_prod.txt.
import path from 'path';
import { z } from 'zod';

export interface VersionFloor {
  major: number;
  minor: number;
}

export interface BootstrapConfig {
  projectDir: string;
  /** Interpreter names probed in priority order. */
  runtimeCandidates: readonly string[];
  minimumVersion: VersionFloor;
  venvDir: string;
  manifestPath: string;
  templatePath: string;
  configPath: string;
  platform: NodeJS.Platform;
}

export const DEFAULT_BOOTSTRAP_CONFIG: BootstrapConfig = {
  projectDir: process.cwd(),
  runtimeCandidates: ['python3', 'python'],
  minimumVersion: { major: 3, minor: 10 },
  venvDir: 'venv',
  manifestPath: 'requirements_prod.txt',
  templatePath: path.join('config_prod', 'app.yaml.example'),
  configPath: path.join('config_prod', 'app.yaml'),
  platform: process.platform,
};

export function resolveBootstrapConfig(overrides: Partial<BootstrapConfig> = {}): BootstrapConfig {
  const config: BootstrapConfig = { ...DEFAULT_BOOTSTRAP_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }
  return config;
}

/** Absolute path of a project-relative setting. */
export function projectPath(config: BootstrapConfig, relative: string): string {
  return path.resolve(config.projectDir, relative);
}

const envSchema = z.object({
  // An exported but empty LOG_LEVEL counts as unset.
  LOG_LEVEL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
});

export interface EnvSettings {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return { logLevel: parsed.data.LOG_LEVEL };
}
