// Checks the secrets the bot needs at start-up. Findings are warnings for the
// operator; they never fail the bootstrap.
import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const secretList = z.array(z.string().nullable()).nullish();

const appConfigSchema = z
  .object({
    telegram: z
      .object({ bot_token: z.string().nullish(), bot_username: z.string().nullish() })
      .passthrough()
      .nullish(),
    ai: z.object({ api_keys: secretList }).passthrough().nullish(),
    supadata: z.object({ api_keys: secretList }).passthrough().nullish(),
    notion: z.object({ enabled: z.boolean().nullish(), token: z.string().nullish() }).passthrough().nullish(),
    logging: z.object({ to_file: z.boolean().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export type AppConfig = z.infer<typeof appConfigSchema>;

export interface ReadinessReport {
  configPath: string;
  issues: string[];
}

const PLACEHOLDER_PATTERN = /^(<.*>$|your_|change_me|xxx|\.\.\.)/i;

export function isPlaceholder(value: string | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed.length === 0 || PLACEHOLDER_PATTERN.test(trimmed);
}

function hasUsableKey(keys: Array<string | null> | null | undefined): boolean {
  return (keys ?? []).some((key) => !isPlaceholder(key));
}

export function findMissingSecrets(config: AppConfig): string[] {
  const issues: string[] = [];
  if (isPlaceholder(config.telegram?.bot_token)) {
    issues.push('telegram.bot_token is not set');
  }
  if (!hasUsableKey(config.ai?.api_keys)) {
    issues.push('ai.api_keys has no usable key');
  }
  if (!hasUsableKey(config.supadata?.api_keys)) {
    issues.push('supadata.api_keys has no usable key');
  }
  if (config.notion?.enabled === true && isPlaceholder(config.notion.token)) {
    issues.push('notion.token is not set but notion.enabled is true');
  }
  return issues;
}

export async function inspectConfiguration(configPath: string): Promise<ReadinessReport> {
  const raw = await fs.readFile(configPath, 'utf-8');

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    return {
      configPath,
      issues: [`not valid YAML: ${err instanceof Error ? err.message.split('\n')[0] : String(err)}`],
    };
  }

  const parsed = appConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    return {
      configPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { configPath, issues: findMissingSecrets(parsed.data) };
}
