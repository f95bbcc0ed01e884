import fs from 'fs/promises';
import path from 'path';
import { findMissingSecrets, inspectConfiguration, isPlaceholder } from '../../../src/configuration/readiness.js';
import { FIXTURES, makeTempDir } from '../fake-runner.js';

describe('isPlaceholder', () => {
  const cases: Array<[string | null | undefined, boolean]> = [
    [undefined, true],
    [null, true],
    ['', true],
    ['   ', true],
    ['YOUR_TELEGRAM_BOT_TOKEN', true],
    ['your_key_here', true],
    ['<openrouter-api-key>', true],
    ['<a>real-token', false],
    ['CHANGE_ME', true],
    ['xxxxxxxx', true],
    ['...', true],
    ['test-bot-token', false],
  ];

  it.each(cases)('%p -> %p', (value, expected) => {
    expect(isPlaceholder(value)).toBe(expected);
  });
});

describe('findMissingSecrets', () => {
  it('reports every required secret for an empty document', () => {
    expect(findMissingSecrets({})).toEqual([
      'telegram.bot_token is not set',
      'ai.api_keys has no usable key',
      'supadata.api_keys has no usable key',
    ]);
  });

  it('only requires the notion token when notion is enabled', () => {
    const base = {
      telegram: { bot_token: 'test-bot-token' },
      ai: { api_keys: ['test-ai-key'] },
      supadata: { api_keys: ['test-supadata-key'] },
    };
    expect(findMissingSecrets({ ...base, notion: { enabled: false } })).toEqual([]);
    expect(findMissingSecrets({ ...base, notion: { enabled: true, token: '' } })).toEqual([
      'notion.token is not set but notion.enabled is true',
    ]);
  });
});

describe('inspectConfiguration', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('flags the placeholders of the template', async () => {
    const configPath = path.join(FIXTURES, 'app.yaml.example');
    const report = await inspectConfiguration(configPath);
    expect(report).toEqual({
      configPath,
      issues: [
        'telegram.bot_token is not set',
        'ai.api_keys has no usable key',
        'supadata.api_keys has no usable key',
        'notion.token is not set but notion.enabled is true',
      ],
    });
  });

  it('accepts a filled-in configuration', async () => {
    const report = await inspectConfiguration(path.join(FIXTURES, 'app.filled.yaml'));
    expect(report.issues).toEqual([]);
  });

  it('reports a section with the wrong shape', async () => {
    const configPath = path.join(tmpDir, 'app.yaml');
    await fs.writeFile(configPath, 'telegram:\n  bot_token: "test-bot-token"\nai:\n  api_keys: "test-ai-key"\n');
    const report = await inspectConfiguration(configPath);
    expect(report.issues).toEqual(['ai.api_keys: Expected array, received string']);
  });

  it('reports YAML that does not parse', async () => {
    const configPath = path.join(tmpDir, 'app.yaml');
    await fs.writeFile(configPath, 'telegram: [unclosed\n');
    const report = await inspectConfiguration(configPath);
    expect(report.issues).toHaveLength(1);
    expect(report.issues[0]).toMatch(/^not valid YAML: /);
  });

  it('rejects when the file cannot be read', async () => {
    await expect(inspectConfiguration(path.join(tmpDir, 'missing.yaml'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
