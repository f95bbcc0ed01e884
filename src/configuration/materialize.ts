import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { TemplateNotFoundError } from '../shared/errors.js';

export interface ConfigurationFile {
  templatePath: string;
  targetPath: string;
}

export type MaterializeOutcome = 'created' | 'existing';

export interface MaterializedConfiguration extends ConfigurationFile {
  outcome: MaterializeOutcome;
}

/**
 * Seeds the live configuration from its template. An existing target is never
 * touched; COPYFILE_EXCL keeps that true if the file appears mid-copy.
 */
export async function materializeConfiguration(file: ConfigurationFile): Promise<MaterializedConfiguration> {
  try {
    await fs.access(file.templatePath);
  } catch {
    throw new TemplateNotFoundError(file.templatePath);
  }

  await fs.mkdir(path.dirname(file.targetPath), { recursive: true });
  try {
    await fs.copyFile(file.templatePath, file.targetPath, constants.COPYFILE_EXCL);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') return { ...file, outcome: 'existing' };
    throw err;
  }
  return { ...file, outcome: 'created' };
}
