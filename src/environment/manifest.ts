import fs from 'fs/promises';
import { ManifestNotFoundError } from '../shared/errors.js';
import type { DependencyManifest } from './types.js';

// pip requirement-file syntax: '#' starts a comment, blank lines are ignored.
export function parseManifest(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(/(^|\s)#.*$/, '').trim())
    .filter((line) => line.length > 0);
}

export async function readManifest(manifestPath: string): Promise<DependencyManifest> {
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') throw new ManifestNotFoundError(manifestPath);
    throw err;
  }
  return { path: manifestPath, specifiers: parseManifest(raw) };
}
