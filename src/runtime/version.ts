import { UnsupportedVersionError } from '../shared/errors.js';
import type { VersionFloor } from '../config.js';
import type { ProbedRuntime, RuntimeDescriptor, RuntimeVersion } from './types.js';

const VERSION_PATTERN = /(\d+)\.(\d+)(?:\.(\d+))?/;

// Free text such as "Python 3.11.4"; the first dotted number wins and patch is optional.
export function parseVersion(text: string): RuntimeVersion | null {
  const match = text.match(VERSION_PATTERN);
  if (!match) return null;
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: match[3] !== undefined ? Number(match[3]) : null,
  };
}

export function formatVersion(version: RuntimeVersion): string {
  const base = `${version.major}.${version.minor}`;
  return version.patch === null ? base : `${base}.${version.patch}`;
}

export function meetsMinimum(version: RuntimeVersion, floor: VersionFloor): boolean {
  if (version.major !== floor.major) return version.major > floor.major;
  return version.minor >= floor.minor;
}

export function checkRuntimeVersion(probed: ProbedRuntime, floor: VersionFloor): RuntimeDescriptor {
  const required = `${floor.major}.${floor.minor}`;
  const version = parseVersion(probed.versionOutput);
  if (!version) {
    throw new UnsupportedVersionError(probed.versionOutput.trim() || 'unknown', required);
  }
  const versionText = formatVersion(version);
  if (!meetsMinimum(version, floor)) {
    throw new UnsupportedVersionError(versionText, required);
  }
  return { command: probed.command, version, versionText };
}
