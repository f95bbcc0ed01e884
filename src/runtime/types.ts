export interface ProbedRuntime {
  command: string;
  /** Combined stdout and stderr of `<command> --version`. */
  versionOutput: string;
}

export interface RuntimeVersion {
  major: number;
  minor: number;
  patch: number | null;
}

export interface RuntimeDescriptor {
  command: string;
  version: RuntimeVersion;
  versionText: string;
}
