export enum BootstrapErrorCode {
  RUNTIME_NOT_FOUND = 'RUNTIME_NOT_FOUND',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  ENVIRONMENT_CREATION_FAILED = 'ENVIRONMENT_CREATION_FAILED',
  MANIFEST_NOT_FOUND = 'MANIFEST_NOT_FOUND',
  DEPENDENCY_INSTALL_FAILED = 'DEPENDENCY_INSTALL_FAILED',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  SPAWN_FAILED = 'SPAWN_FAILED',
}

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BootstrapErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BootstrapError';
    this.code = code;
    this.context = context;
  }
}

export class RuntimeNotFoundError extends BootstrapError {
  constructor(candidates: readonly string[]) {
    super(
      BootstrapErrorCode.RUNTIME_NOT_FOUND,
      'Python not found. Install Python 3.10 or newer and make sure it is on PATH.',
      { candidates: [...candidates] }
    );
    this.name = 'RuntimeNotFoundError';
  }
}

export class UnsupportedVersionError extends BootstrapError {
  constructor(found: string, required: string) {
    super(
      BootstrapErrorCode.UNSUPPORTED_VERSION,
      `Python ${required} or newer is required. Installed version: ${found}`,
      { found, required }
    );
    this.name = 'UnsupportedVersionError';
  }
}

export class EnvironmentCreationError extends BootstrapError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(BootstrapErrorCode.ENVIRONMENT_CREATION_FAILED, message, context);
    this.name = 'EnvironmentCreationError';
  }
}

export class ManifestNotFoundError extends BootstrapError {
  constructor(manifestPath: string) {
    super(BootstrapErrorCode.MANIFEST_NOT_FOUND, `Dependency manifest not found: ${manifestPath}`, {
      manifestPath,
    });
    this.name = 'ManifestNotFoundError';
  }
}

// The installer's own output, kept verbatim. `all` preserves the stdout/stderr interleaving.
export class DependencyInstallError extends BootstrapError {
  constructor(message: string, output: { exitCode: number; stdout: string; stderr: string; all: string }) {
    super(BootstrapErrorCode.DEPENDENCY_INSTALL_FAILED, message, output);
    this.name = 'DependencyInstallError';
  }
}

export class TemplateNotFoundError extends BootstrapError {
  constructor(templatePath: string) {
    super(BootstrapErrorCode.TEMPLATE_NOT_FOUND, `Configuration template not found: ${templatePath}`, {
      templatePath,
    });
    this.name = 'TemplateNotFoundError';
  }
}

export class CommandSpawnError extends BootstrapError {
  constructor(command: string, cause: string) {
    super(BootstrapErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, { command, cause });
    this.name = 'CommandSpawnError';
  }
}
