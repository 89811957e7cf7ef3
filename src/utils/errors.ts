/**
 * Fatal errors abort the run with a non-zero exit code.
 * Advisory failures are never thrown; they are reported as warnings at the step boundary.
 */
export class InitError extends Error {
  readonly exitCode: number = 1;

  constructor(readonly code: string, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SettingsError extends InitError {
  constructor(message: string) {
    super('INVALID_SETTINGS', message);
  }
}

export class MissingDependencyError extends InitError {
  constructor(readonly tool: string, message: string) {
    super('MISSING_DEPENDENCY', message);
  }
}

export class InvalidConfigurationError extends InitError {
  constructor(readonly field: string, message: string) {
    super('INVALID_CONFIGURATION', message);
  }
}

export class ArtifactError extends InitError {
  constructor(readonly file: string, message: string) {
    super('ARTIFACT_REWRITE_FAILED', message);
  }
}

export class DependencyInstallError extends InitError {
  constructor(readonly installExitCode: number) {
    super('DEPENDENCY_INSTALL_FAILED', `Failed to install dependencies (exit code ${installExitCode})`);
  }
}

export class VersionControlError extends InitError {
  constructor(message: string) {
    super('VCS_FAILED', message);
  }
}

export function formatError(err: unknown): string {
  if (err instanceof InitError) {
    return `[${err.code}] ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
