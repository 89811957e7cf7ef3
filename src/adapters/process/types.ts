export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Capture stdout/stderr instead of streaming them to the terminal */
  capture?: boolean;
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands to completion. Callers judge the outcome by exit code only.
 */
export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult>;
}

/** Exit code reported when the command could not be started at all */
export const COMMAND_NOT_FOUND = 127;

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}
