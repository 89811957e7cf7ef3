import { spawn, StdioOptions } from 'child_process';
import { CommandResult, CommandRunner, RunOptions, COMMAND_NOT_FOUND } from './types';

/**
 * Only .cmd/.bat shims need cmd.exe. Anything else runs without a shell, so
 * arguments reach the child exactly as given.
 */
export function shouldUseWindowsShell(command: string, platform: NodeJS.Platform = process.platform): boolean {
  if (platform !== 'win32') {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith('.cmd') || normalized.endsWith('.bat');
}

// Launchers installed as .cmd shims on Windows
const WINDOWS_SHIMS = new Set(['npm', 'npx', 'pnpm', 'yarn', 'code']);

export function resolveCommand(command: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32' && WINDOWS_SHIMS.has(command.toLowerCase())) {
    return `${command}.cmd`;
  }
  return command;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      const output = options.capture ? 'pipe' : 'inherit';
      const stdio: StdioOptions = [
        options.input !== undefined ? 'pipe' : (options.capture ? 'ignore' : 'inherit'),
        output,
        output,
      ];

      const resolved = resolveCommand(command, this.platform);
      const child = spawn(resolved, args, {
        cwd: options.cwd,
        env: options.env,
        shell: shouldUseWindowsShell(resolved, this.platform),
        stdio,
        windowsHide: true,
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (error) => {
        resolve({ exitCode: COMMAND_NOT_FOUND, stdout, stderr: stderr || error.message });
      });
      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      if (options.input !== undefined) {
        // A child that exits before reading stdin closes the pipe under us
        child.stdin?.on('error', (error) => {
          stderr += error.message;
        });
        child.stdin?.end(options.input);
      }
    });
  }
}
