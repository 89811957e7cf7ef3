import { CommandRunner, SpawnCommandRunner } from './adapters/process';
import { LocalStorage, Storage } from './adapters/storage';
import { consoleReporter, Reporter } from './cli/output';
import { InquirerPrompter, Prompter } from './cli/prompter';
import { resolveWithinDir } from './utils/security';

/**
 * Everything the initializer touches outside its own memory.
 * Passed explicitly so each step can run against in-memory stand-ins.
 */
export interface InitContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  storage: Storage;
  runner: CommandRunner;
  prompter: Prompter;
  reporter: Reporter;
}

export function createNodeContext(): InitContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    storage: new LocalStorage(),
    runner: new SpawnCommandRunner(),
    prompter: new InquirerPrompter(),
    reporter: consoleReporter,
  };
}

/** Absolute path of a project-relative file */
export function projectPath(ctx: InitContext, relativePath: string): string {
  return resolveWithinDir(ctx.cwd, relativePath);
}
