import { InitContext, projectPath } from '../context';
import { InitSettings } from '../config';
import { ProjectConfig } from '../models/project';
import { VersionControlError } from '../utils/errors';

export type RepositoryStatus = 'created' | 'existing';
export type CommitStatus = 'created' | 'failed';

export interface VersionControlOutcome {
  repository: RepositoryStatus;
  commit: CommitStatus;
}

export function renderCommitMessage(template: string, config: ProjectConfig): string {
  return template.replaceAll('{project_name}', () => config.projectName);
}

/**
 * Ensure a repository exists, stage everything and create the initial commit.
 * A failed commit (e.g. nothing to commit) is only a warning.
 */
export async function commitProject(
  ctx: InitContext,
  settings: InitSettings,
  config: ProjectConfig,
): Promise<VersionControlOutcome> {
  const git = settings.tools.vcs;
  const opts = { cwd: ctx.cwd, env: ctx.env };

  let repository: RepositoryStatus;
  if (await ctx.storage.exists(projectPath(ctx, '.git'))) {
    repository = 'existing';
    ctx.reporter.success('Git repository already exists');
  } else {
    const init = await ctx.runner.run(git, ['init'], opts);
    if (init.exitCode !== 0) {
      throw new VersionControlError(`${git} init failed with exit code ${init.exitCode}`);
    }
    repository = 'created';
    ctx.reporter.success('Git repository initialized');
  }

  const add = await ctx.runner.run(git, ['add', '.'], opts);
  if (add.exitCode !== 0) {
    throw new VersionControlError(`${git} add failed with exit code ${add.exitCode}`);
  }

  const message = renderCommitMessage(settings.commit.message, config);
  // Read from stdin so the multi-line message never passes through argv
  const commit = await ctx.runner.run(git, ['commit', '-F', '-'], { ...opts, input: message });
  if (commit.exitCode !== 0) {
    ctx.reporter.warn('Commit creation failed (files may already be committed)');
    return { repository, commit: 'failed' };
  }

  ctx.reporter.success('Initial commit created');
  return { repository, commit: 'created' };
}
