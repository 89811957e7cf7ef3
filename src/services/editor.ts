import { InitContext } from '../context';
import { InitSettings } from '../config';
import { formatCommand } from '../adapters/process';

export type EditorOutcome = 'unavailable' | 'declined' | 'opened' | 'failed';

/** Offer to open the project when the editor launcher is installed */
export async function offerEditor(ctx: InitContext, settings: InitSettings): Promise<EditorOutcome> {
  const { command, args } = settings.editor;
  const opts = { cwd: ctx.cwd, env: ctx.env };

  const launcher = await ctx.runner.run(command, ['--version'], { ...opts, capture: true });
  if (launcher.exitCode !== 0) {
    return 'unavailable';
  }

  const open = await ctx.prompter.confirm(`Open project in ${command}?`, false);
  if (!open) {
    return 'declined';
  }

  const result = await ctx.runner.run(command, args, opts);
  if (result.exitCode !== 0) {
    ctx.reporter.warn(`${formatCommand(command, args)} exited with code ${result.exitCode}`);
    return 'failed';
  }
  return 'opened';
}
