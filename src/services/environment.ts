import { InitContext } from '../context';
import { InitSettings } from '../config';
import { MissingDependencyError } from '../utils/errors';
import { compareVersions, parseVersion } from '../utils/validators';

export interface ToolCheck {
  label: string;
  command: string;
  version: string | null;
}

async function detectTool(ctx: InitContext, label: string, command: string): Promise<ToolCheck> {
  const result = await ctx.runner.run(command, ['--version'], { cwd: ctx.cwd, env: ctx.env, capture: true });
  if (result.exitCode !== 0) {
    throw new MissingDependencyError(command, `${label} is required but not installed`);
  }
  return { label, command, version: parseVersion(result.stdout) };
}

/**
 * Confirm the runtime, package manager and VCS client are installed.
 * A runtime older than the recommended minimum only produces a warning.
 */
export async function checkPrerequisites(ctx: InitContext, settings: InitSettings): Promise<ToolCheck[]> {
  const tools: Array<[string, string]> = [
    ['Node.js', settings.runtime.command],
    [settings.tools.package_manager, settings.tools.package_manager],
    ['Git', settings.tools.vcs],
  ];

  const checks: ToolCheck[] = [];
  for (const [label, command] of tools) {
    checks.push(await detectTool(ctx, label, command));
  }

  const runtime = checks[0];
  const minVersion = settings.runtime.min_version;
  if (!runtime.version) {
    ctx.reporter.warn(`Could not determine ${runtime.label} version (${minVersion}+ recommended)`);
  } else if (compareVersions(runtime.version, minVersion) < 0) {
    ctx.reporter.warn(`${runtime.label} ${minVersion}+ recommended, you have ${runtime.version}`);
  }

  ctx.reporter.success('Prerequisites check passed');
  return checks;
}
