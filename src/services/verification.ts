import { InitContext } from '../context';
import { InitSettings, GateSpec } from '../config';
import { formatCommand } from '../adapters/process';
import { DependencyInstallError } from '../utils/errors';

export type GateSeverity = 'fatal' | 'advisory';

export interface GateResult {
  name: string;
  severity: GateSeverity;
  passed: boolean;
  exitCode: number;
}

export async function installDependencies(ctx: InitContext, settings: InitSettings): Promise<GateResult> {
  const { command, args } = settings.verification.install;
  ctx.reporter.info(formatCommand(command, args));

  const { exitCode } = await ctx.runner.run(command, args, { cwd: ctx.cwd, env: ctx.env });
  if (exitCode !== 0) {
    ctx.reporter.fail('Failed to install dependencies');
    throw new DependencyInstallError(exitCode);
  }

  ctx.reporter.success('Dependencies installed successfully');
  return { name: 'Install', severity: 'fatal', passed: true, exitCode };
}

async function runGate(ctx: InitContext, gate: GateSpec): Promise<GateResult> {
  ctx.reporter.info(`Running ${gate.name.toLowerCase()}: ${formatCommand(gate.command, gate.args)}`);

  const { exitCode } = await ctx.runner.run(gate.command, gate.args, { cwd: ctx.cwd, env: ctx.env });
  const passed = exitCode === 0;
  if (passed) {
    ctx.reporter.success(`${gate.name} passed`);
  } else {
    const hint = gate.hint ? ` (fixable with: ${gate.hint})` : '';
    ctx.reporter.warn(`${gate.name} failed with exit code ${exitCode}${hint}`);
  }

  return { name: gate.name, severity: 'advisory', passed, exitCode };
}

/**
 * Every gate runs regardless of earlier results, so one pass reports all problems.
 */
export async function runGates(ctx: InitContext, settings: InitSettings): Promise<GateResult[]> {
  const results: GateResult[] = [];
  for (const gate of settings.verification.gates) {
    results.push(await runGate(ctx, gate));
  }
  return results;
}
