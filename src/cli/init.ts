import { InitContext } from '../context';
import { InitSettings, loadSettings } from '../config';
import { ProjectConfig } from '../models/project';
import { checkPrerequisites } from '../services/environment';
import { collectProjectConfig } from '../services/configuration';
import { generateSecret } from '../services/secret';
import { ArtifactOutcome, applyArtifacts, environmentTargets, projectFileTargets } from '../services/artifacts';
import { GateResult, installDependencies, runGates } from '../services/verification';
import { VersionControlOutcome, commitProject } from '../services/versionControl';
import { NextStep, buildNextSteps, formatNextSteps } from '../services/presenter';
import { EditorOutcome, offerEditor } from '../services/editor';
import { BOLD, CYAN, GREEN, YELLOW, NC } from './output';

export type InitPhase =
  | 'INIT'
  | 'VALIDATING'
  | 'COLLECTING'
  | 'MUTATING'
  | 'VERIFYING'
  | 'COMMITTING'
  | 'REPORTING'
  | 'DONE';

export interface InitReport {
  phases: InitPhase[];
  config: ProjectConfig;
  artifacts: ArtifactOutcome[];
  gates: GateResult[];
  versionControl: VersionControlOutcome;
  nextSteps: NextStep[];
  editor: EditorOutcome;
}

function banner(ctx: InitContext): void {
  const { reporter } = ctx;
  reporter.line('');
  reporter.line(`${BOLD}${CYAN}╔══════════════════════════════════════════════╗${NC}`);
  reporter.line(`${BOLD}${CYAN}║            Project Initializer               ║${NC}`);
  reporter.line(`${BOLD}${CYAN}╚══════════════════════════════════════════════╝${NC}`);
  reporter.line('');
}

function showSummary(ctx: InitContext, settings: InitSettings, config: ProjectConfig, nextSteps: NextStep[]): void {
  const { reporter } = ctx;

  reporter.line(`${GREEN}✓ Project '${config.projectName}' is ready for development!${NC}`);
  reporter.line('');
  reporter.line('Next steps:');
  for (const step of formatNextSteps(nextSteps)) {
    reporter.line(`  ${step}`);
  }

  if (settings.guidance.agent_examples.length > 0) {
    reporter.line('');
    reporter.line('AI agent usage examples:');
    for (const example of settings.guidance.agent_examples) {
      reporter.line(`  ${CYAN}"${example}"${NC}`);
    }
  }

  if (settings.guidance.docs.length > 0) {
    reporter.line('');
    reporter.line('Documentation:');
    for (const doc of settings.guidance.docs) {
      reporter.line(`  • ${doc.label}: ${YELLOW}${doc.path}${NC}`);
    }
  }
  reporter.line('');
}

/**
 * Initialize the project in ctx.cwd. Steps run strictly in order; a fatal error
 * propagates immediately and leaves files as they were at that point.
 */
export async function runInit(ctx: InitContext): Promise<InitReport> {
  const phases: InitPhase[] = ['INIT'];
  const enter = (phase: InitPhase): void => {
    phases.push(phase);
  };
  const { reporter } = ctx;

  banner(ctx);
  const settings = await loadSettings(ctx);

  enter('VALIDATING');
  reporter.step(1, 'Checking prerequisites');
  await checkPrerequisites(ctx, settings);

  enter('COLLECTING');
  reporter.step(2, 'Project configuration');
  const config = await collectProjectConfig(ctx);
  reporter.success('Configuration collected');

  enter('MUTATING');
  const secret = generateSecret();
  const input = { config, secret, settings };
  reporter.step(3, 'Updating project configuration');
  const artifacts = await applyArtifacts(ctx, projectFileTargets(settings), input);
  reporter.step(4, 'Setting up environment variables');
  artifacts.push(...await applyArtifacts(ctx, environmentTargets(settings), input));

  enter('VERIFYING');
  reporter.step(5, 'Installing dependencies');
  const install = await installDependencies(ctx, settings);
  reporter.step(6, 'Running initial verification');
  const gates = [install, ...await runGates(ctx, settings)];

  enter('COMMITTING');
  reporter.step(7, 'Git repository setup');
  const versionControl = await commitProject(ctx, settings, config);

  enter('REPORTING');
  reporter.step(8, 'Setup complete');
  const nextSteps = buildNextSteps(config, settings.tools.package_manager);
  showSummary(ctx, settings, config, nextSteps);
  const editor = await offerEditor(ctx, settings);

  enter('DONE');
  return { phases, config, artifacts, gates, versionControl, nextSteps, editor };
}
