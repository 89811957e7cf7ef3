import { InitContext } from '../context';
import { ProjectConfig, ProjectConfigSchema, ProjectNameSchema, ProjectAnswers } from '../models/project';
import { InvalidConfigurationError } from '../utils/errors';

const FIELD_PROMPTS: ReadonlyArray<{ field: keyof ProjectAnswers; message: string }> = [
  { field: 'projectName', message: 'Enter project name:' },
  { field: 'description', message: 'Enter project description:' },
  { field: 'platformProjectId', message: 'Enter Firebase project ID (optional):' },
  { field: 'vcsUsername', message: 'Enter GitHub username (optional):' },
];

function firstIssue(field: string, issues: { message: string }[]): InvalidConfigurationError {
  return new InvalidConfigurationError(field, issues[0]?.message ?? `Invalid ${field}`);
}

export function validateProjectName(answer: string): string {
  const result = ProjectNameSchema.safeParse(answer);
  if (!result.success) {
    throw firstIssue('projectName', result.error.errors);
  }
  return result.data;
}

/**
 * Turn raw answers into a frozen configuration record, or fail with the first invalid field.
 */
export function buildProjectConfig(answers: ProjectAnswers): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(answers);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw firstIssue(String(issue?.path[0] ?? 'configuration'), result.error.errors);
  }
  return Object.freeze(result.data);
}

/**
 * Ask each question in order. The project name is checked as soon as it is answered;
 * an invalid answer ends the run, there is no second attempt.
 */
export async function collectProjectConfig(ctx: InitContext): Promise<ProjectConfig> {
  const answers: ProjectAnswers = { projectName: '', description: '', platformProjectId: '', vcsUsername: '' };

  for (const { field, message } of FIELD_PROMPTS) {
    const answer = await ctx.prompter.input(message);
    if (field === 'projectName') {
      validateProjectName(answer);
    }
    answers[field] = answer;
  }

  return buildProjectConfig(answers);
}
