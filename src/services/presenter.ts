import { ProjectConfig } from '../models/project';

export interface NextStep {
  label: string;
  command?: string;
}

/** Follow-up instructions, chosen by which optional answers were given */
export function buildNextSteps(config: ProjectConfig, packageManager: string = 'npm'): NextStep[] {
  const { projectName, platformProjectId, vcsUsername } = config;
  const steps: NextStep[] = [{ label: 'Start development server', command: `${packageManager} run dev` }];

  if (platformProjectId) {
    steps.push({ label: 'Deploy to Firebase', command: 'firebase deploy' });
  } else {
    steps.push({ label: 'Configure Firebase', command: 'firebase init' });
  }

  if (vcsUsername) {
    steps.push({ label: 'Create GitHub repo', command: `gh repo create ${projectName} --public` });
    steps.push({
      label: 'Push to GitHub',
      command: `git remote add origin git@github.com:${vcsUsername}/${projectName}.git && git push -u origin main`,
    });
  } else {
    steps.push({ label: 'Create GitHub repository and push your code' });
  }

  return steps;
}

export function formatNextSteps(steps: NextStep[]): string[] {
  return steps.map((step, i) => (step.command
    ? `${i + 1}. ${step.label}: ${step.command}`
    : `${i + 1}. ${step.label}`));
}
