import { z } from 'zod';

export const CommandSchema = z.object({
  command: z.string().min(1).describe('Executable to run'),
  args: z.array(z.string()).default([]).describe('Arguments passed to the executable'),
});

// Quality gate run after dependencies are installed
export const GateSchema = CommandSchema.extend({
  name: z.string().min(1).describe('Display name of the gate'),
  hint: z.string().optional().describe('Suggestion printed when the gate fails'),
});

export const RuntimeSchema = z.object({
  command: z.string().default('node').describe('Language runtime executable'),
  min_version: z.string().regex(/^\d+(\.\d+)*$/).default('20.0.0').describe('Recommended minimum runtime version'),
});

export const ToolsSchema = z.object({
  package_manager: z.string().default('npm').describe('Package manager executable'),
  vcs: z.string().default('git').describe('Version control client executable'),
});

export const ArtifactsSchema = z.object({
  manifest: z.string().default('package.json').describe('Package manifest rewritten with name, description and repository URLs'),
  hosting_config: z.string().default('firebase.json').describe('Hosting config whose projects.default receives the platform project ID'),
  markup_entry: z.string().default('public/index.html').describe('HTML entry point whose <title> receives the project name'),
  env_file: z.string().default('.env').describe('Environment file created from the example'),
  env_example: z.string().default('.env.example').describe('Checked-in example environment file'),
});

export const PlaceholdersSchema = z.object({
  secret: z.string().min(1).default('your-super-secret-jwt-key-change-this').describe('Token replaced by the generated secret'),
  template_name: z.string().min(1).default('flyingnimbustest').describe('Template value of the app name and platform ID variables'),
  app_name_key: z.string().min(1).default('APP_NAME').describe('Environment variable holding the app name'),
  platform_id_key: z.string().min(1).default('FIREBASE_PROJECT_ID').describe('Environment variable holding the platform project ID'),
});

// Unset install and gates are derived from tools.package_manager
export const VerificationSchema = z.object({
  install: CommandSchema.optional().describe('Dependency install (failure aborts the run)'),
  gates: z.array(GateSchema).optional().describe('Advisory gates, run in order'),
});

export function defaultInstall(pm: string): z.infer<typeof CommandSchema> {
  return { command: pm, args: ['install', '--silent'] };
}

export function defaultGates(pm: string): GateSpec[] {
  return [
    { name: 'Linting', command: pm, args: ['run', 'lint', '--silent'], hint: `${pm} run lint:fix` },
    { name: 'Type checking', command: pm, args: ['run', 'type-check', '--silent'] },
    { name: 'Tests', command: pm, args: ['test', '--silent'] },
  ];
}

export const DEFAULT_COMMIT_MESSAGE = `feat: initialize {project_name} from project template

- AI agent definitions and development guides
- Provider-agnostic architecture with Firebase integration
- CI/CD pipelines with GitHub Actions
- TypeScript configuration and testing framework`;

export const CommitSchema = z.object({
  message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE).describe('Initial commit message; {project_name} is substituted'),
});

export const EditorSchema = z.object({
  command: z.string().default('code').describe('Editor launcher offered at the end of the run'),
  args: z.array(z.string()).default(['.']).describe('Arguments passed to the editor launcher'),
});

export const GuidanceSchema = z.object({
  docs: z.array(z.object({
    label: z.string(),
    path: z.string(),
  })).default([
    { label: 'Project setup guide', path: 'PROJECT_STARTER.md' },
    { label: 'Development standards', path: '.claude/CLAUDE.md' },
    { label: 'Agent documentation', path: '.claude/agents/README.md' },
  ]).describe('Documentation pointers printed in the summary'),
  agent_examples: z.array(z.string()).default([
    'Use the backend-api subagent to create user authentication',
    'Use the frontend-web subagent to build the landing page',
    'Use the orchestrator subagent to implement complete feature',
  ]).describe('Example agent requests printed in the summary'),
});

export const InitSettingsSchema = z.object({
  runtime: RuntimeSchema.default({}),
  tools: ToolsSchema.default({}),
  artifacts: ArtifactsSchema.default({}),
  placeholders: PlaceholdersSchema.default({}),
  verification: VerificationSchema.default({}),
  commit: CommitSchema.default({}),
  editor: EditorSchema.default({}),
  guidance: GuidanceSchema.default({}),
}).transform(settings => ({
  ...settings,
  verification: {
    install: settings.verification.install ?? defaultInstall(settings.tools.package_manager),
    gates: settings.verification.gates ?? defaultGates(settings.tools.package_manager),
  },
}));

export type GateSpec = z.infer<typeof GateSchema>;
export type InitSettings = z.infer<typeof InitSettingsSchema>;
