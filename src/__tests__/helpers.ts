import * as path from 'path';
import { CommandResult, CommandRunner, RunOptions, formatCommand, COMMAND_NOT_FOUND } from '../adapters/process';
import { Storage } from '../adapters/storage';
import { Reporter } from '../cli/output';
import { Prompter } from '../cli/prompter';
import { InitContext } from '../context';
import { InitSettingsSchema, InitSettings } from '../config';

export const PROJECT_ROOT = '/project';

export class MemoryStorage implements Storage {
  readonly files = new Map<string, string>();
  readonly dirs = new Set<string>();
  readonly writes: string[] = [];

  constructor(files: Record<string, string> = {}, root: string = PROJECT_ROOT) {
    for (const [name, content] of Object.entries(files)) {
      this.files.set(path.resolve(root, name), content);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath) || this.dirs.has(filePath);
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return content;
  }

  async writeFileAtomic(filePath: string, content: string): Promise<void> {
    this.writes.push(filePath);
    this.files.set(filePath, content);
  }

  get(name: string): string | undefined {
    return this.files.get(path.resolve(PROJECT_ROOT, name));
  }
}

export interface RecordedCall {
  line: string;
  options: RunOptions;
}

/** Returns scripted results keyed by full command line; anything unscripted exits 0 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly script: Record<string, Partial<CommandResult>> = {}) {}

  async run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    const line = formatCommand(command, args);
    this.calls.push({ line, options });
    return { exitCode: 0, stdout: '', stderr: '', ...this.script[line] };
  }

  get lines(): string[] {
    return this.calls.map(call => call.line);
  }
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly inputs: string[];
  private readonly confirms: boolean[];

  constructor(inputs: string[] = [], confirms: boolean[] = []) {
    this.inputs = [...inputs];
    this.confirms = [...confirms];
  }

  async input(message: string): Promise<string> {
    this.asked.push(message);
    const answer = this.inputs.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${message}`);
    }
    return answer;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.asked.push(message);
    return this.confirms.shift() ?? defaultValue;
  }
}

export class RecordingReporter implements Reporter {
  readonly entries: string[] = [];

  step = (index: number, title: string): void => {
    this.entries.push(`step: ${index} ${title}`);
  };
  success = (msg: string): void => {
    this.entries.push(`success: ${msg}`);
  };
  warn = (msg: string): void => {
    this.entries.push(`warn: ${msg}`);
  };
  fail = (msg: string): void => {
    this.entries.push(`fail: ${msg}`);
  };
  info = (msg: string): void => {
    this.entries.push(`info: ${msg}`);
  };
  line = (msg: string = ''): void => {
    this.entries.push(`line: ${msg}`);
  };

  of(level: string): string[] {
    const prefix = `${level}: `;
    return this.entries.filter(e => e.startsWith(prefix)).map(e => e.slice(prefix.length));
  }
}

export interface TestContext extends InitContext {
  storage: MemoryStorage;
  runner: FakeRunner;
  prompter: ScriptedPrompter;
  reporter: RecordingReporter;
}

/** Runner script for a healthy host: Node 20, npm, git, no editor launcher */
export const HEALTHY_HOST: Record<string, Partial<CommandResult>> = {
  'node --version': { stdout: 'v20.11.1\n' },
  'npm --version': { stdout: '10.2.4\n' },
  'git --version': { stdout: 'git version 2.43.0\n' },
  'code --version': { exitCode: COMMAND_NOT_FOUND },
};

export function makeContext(options: {
  files?: Record<string, string>;
  script?: Record<string, Partial<CommandResult>>;
  inputs?: string[];
  confirms?: boolean[];
  env?: NodeJS.ProcessEnv;
} = {}): TestContext {
  return {
    cwd: PROJECT_ROOT,
    env: options.env ?? {},
    storage: new MemoryStorage(options.files),
    runner: new FakeRunner({ ...HEALTHY_HOST, ...options.script }),
    prompter: new ScriptedPrompter(options.inputs, options.confirms),
    reporter: new RecordingReporter(),
  };
}

export function defaultSettings(): InitSettings {
  return InitSettingsSchema.parse({});
}

// ─── Template fixtures ──────────────────────────────────────────────────────────

export const TEMPLATE_MANIFEST = `${JSON.stringify({
  name: 'flyingnimbustest',
  version: '0.1.0',
  description: 'Starter template',
  repository: { type: 'git', url: 'git+https://github.com/template-owner/flyingnimbustest.git' },
  bugs: { url: 'https://github.com/template-owner/flyingnimbustest/issues' },
  homepage: 'https://github.com/template-owner/flyingnimbustest#readme',
  scripts: { dev: 'vite', lint: 'eslint .' },
}, null, 2)}\n`;

export const TEMPLATE_HOSTING = `${JSON.stringify({
  projects: { default: 'flyingnimbustest' },
  hosting: { public: 'dist' },
}, null, 2)}\n`;

export const TEMPLATE_MARKUP = [
  '<!doctype html>',
  '<html lang="en">',
  '  <head>',
  '    <title>Flying Template</title>',
  '  </head>',
  '  <body><div id="root"></div></body>',
  '</html>',
  '',
].join('\n');

export const TEMPLATE_ENV_EXAMPLE = [
  'APP_NAME=flyingnimbustest',
  'JWT_SECRET=your-super-secret-jwt-key-change-this',
  'FIREBASE_PROJECT_ID=flyingnimbustest',
  'PORT=3000',
  '',
].join('\n');

export function templateFiles(): Record<string, string> {
  return {
    'package.json': TEMPLATE_MANIFEST,
    'firebase.json': TEMPLATE_HOSTING,
    'public/index.html': TEMPLATE_MARKUP,
    '.env.example': TEMPLATE_ENV_EXAMPLE,
  };
}
