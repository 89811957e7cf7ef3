import { describe, it, expect } from 'vitest';
import { loadSettings, parseSettings, findSettingsPath } from '../config';
import { SettingsError } from '../utils/errors';
import { makeContext } from './helpers';

describe('loadSettings', () => {
  it('falls back to defaults without a settings file', async () => {
    const settings = await loadSettings(makeContext());

    expect(settings.artifacts).toEqual({
      manifest: 'package.json',
      hosting_config: 'firebase.json',
      markup_entry: 'public/index.html',
      env_file: '.env',
      env_example: '.env.example',
    });
    expect(settings.verification.gates.map(g => g.name)).toEqual(['Linting', 'Type checking', 'Tests']);
    expect(settings.runtime.min_version).toBe('20.0.0');
    expect(settings.verification.install).toEqual({ command: 'npm', args: ['install', '--silent'] });
  });

  it('reads project-init.yaml from the project root', async () => {
    const ctx = makeContext({
      files: {
        'project-init.yaml': [
          'artifacts:',
          '  markup_entry: index.html',
          'verification:',
          '  gates:',
          '    - name: Format',
          '      command: npm',
          '      args: [run, format]',
        ].join('\n'),
      },
    });

    const settings = await loadSettings(ctx);

    expect(settings.artifacts.markup_entry).toBe('index.html');
    expect(settings.artifacts.manifest).toBe('package.json');
    expect(settings.verification.gates).toEqual([{ name: 'Format', command: 'npm', args: ['run', 'format'] }]);
    expect(settings.verification.install).toEqual({ command: 'npm', args: ['install', '--silent'] });
  });

  it('honors PROJECT_INIT_CONFIG', async () => {
    const ctx = makeContext({
      files: { 'config/init.yaml': 'tools:\n  package_manager: pnpm\n' },
      env: { PROJECT_INIT_CONFIG: 'config/init.yaml' },
    });

    expect(await findSettingsPath(ctx)).toBe('/project/config/init.yaml');
    expect((await loadSettings(ctx)).tools).toEqual({ package_manager: 'pnpm', vcs: 'git' });
  });

  it('derives install and gate commands from the package manager', async () => {
    const ctx = makeContext({ files: { 'project-init.yaml': 'tools:\n  package_manager: pnpm\n' } });

    const { verification } = await loadSettings(ctx);

    expect(verification.install).toEqual({ command: 'pnpm', args: ['install', '--silent'] });
    expect(verification.gates).toEqual([
      { name: 'Linting', command: 'pnpm', args: ['run', 'lint', '--silent'], hint: 'pnpm run lint:fix' },
      { name: 'Type checking', command: 'pnpm', args: ['run', 'type-check', '--silent'] },
      { name: 'Tests', command: 'pnpm', args: ['test', '--silent'] },
    ]);
  });

  it('keeps an explicit install command over the package manager default', async () => {
    const ctx = makeContext({
      files: {
        'project-init.yaml': [
          'tools:',
          '  package_manager: yarn',
          'verification:',
          '  install:',
          '    command: yarn',
          '    args: [install, --frozen-lockfile]',
        ].join('\n'),
      },
    });

    const { verification } = await loadSettings(ctx);

    expect(verification.install).toEqual({ command: 'yarn', args: ['install', '--frozen-lockfile'] });
    expect(verification.gates.map(g => `${g.command} ${g.args.join(' ')}`)).toEqual([
      'yarn run lint --silent',
      'yarn run type-check --silent',
      'yarn test --silent',
    ]);
  });

  it('rejects a PROJECT_INIT_CONFIG that does not exist', async () => {
    const ctx = makeContext({ env: { PROJECT_INIT_CONFIG: 'missing.yaml' } });

    await expect(loadSettings(ctx)).rejects.toThrow('Settings file not found: /project/missing.yaml (set via PROJECT_INIT_CONFIG)');
  });

  it('rejects artifact paths outside the project', async () => {
    const ctx = makeContext({ files: { 'project-init.yaml': 'artifacts:\n  env_file: ../secrets/.env\n' } });

    await expect(loadSettings(ctx)).rejects.toThrow(
      new SettingsError('artifacts.env_file: ../secrets/.env must stay inside the project directory'),
    );
  });
});

describe('parseSettings', () => {
  it('treats an empty file as defaults', () => {
    expect(parseSettings('', 'project-init.yaml').tools).toEqual({ package_manager: 'npm', vcs: 'git' });
  });

  it('lists schema violations', () => {
    expect(() => parseSettings('runtime:\n  min_version: twenty\n', 'project-init.yaml')).toThrow(
      /Invalid settings in project-init\.yaml:\n {2}- runtime\.min_version: Invalid/,
    );
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseSettings('runtime: [unclosed', 'project-init.yaml')).toThrow(SettingsError);
  });
});
