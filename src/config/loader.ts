import * as path from 'path';
import * as yaml from 'js-yaml';
import { InitSettingsSchema, InitSettings } from './schema';
import { InitContext } from '../context';
import { SettingsError } from '../utils/errors';
import { resolveWithinDir } from '../utils/security';

export const SETTINGS_FILE = 'project-init.yaml';
export const SETTINGS_ENV = 'PROJECT_INIT_CONFIG';

/**
 * Locate the settings file.
 * Priority: PROJECT_INIT_CONFIG env > ./project-init.yaml > none (built-in defaults)
 */
export async function findSettingsPath(ctx: InitContext): Promise<string | null> {
  const explicit = ctx.env[SETTINGS_ENV];
  if (explicit) {
    const resolved = path.resolve(ctx.cwd, explicit);
    if (!(await ctx.storage.exists(resolved))) {
      throw new SettingsError(`Settings file not found: ${resolved} (set via ${SETTINGS_ENV})`);
    }
    return resolved;
  }

  const candidate = path.join(ctx.cwd, SETTINGS_FILE);
  return (await ctx.storage.exists(candidate)) ? candidate : null;
}

export function parseSettings(source: string, origin: string): InitSettings {
  let raw: unknown;
  try {
    // An empty file loads as undefined; treat it as "all defaults"
    raw = yaml.load(source) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Cannot parse ${origin}: ${reason}`);
  }

  const parseResult = InitSettingsSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map(e => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new SettingsError(`Invalid settings in ${origin}:\n${errors}`);
  }

  return parseResult.data;
}

/**
 * Load and validate initializer settings. Artifact paths must stay inside the project root.
 */
export async function loadSettings(ctx: InitContext): Promise<InitSettings> {
  const settingsPath = await findSettingsPath(ctx);
  const settings = settingsPath
    ? parseSettings(await ctx.storage.readFile(settingsPath), path.basename(settingsPath))
    : InitSettingsSchema.parse({});

  for (const [key, file] of Object.entries(settings.artifacts)) {
    try {
      resolveWithinDir(ctx.cwd, file);
    } catch {
      throw new SettingsError(`artifacts.${key}: ${file} must stay inside the project directory`);
    }
  }

  return settings;
}
