import dotenv from 'dotenv';
import { z } from 'zod';
import { InitContext, projectPath } from '../context';
import { InitSettings } from '../config';
import { ProjectConfig } from '../models/project';
import { ArtifactError, InitError } from '../utils/errors';

export interface RewriteInput {
  config: ProjectConfig;
  secret: string;
  settings: InitSettings;
}

export interface SkipNotice {
  /** skipped: reported as a warning; unchanged: nothing to do for this configuration */
  status: 'skipped' | 'unchanged';
  message: string;
}

/**
 * A template file rewritten in place (or materialized from `from`).
 * A target whose source file is missing is skipped and never created.
 */
export interface ArtifactTarget {
  file: string;
  from?: string;
  skip?(input: RewriteInput, fileExists: boolean): SkipNotice | null;
  /** New content, or null when the file lacks what the rule rewrites */
  rewrite(content: string, input: RewriteInput): string | null;
  unmatched?: string;
  warnings?(source: string, input: RewriteInput): string[];
  describe(input: RewriteInput, result: string): string;
}

export type ArtifactStatus = 'updated' | 'unchanged' | 'skipped';

export interface ArtifactOutcome {
  file: string;
  status: ArtifactStatus;
}

// ─── Rewrite rules ──────────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

const JsonObjectSchema = z.record(z.string(), z.unknown());

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(content: string): JsonObject {
  const result = JsonObjectSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new Error('expected a JSON object at the top level');
  }
  return result.data;
}

function serializeJson(value: JsonObject): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function repositoryUrls(username: string, projectName: string) {
  const base = `https://github.com/${username}/${projectName}`;
  return {
    repository: `git+${base}.git`,
    bugs: `${base}/issues`,
    homepage: `${base}#readme`,
  };
}

/** Set name and description; repository, bugs and homepage only when a GitHub username was given */
export function rewriteManifest(content: string, config: ProjectConfig): string {
  const pkg = parseJsonObject(content);
  pkg.name = config.projectName;
  pkg.description = config.description;

  if (config.vcsUsername) {
    const urls = repositoryUrls(config.vcsUsername, config.projectName);
    pkg.repository = { ...(isRecord(pkg.repository) ? pkg.repository : { type: 'git' }), url: urls.repository };
    pkg.bugs = { ...(isRecord(pkg.bugs) ? pkg.bugs : {}), url: urls.bugs };
    pkg.homepage = urls.homepage;
  }

  return serializeJson(pkg);
}

export function rewriteHostingConfig(content: string, config: ProjectConfig): string {
  const hosting = parseJsonObject(content);
  if (config.platformProjectId) {
    hosting.projects = { ...(isRecord(hosting.projects) ? hosting.projects : {}), default: config.platformProjectId };
  }
  return serializeJson(hosting);
}

const TITLE_RE = /(<title\b[^>]*>)[\s\S]*?(<\/title>)/i;

/** Replace the text of the first <title> element */
export function rewriteMarkupTitle(content: string, config: ProjectConfig): string | null {
  if (!TITLE_RE.test(content)) {
    return null;
  }
  return content.replace(TITLE_RE, (_match, open: string, close: string) => `${open}${config.projectName}${close}`);
}

export function renderEnvFile(example: string, input: RewriteInput): string {
  const { config, secret } = input;
  const { secret: secretToken, template_name, app_name_key, platform_id_key } = input.settings.placeholders;

  let content = example.replaceAll(secretToken, () => secret);
  content = content.replaceAll(`${app_name_key}=${template_name}`, () => `${app_name_key}=${config.projectName}`);
  if (config.platformProjectId) {
    const id = config.platformProjectId;
    content = content.replaceAll(`${platform_id_key}=${template_name}`, () => `${platform_id_key}=${id}`);
  }
  return content;
}

// ─── Targets ────────────────────────────────────────────────────────────────────

export function projectFileTargets(settings: InitSettings): ArtifactTarget[] {
  const { manifest, hosting_config, markup_entry } = settings.artifacts;

  return [
    {
      file: manifest,
      rewrite: (content, { config }) => rewriteManifest(content, config),
      describe: () => `${manifest} updated`,
    },
    {
      file: hosting_config,
      skip: ({ config }) => (config.platformProjectId
        ? null
        : { status: 'unchanged', message: `No Firebase project ID given, ${hosting_config} left as is` }),
      rewrite: (content, { config }) => rewriteHostingConfig(content, config),
      describe: ({ config }) => `${hosting_config} updated with project ID: ${config.platformProjectId}`,
    },
    {
      file: markup_entry,
      rewrite: (content, { config }) => rewriteMarkupTitle(content, config),
      unmatched: 'no <title> element found, left unchanged',
      describe: () => `${markup_entry} updated`,
    },
  ];
}

export function environmentTargets(settings: InitSettings): ArtifactTarget[] {
  const { env_file, env_example } = settings.artifacts;

  return [
    {
      file: env_file,
      from: env_example,
      // Existing env files may hold real credentials
      skip: (_input, fileExists) => (fileExists
        ? { status: 'skipped', message: `${env_file} already exists, leaving it untouched` }
        : null),
      rewrite: (content, input) => renderEnvFile(content, input),
      warnings: (source, { settings: s }) => (source.includes(s.placeholders.secret)
        ? []
        : [`${env_example} has no ${s.placeholders.secret} placeholder, set the JWT secret manually`]),
      describe: (_input, result) =>
        `Environment variables configured with new JWT secret (${Object.keys(dotenv.parse(result)).length} variables)`,
    },
  ];
}

// ─── Mutator ────────────────────────────────────────────────────────────────────

async function applyTarget(ctx: InitContext, target: ArtifactTarget, input: RewriteInput): Promise<ArtifactOutcome> {
  const { storage, reporter } = ctx;
  const source = target.from ?? target.file;
  const sourcePath = projectPath(ctx, source);
  const filePath = projectPath(ctx, target.file);

  if (!(await storage.exists(sourcePath))) {
    reporter.warn(target.from
      ? `${source} not found, skipping ${target.file} setup`
      : `${source} not found, skipping update`);
    return { file: target.file, status: 'skipped' };
  }

  const fileExists = target.from ? await storage.exists(filePath) : true;
  const notice = target.skip?.(input, fileExists) ?? null;
  if (notice) {
    if (notice.status === 'skipped') {
      reporter.warn(notice.message);
    } else {
      reporter.info(notice.message);
    }
    return { file: target.file, status: notice.status };
  }

  const current = await storage.readFile(sourcePath);
  let next: string | null;
  try {
    next = target.rewrite(current, input);
  } catch (error) {
    if (error instanceof InitError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArtifactError(target.file, `Cannot rewrite ${target.file}: ${reason}`);
  }

  if (next === null) {
    reporter.warn(`${target.file}: ${target.unmatched ?? 'nothing to rewrite'}`);
    return { file: target.file, status: 'unchanged' };
  }

  for (const warning of target.warnings?.(current, input) ?? []) {
    reporter.warn(warning);
  }

  if (!target.from && next === current) {
    reporter.info(`${target.file} already up to date`);
    return { file: target.file, status: 'unchanged' };
  }

  await storage.writeFileAtomic(filePath, next);
  reporter.success(target.describe(input, next));
  return { file: target.file, status: 'updated' };
}

/**
 * Apply each target independently, in order. A missing file never stops the others.
 */
export async function applyArtifacts(
  ctx: InitContext,
  targets: ArtifactTarget[],
  input: RewriteInput,
): Promise<ArtifactOutcome[]> {
  const outcomes: ArtifactOutcome[] = [];
  for (const target of targets) {
    outcomes.push(await applyTarget(ctx, target, input));
  }
  return outcomes;
}
