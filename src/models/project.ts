import { z } from 'zod';
import { PROJECT_NAME_RE } from '../utils/validators';

const optionalAnswer = z
  .string()
  .transform(value => value.trim())
  .transform(value => (value.length > 0 ? value : undefined));

export const ProjectNameSchema = z
  .string()
  .transform(value => value.trim())
  .pipe(z.string()
    .min(1, 'Project name is required')
    .regex(PROJECT_NAME_RE, 'Project name must start with a letter and contain only lowercase letters, numbers, and hyphens'));

export const ProjectConfigSchema = z.object({
  projectName: ProjectNameSchema,
  description: z.string().transform(value => value.trim()),
  platformProjectId: optionalAnswer,
  vcsUsername: optionalAnswer,
});

/** Validated, immutable configuration for a single run */
export type ProjectConfig = Readonly<z.infer<typeof ProjectConfigSchema>>;

/** Raw operator answers, one per prompt */
export type ProjectAnswers = z.input<typeof ProjectConfigSchema>;
