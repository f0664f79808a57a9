import { z } from 'zod';

const repoName = z
  .string()
  .trim()
  .regex(/^[\w.-]+\/[\w.-]+$/, 'must be of the form owner/name');

const branchName = z.string().trim().min(1, 'must not be empty');

const optionalSetting = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema.optional());

export const ciOverrideEnvSchema = z.object({
  PIXI_CI_REPO_NAME: optionalSetting(repoName),
  PIXI_CI_REPO_BRANCH: optionalSetting(branchName),
  PIXI_PR_NUMBER: optionalSetting(z.string().trim()),
  BUILD_BACKENDS_CI_REPO_NAME: optionalSetting(repoName),
  BUILD_BACKENDS_CI_REPO_BRANCH: optionalSetting(branchName),
  BUILD_BACKENDS_PR_NUMBER: optionalSetting(z.string().trim()),
  GITHUB_API_URL: optionalSetting(z.string().trim().url())
});

export type CiOverrideEnv = z.infer<typeof ciOverrideEnvSchema>;

export const prNumberSchema = z.coerce.number().int().positive();

// Only the fields that decide where an artifact came from are checked; the rest
// of an entry is informational.
export const metadataSourceSchema = z.discriminatedUnion('source', [
  z.object({
    source: z.literal('pr'),
    pr_number: z.union([z.number(), z.string()]).nullable().optional()
  }),
  z.object({
    source: z.literal('branch'),
    branch: z.string().nullable().optional()
  })
]);

export const downloadMetadataFileSchema = z.record(z.string(), z.unknown());
