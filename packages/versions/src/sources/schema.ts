import { z, type ZodType } from 'zod';
import { FetchError } from '@packpub/core';

const packFormatNumber = z.number().int().positive();

/**
 * `resource_pack_version` as published by mcmeta: a plain integer, or a
 * [major, minor] pair / { major, minor } object for newer versions.
 * Only the major part identifies the pack format group.
 */
export const resourcePackVersionSchema = z
  .union([
    packFormatNumber,
    z.tuple([packFormatNumber, z.number().int().nonnegative()]),
    z.object({ major: packFormatNumber, minor: z.number().int().nonnegative().optional() }),
  ])
  .transform((value) => {
    if (typeof value === 'number') return value;
    if (Array.isArray(value)) return value[0];
    return value.major;
  });

export const mojangManifestSchema = z.object({
  latest: z
    .object({
      release: z.string().optional(),
      snapshot: z.string().optional(),
    })
    .optional(),
  versions: z.array(
    z.object({
      id: z.string().min(1),
      type: z.string().min(1),
      url: z.string().optional(),
    })
  ),
});

export const mcmetaVersionSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1).optional(),
  resource_pack_version: resourcePackVersionSchema.optional(),
});

export const mcmetaSummarySchema = z.array(
  z.object({
    id: z.string().min(1),
    type: z.string().min(1),
    resource_pack_version: resourcePackVersionSchema.optional(),
  })
);

/**
 * Validate a response body, reporting schema mismatches as FetchError
 */
export function parseBody<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, body: unknown, url: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new FetchError(url, `unexpected response shape${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}
