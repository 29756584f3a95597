// src/core/normalizer/records.ts

import { z } from 'zod';

const SelfLinksSchema = z
  .object({
    self: z.array(z.object({ href: z.string() }).passthrough()).optional(),
  })
  .passthrough();

/**
 * Project as returned by `GET /projects`. Optional fields may be absent
 * or null; unknown fields pass through.
 */
export const ProjectRecordSchema = z
  .object({
    key: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    type: z.string().nullish(),
    public: z.boolean().nullish(),
    links: SelfLinksSchema.nullish(),
  })
  .passthrough();

/**
 * Repository as returned by `GET /projects/{key}/repos`
 */
export const RepositoryRecordSchema = z
  .object({
    slug: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    state: z.string().nullish(),
    forkable: z.boolean().nullish(),
    public: z.boolean().nullish(),
    links: SelfLinksSchema.nullish(),
    project: z.object({ key: z.string().min(1) }).passthrough(),
  })
  .passthrough();

export type ProjectRecord = z.infer<typeof ProjectRecordSchema>;
export type RepositoryRecord = z.infer<typeof RepositoryRecordSchema>;
