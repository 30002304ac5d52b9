/**
 * zod schemas for the GitHub REST payloads the harvester reads.
 *
 * Optional fields fall back to neutral defaults so a partially malformed item
 * still parses; items without identity fields fail and are skipped.
 */

import { z } from 'zod';

export const searchRepositorySchema = z.object({
  id: z.number(),
  name: z.string().catch(''),
  full_name: z.string(),
  owner: z.object({
    login: z.string(),
  }),
  organization: z
    .object({ login: z.string() })
    .nullable()
    .catch(null),
  language: z.string().nullable().catch(null),
  description: z.string().nullable().catch(null),
  topics: z.array(z.string()).catch([]),
  stargazers_count: z.number().catch(0),
});

export type SearchRepository = z.infer<typeof searchRepositorySchema>;

export const searchResponseSchema = z.object({
  total_count: z.number().catch(0),
  items: z.array(z.unknown()),
});

export const contributorSchema = z.object({
  login: z.string().min(1),
  contributions: z.number().catch(0),
});

export const commitSchema = z.object({
  sha: z.string().catch(''),
  commit: z.object({
    message: z.string().nullable().catch(null),
    author: z
      .object({
        date: z.string().nullable().catch(null),
      })
      .nullable()
      .catch(null),
  }),
});

export const userSchema = z.object({
  login: z.string().catch(''),
  location: z.string().nullable().catch(null),
});
