/**
 * Page configurations, read once per run from a JSON file
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors';
import type { PageConfig } from './types';

const handle = z
  .string()
  .transform((s) => s.trim().replace(/^@/, ''))
  .pipe(z.string().min(1));

export const PageEntrySchema = z
  .object({
    ig_account_name: handle,
    source_accounts: z.array(handle).min(1),
    captions: z.array(z.string().min(1)).min(1),
    max_posts_to_fetch: z.number().int().positive(),
    top_posts_count: z.number().int().positive(),
    max_total_posts_to_schedule: z.number().int().positive().optional(),
    socialbu_account_id: z.number().int().positive(),
  })
  .refine((p) => p.top_posts_count <= p.max_posts_to_fetch, {
    message: 'top_posts_count must not exceed max_posts_to_fetch',
    path: ['top_posts_count'],
  });

export const PagesFileSchema = z.record(z.string().min(1), PageEntrySchema);

export type PageEntry = z.infer<typeof PageEntrySchema>;

function toPageConfig(id: string, entry: PageEntry): PageConfig {
  return {
    id,
    igAccountName: entry.ig_account_name,
    sourceAccounts: entry.source_accounts,
    captions: entry.captions,
    maxPostsToFetch: entry.max_posts_to_fetch,
    topPostsCount: entry.top_posts_count,
    maxTotalPostsToSchedule: entry.max_total_posts_to_schedule,
    socialbuAccountId: entry.socialbu_account_id,
  };
}

/**
 * Validate already-parsed JSON into page configs
 */
export function parsePages(data: unknown): PageConfig[] {
  const result = PagesFileSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid page configuration - ${issues}`);
  }

  const pages = Object.entries(result.data).map(([id, entry]) => toPageConfig(id, entry));
  if (pages.length === 0) {
    throw new ConfigurationError('No pages configured');
  }
  return pages;
}

/**
 * Read and validate the pages file
 */
export function loadPages(filePath: string): PageConfig[] {
  const resolved = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read pages file ${resolved}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Pages file ${resolved} is not valid JSON: ${errorMessage(error)}`);
  }

  return parsePages(data);
}
