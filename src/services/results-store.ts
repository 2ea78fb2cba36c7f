/**
 * Append-only JSON file of per-page workflow results
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { WorkflowResult } from '../lib/types';
import { PersistenceError, errorMessage } from '../lib/errors';

const PostOutcomeSchema = z.object({
  postId: z.string(),
  postUrl: z.string(),
  sourceAccount: z.string(),
  engagementScore: z.number(),
  slot: z.string().nullable(),
  success: z.boolean(),
  stage: z.enum(['upload', 'schedule', 'publish', 'scheduled']),
  uploadState: z.enum(['DOWNLOAD_FAILED', 'INIT_FAILED', 'UPLOAD_FAILED', 'PROCESSING_TIMEOUT']).optional(),
  providerPostIds: z.array(z.string()).optional(),
  error: z.string().optional(),
});

const WorkflowResultSchema = z.object({
  pageId: z.string(),
  startedAt: z.string(),
  completedAt: z.string(),
  fetchMode: z.enum(['live', 'mock']),
  counts: z.object({
    fetched: z.number(),
    ranked: z.number(),
    uploaded: z.number(),
    published: z.number(),
    failed: z.number(),
  }),
  outcomes: z.array(PostOutcomeSchema),
  errors: z.array(z.string()),
});

const ResultsFileSchema = z.array(WorkflowResultSchema);

export interface ResultsStore {
  append(result: WorkflowResult): Promise<void>;
  /** Most recent results first */
  readRecent(limit: number): Promise<WorkflowResult[]>;
}

export class JsonResultsStore implements ResultsStore {
  constructor(
    private readonly filePath: string,
    private readonly retention: number
  ) {}

  async append(result: WorkflowResult): Promise<void> {
    const results = await this.readAll();
    results.push(result);
    const kept = results.slice(-Math.max(1, this.retention));

    // Write beside the target and rename so readers never see a partial file
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(kept, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new PersistenceError(`Failed to write results to ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  async readRecent(limit: number): Promise<WorkflowResult[]> {
    if (limit <= 0) return [];
    const results = await this.readAll();
    return results.slice(-limit).reverse();
  }

  private async readAll(): Promise<WorkflowResult[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(`Failed to read results from ${this.filePath}: ${errorMessage(error)}`);
    }

    if (raw.trim() === '') return [];

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Results file ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = ResultsFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError(`Results file ${this.filePath} has an unexpected shape: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
  }
}
