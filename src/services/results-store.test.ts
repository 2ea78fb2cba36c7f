import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonResultsStore } from './results-store';
import { PersistenceError } from '../lib/errors';
import type { WorkflowResult } from '../lib/types';

function createResult(pageId: string, startedAt = '2026-10-19T12:00:00.000Z'): WorkflowResult {
  return {
    pageId,
    startedAt,
    completedAt: '2026-10-19T12:05:00.000Z',
    fetchMode: 'live',
    counts: { fetched: 4, ranked: 4, uploaded: 1, published: 1, failed: 1 },
    outcomes: [
      {
        postId: '3300000000000000001',
        postUrl: 'https://www.instagram.com/p/DAbc001/',
        sourceAccount: 'dobie_adventures',
        engagementScore: 2.82,
        slot: '2026-10-19T15:00:00.000Z',
        success: true,
        stage: 'scheduled',
        providerPostIds: ['7001'],
      },
      {
        postId: '3300000000000000004',
        postUrl: 'https://www.instagram.com/p/DAbc004/',
        sourceAccount: 'dobie_adventures',
        engagementScore: 1.5,
        slot: null,
        success: false,
        stage: 'upload',
        uploadState: 'DOWNLOAD_FAILED',
        error: 'Download failed: 404',
      },
    ],
    errors: [],
  };
}

describe('Results Store', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'results-test-'));
    filePath = path.join(dir, 'nested', 'workflow_results.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read nothing before the first run', async () => {
    const store = new JsonResultsStore(filePath, 100);

    expect(await store.readRecent(10)).toEqual([]);
  });

  it('should append results and read them back newest first', async () => {
    const store = new JsonResultsStore(filePath, 100);

    await store.append(createResult('daily_dobermans'));
    await store.append(createResult('shepherd_central'));

    const recent = await store.readRecent(10);
    expect(recent.map((r) => r.pageId)).toEqual(['shepherd_central', 'daily_dobermans']);
    expect(recent[1]).toEqual(createResult('daily_dobermans'));
  });

  it('should limit how many results are read', async () => {
    const store = new JsonResultsStore(filePath, 100);
    await store.append(createResult('a'));
    await store.append(createResult('b'));
    await store.append(createResult('c'));

    expect((await store.readRecent(2)).map((r) => r.pageId)).toEqual(['c', 'b']);
    expect(await store.readRecent(0)).toEqual([]);
  });

  it('should keep only the most recent results', async () => {
    const store = new JsonResultsStore(filePath, 2);
    await store.append(createResult('a'));
    await store.append(createResult('b'));
    await store.append(createResult('c'));

    const saved = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(saved.map((r: WorkflowResult) => r.pageId)).toEqual(['b', 'c']);
  });

  it('should refuse to overwrite a corrupted file', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{ not json');
    const store = new JsonResultsStore(filePath, 100);

    await expect(store.append(createResult('a'))).rejects.toBeInstanceOf(PersistenceError);
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('{ not json');
  });

  it('should raise PersistenceError when the file cannot be written', async () => {
    // A directory where the file should be
    fs.mkdirSync(filePath, { recursive: true });
    const store = new JsonResultsStore(filePath, 100);

    await expect(store.append(createResult('a'))).rejects.toBeInstanceOf(PersistenceError);
  });
});
