import { getDb } from '../lib/db';

/**
 * Check if a post was already published for a page (deduplication across runs)
 */
export function isProcessed(pageId: string, postId: string): boolean {
  const db = getDb();
  const row = db
    .prepare<[string, string], { post_id: string }>(
      'SELECT post_id FROM processed_posts WHERE page_id = ? AND post_id = ?'
    )
    .get(pageId, postId);

  return row !== undefined;
}

/**
 * Record a successfully scheduled post so later runs skip it
 */
export function markProcessed(pageId: string, postId: string, postUrl: string): void {
  const db = getDb();
  db.prepare(
    'INSERT OR REPLACE INTO processed_posts (page_id, post_id, post_url, processed_at) VALUES (?, ?, ?, ?)'
  ).run(pageId, postId, postUrl, Date.now());
}

/**
 * Number of posts published for a page
 */
export function countProcessed(pageId: string): number {
  const db = getDb();
  const row = db
    .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM processed_posts WHERE page_id = ?')
    .get(pageId);

  return row?.count ?? 0;
}
