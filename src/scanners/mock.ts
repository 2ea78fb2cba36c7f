import type { RawPost } from '../lib/types';

const MOCK_POSTS_PER_ACCOUNT = 5;

/**
 * Synthetic posts used when the scraper is not configured or unreachable.
 * Same input always gives the same posts (apart from the timestamp).
 */
export function createMockPosts(
  usernames: string[],
  maxPosts: number,
  now: Date = new Date()
): RawPost[] {
  const perAccount = Math.min(maxPosts, MOCK_POSTS_PER_ACCOUNT);
  const posts: RawPost[] = [];

  for (const username of usernames) {
    for (let i = 0; i < perAccount; i++) {
      posts.push({
        id: `mock_post_${username}_${i}`,
        sourceAccount: username,
        mediaUrl: `https://mock-media.invalid/${username}_${i}.mp4`,
        postUrl: `https://www.instagram.com/p/mock_${username}_${i}/`,
        likes: 1000 + i * 100,
        comments: 50 + i * 10,
        views: 5000 + i * 500,
        timestamp: now,
        caption: `Mock caption for ${username} post ${i}`,
      });
    }
  }

  return posts;
}
