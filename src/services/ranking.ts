import type { RawPost, RankedPost } from '../lib/types';

/**
 * Engagement score used to pick which competitor videos to repost.
 * Comments weigh 3x a like, views 0.1x; the divisor only rescales.
 */
export function calculateEngagementScore(
  post: Pick<RawPost, 'likes' | 'comments' | 'views'>
): number {
  const likes = Math.max(0, post.likes);
  const comments = Math.max(0, post.comments);
  const views = Math.max(0, post.views);

  return (likes + comments * 3 + views * 0.1) / 1000;
}

/**
 * Score every post and sort by engagement (descending).
 * Equal scores keep their fetch order.
 */
export function rankPosts(posts: RawPost[]): RankedPost[] {
  return posts
    .map((post, index) => ({
      post: { ...post, engagementScore: calculateEngagementScore(post) },
      index,
    }))
    .sort((a, b) => b.post.engagementScore - a.post.engagementScore || a.index - b.index)
    .map(({ post }) => post);
}

/**
 * Rank posts and return the top N. Asking for more than available returns all of them.
 */
export function selectTopPosts(posts: RawPost[], count: number): RankedPost[] {
  if (posts.length === 0 || count <= 0) return [];
  return rankPosts(posts).slice(0, count);
}
