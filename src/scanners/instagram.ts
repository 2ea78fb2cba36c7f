import { z } from 'zod';
import type { Env } from '../lib/env';
import type { RawPost } from '../lib/types';
import { FetchError, errorMessage } from '../lib/errors';

const APIFY_API_URL = 'https://api.apify.com/v2';

const count = z
  .number()
  .nullish()
  .transform((n) => (n == null || !Number.isFinite(n) ? 0 : Math.max(0, n)));

const ApifyChildSchema = z
  .object({
    type: z.string().nullish(),
    videoUrl: z.string().nullish(),
  })
  .passthrough();

/**
 * Fields we read from an apify/instagram-post-scraper dataset item
 */
export const ApifyItemSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    shortCode: z.string().nullish(),
    url: z.string().nullish(),
    type: z.string().nullish(),
    videoUrl: z.string().nullish(),
    video_url: z.string().nullish(),
    caption: z.string().nullish(),
    likesCount: count,
    commentsCount: count,
    videoViewCount: count,
    videoPlayCount: count,
    timestamp: z.string().nullish(),
    ownerUsername: z.string().nullish(),
    queryUsername: z.string().nullish(),
    childPosts: z.array(ApifyChildSchema).nullish(),
    sidecarMedia: z.array(ApifyChildSchema).nullish(),
  })
  .passthrough();

export type ApifyItem = z.infer<typeof ApifyItemSchema>;

function looksLikeVideo(value: string): boolean {
  const lower = value.toLowerCase();
  return lower.includes('.mp4') || lower.includes('video');
}

/**
 * Find a downloadable video for a post
 * Carousels use their first video child
 */
export function extractVideoUrl(item: ApifyItem): string | null {
  if (item.videoUrl) return item.videoUrl;

  const type = (item.type ?? '').toLowerCase();
  if (type === 'sidecar' || type === 'carousel') {
    const children = [...(item.childPosts ?? []), ...(item.sidecarMedia ?? [])];
    const video = children.find((c) => (c.type ?? '').toLowerCase() === 'video' && c.videoUrl);
    if (video?.videoUrl) return video.videoUrl;
  }

  for (const candidate of [item.video_url, item.url]) {
    if (candidate && looksLikeVideo(candidate)) return candidate;
  }

  return null;
}

/**
 * Convert a validated dataset item into a RawPost, or null when it has no video
 */
export function toRawPost(item: ApifyItem, requested: string[]): RawPost | null {
  const mediaUrl = extractVideoUrl(item);
  if (!mediaUrl) return null;

  const postUrl =
    item.url || (item.shortCode ? `https://www.instagram.com/p/${item.shortCode}/` : null);
  if (!postUrl) return null;

  const sourceAccount =
    item.queryUsername || item.ownerUsername || (requested.length === 1 ? requested[0] : '');
  if (!sourceAccount) return null;

  const timestamp = item.timestamp ? new Date(item.timestamp) : new Date(0);

  return {
    id: item.id,
    sourceAccount: sourceAccount.replace(/^@/, ''),
    mediaUrl,
    postUrl,
    likes: item.likesCount,
    comments: item.commentsCount,
    views: item.videoViewCount || item.videoPlayCount,
    timestamp: Number.isNaN(timestamp.getTime()) ? new Date(0) : timestamp,
    caption: item.caption ?? undefined,
  };
}

/**
 * Validate a raw dataset, dropping malformed items and non-video posts
 */
export function parseApifyDataset(data: unknown, requested: string[]): RawPost[] {
  if (!Array.isArray(data)) {
    throw new FetchError('Apify returned an unexpected dataset format');
  }

  const posts: RawPost[] = [];
  let invalid = 0;
  let nonVideo = 0;

  for (const entry of data) {
    const parsed = ApifyItemSchema.safeParse(entry);
    if (!parsed.success) {
      invalid++;
      continue;
    }

    const post = toRawPost(parsed.data, requested);
    if (!post) {
      nonVideo++;
      continue;
    }
    posts.push(post);
  }

  if (invalid > 0 || nonVideo > 0) {
    console.log(`[apify] Skipped ${invalid} malformed and ${nonVideo} non-video items`);
  }

  return posts;
}

/**
 * Run the Instagram post scraper synchronously and return its dataset
 */
export async function scrapeInstagramPosts(
  env: Env,
  usernames: string[],
  maxPosts: number
): Promise<RawPost[]> {
  if (!env.APIFY_API_TOKEN) {
    throw new FetchError('Apify API token not configured');
  }

  const actorId = env.APIFY_ACTOR_ID.replace('/', '~');
  const url = `${APIFY_API_URL}/acts/${actorId}/run-sync-get-dataset-items?token=${encodeURIComponent(env.APIFY_API_TOKEN)}`;

  console.log(`[apify] Starting actor run for ${usernames.length} account(s): ${usernames.join(', ')}`);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        username: usernames,
        resultsLimit: maxPosts,
      }),
      signal: AbortSignal.timeout(env.APIFY_TIMEOUT_MS),
    });
  } catch (error) {
    throw new FetchError(`Apify request failed: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    const error = await response.text().catch(() => '');
    throw new FetchError(`Apify run failed: ${response.status} - ${error.slice(0, 200)}`, response.status);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new FetchError(`Apify returned invalid JSON: ${errorMessage(error)}`);
  }

  const posts = parseApifyDataset(data, usernames);
  console.log(`[apify] Scraped ${Array.isArray(data) ? data.length : 0} items, kept ${posts.length} videos`);

  return posts;
}
