import { describe, it, expect, vi, beforeEach } from 'vitest';
import { scrapeInstagramPosts, parseApifyDataset, extractVideoUrl, ApifyItemSchema } from './instagram';
import { mockApifyItems, createMockFetchResponse } from '../test/mocks';
import { FetchError } from '../lib/errors';
import type { Env } from '../lib/env';

const mockFetch = vi.fn();

describe('Instagram Scanner', () => {
  const mockEnv: Env = {
    PORT: 3000,
    APIFY_API_TOKEN: 'test-apify-token',
    APIFY_ACTOR_ID: 'apify/instagram-post-scraper',
    APIFY_TIMEOUT_MS: 1000,
    SOCIALBU_API_TOKEN: 'test-socialbu-token',
    SOCIALBU_BASE_URL: 'https://socialbu.example.test/api/v1',
    SOCIALBU_TIMEOUT_MS: 1000,
    TELEGRAM_BOT_TOKEN: '',
    TELEGRAM_CHAT_ID: '',
    DB_PATH: ':memory:',
    RESULTS_PATH: 'unused.json',
    PAGES_PATH: 'unused.json',
    WORKFLOW_CRON: '0 * * * *',
  };

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  describe('parseApifyDataset', () => {
    it('should keep video posts and drop images', () => {
      const posts = parseApifyDataset(
        [mockApifyItems.video, mockApifyItems.image, mockApifyItems.sidecar],
        ['dobie_adventures', 'the_doberman_den']
      );

      expect(posts).toHaveLength(2);
      expect(posts[0]).toEqual({
        id: '3300000000000000001',
        sourceAccount: 'dobie_adventures',
        mediaUrl: 'https://cdn.example.test/videos/3300000000000000001.mp4',
        postUrl: 'https://www.instagram.com/p/DAbc001/',
        likes: 1200,
        comments: 40,
        views: 15000,
        timestamp: new Date('2026-10-01T12:00:00.000Z'),
        caption: 'Zoomies at the beach',
      });
    });

    it('should use the first video of a carousel', () => {
      const [post] = parseApifyDataset([mockApifyItems.sidecar], ['the_doberman_den']);

      expect(post.mediaUrl).toBe('https://cdn.example.test/videos/child-2.mp4');
      expect(post.sourceAccount).toBe('the_doberman_den');
      expect(post.views).toBe(0);
    });

    it('should default missing fields', () => {
      const [post] = parseApifyDataset(
        [{ id: 5, shortCode: 'XYZ', videoUrl: 'https://cdn.example.test/x.mp4', likesCount: -1 }],
        ['solo_account']
      );

      expect(post).toEqual({
        id: '5',
        sourceAccount: 'solo_account',
        mediaUrl: 'https://cdn.example.test/x.mp4',
        postUrl: 'https://www.instagram.com/p/XYZ/',
        likes: 0,
        comments: 0,
        views: 0,
        timestamp: new Date(0),
        caption: undefined,
      });
    });

    it('should skip items without an id', () => {
      const posts = parseApifyDataset(
        [{ videoUrl: 'https://cdn.example.test/x.mp4' }, mockApifyItems.video],
        ['dobie_adventures']
      );

      expect(posts.map((p) => p.id)).toEqual(['3300000000000000001']);
    });

    it('should skip items when the source account cannot be determined', () => {
      const posts = parseApifyDataset(
        [{ id: '9', url: 'https://www.instagram.com/p/NINE/', videoUrl: 'https://cdn.example.test/9.mp4' }],
        ['one', 'two']
      );

      expect(posts).toEqual([]);
    });

    it('should throw FetchError for a non-array payload', () => {
      expect(() => parseApifyDataset({ error: 'nope' }, ['a'])).toThrow(FetchError);
    });
  });

  describe('extractVideoUrl', () => {
    it('should fall back to a url that points at a video file', () => {
      const item = ApifyItemSchema.parse({ id: '1', url: 'https://cdn.example.test/clip.MP4' });

      expect(extractVideoUrl(item)).toBe('https://cdn.example.test/clip.MP4');
    });

    it('should return null for an image post', () => {
      const item = ApifyItemSchema.parse(mockApifyItems.image);

      expect(extractVideoUrl(item)).toBeNull();
    });
  });

  describe('scrapeInstagramPosts', () => {
    it('should call the actor and parse the dataset', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse([mockApifyItems.video]));

      const posts = await scrapeInstagramPosts(mockEnv, ['dobie_adventures'], 10);

      expect(posts).toHaveLength(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(
        'https://api.apify.com/v2/acts/apify~instagram-post-scraper/run-sync-get-dataset-items?token=test-apify-token'
      );
      expect(init.method).toBe('POST');
      expect(JSON.parse(init.body)).toEqual({ username: ['dobie_adventures'], resultsLimit: 10 });
    });

    it('should throw FetchError with the status on API error', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ error: 'Unauthorized' }, false, 401));

      const error = await scrapeInstagramPosts(mockEnv, ['dobie_adventures'], 10).catch((e) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error.status).toBe(401);
      expect(error.message).toBe('Apify run failed: 401 - {"error":"Unauthorized"}');
    });

    it('should throw FetchError when the error body cannot be read', async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.error(new Error('terminated'));
        },
      });
      mockFetch.mockResolvedValueOnce(new Response(body, { status: 502 }));

      const error = await scrapeInstagramPosts(mockEnv, ['dobie_adventures'], 10).catch((e) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error.message).toBe('Apify run failed: 502 - ');
    });

    it('should wrap network errors', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNRESET'));

      await expect(scrapeInstagramPosts(mockEnv, ['dobie_adventures'], 10)).rejects.toThrow(
        'Apify request failed: ECONNRESET'
      );
    });

    it('should not call the API without a token', async () => {
      await expect(
        scrapeInstagramPosts({ ...mockEnv, APIFY_API_TOKEN: '' }, ['dobie_adventures'], 10)
      ).rejects.toBeInstanceOf(FetchError);

      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
