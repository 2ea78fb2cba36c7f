import type { Env } from '../lib/env';
import type { FetchBatch, FetchMode } from '../lib/types';
import { FetchError } from '../lib/errors';
import { scrapeInstagramPosts } from './instagram';
import { createMockPosts } from './mock';

/**
 * Pulls recent video posts for a list of competitor accounts
 */
export interface SourceFetcher {
  readonly mode: FetchMode;
  fetch(sourceAccounts: string[], maxPosts: number): Promise<FetchBatch>;
}

export class ApifySourceFetcher implements SourceFetcher {
  readonly mode = 'live' as const;

  constructor(private readonly env: Env) {}

  async fetch(sourceAccounts: string[], maxPosts: number): Promise<FetchBatch> {
    const posts = await scrapeInstagramPosts(this.env, sourceAccounts, maxPosts);
    return { posts, mode: this.mode };
  }
}

export class MockSourceFetcher implements SourceFetcher {
  readonly mode = 'mock' as const;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async fetch(sourceAccounts: string[], maxPosts: number): Promise<FetchBatch> {
    return { posts: createMockPosts(sourceAccounts, maxPosts, this.now()), mode: this.mode };
  }
}

/**
 * Uses the primary fetcher, switching to the fallback for a request the primary cannot serve
 */
export class FallbackSourceFetcher implements SourceFetcher {
  readonly mode: FetchMode;

  constructor(
    private readonly primary: SourceFetcher,
    private readonly fallback: SourceFetcher
  ) {
    this.mode = primary.mode;
  }

  async fetch(sourceAccounts: string[], maxPosts: number): Promise<FetchBatch> {
    try {
      return await this.primary.fetch(sourceAccounts, maxPosts);
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;

      console.warn(`[fetch] ${error.message} - using ${this.fallback.mode} data for ${sourceAccounts.join(', ')}`);
      return this.fallback.fetch(sourceAccounts, maxPosts);
    }
  }
}

const PLACEHOLDER_TOKENS = new Set(['', 'your_apify_api_token_here']);

/**
 * Pick the fetcher for a run: mock without a scraper token, live with mock fallback otherwise
 */
export function createSourceFetcher(env: Env): SourceFetcher {
  if (PLACEHOLDER_TOKENS.has(env.APIFY_API_TOKEN.trim())) {
    console.warn('[fetch] Apify API token not configured - using mock data');
    return new MockSourceFetcher();
  }

  return new FallbackSourceFetcher(new ApifySourceFetcher(env), new MockSourceFetcher());
}
