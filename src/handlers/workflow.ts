import { getEnv, validateEnv, type Env } from '../lib/env';
import { getAppConfig, type AppConfig } from '../lib/config';
import { loadPages } from '../lib/pages';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { formatLocal } from '../lib/time';
import type {
  FetchMode,
  PageConfig,
  PostOutcome,
  PublishOutcome,
  PublishRequest,
  RankedPost,
  RawPost,
  ScheduleInfo,
  WorkflowCounts,
  WorkflowResult,
} from '../lib/types';
import { createSourceFetcher, type SourceFetcher } from '../scanners';
import { selectTopPosts } from '../services/ranking';
import { SocialBuClient, type SchedulingProvider, type SocialBuAccount } from '../services/socialbu';
import { MediaUploader, type UploadResult } from '../services/media-uploader';
import { StrategicScheduler } from '../services/scheduler';
import { sqliteSlotStore } from '../services/slot-store';
import { PostPublisher } from '../services/publisher';
import { JsonResultsStore, type ResultsStore } from '../services/results-store';
import { isProcessed, markProcessed } from '../services/processed-posts';
import { formatRunSummary, sendNotification } from '../services/telegram';

export interface ProcessedPostLedger {
  isProcessed(pageId: string, postId: string): boolean;
  markProcessed(pageId: string, postId: string, postUrl: string): void;
}

export interface WorkflowDeps {
  pages: PageConfig[];
  fetcher: SourceFetcher;
  provider: SchedulingProvider;
  uploader: { upload(mediaUrl: string, fileStem: string): Promise<UploadResult> };
  scheduler: StrategicScheduler;
  publisher: { publish(request: PublishRequest): Promise<PublishOutcome> };
  resultsStore: ResultsStore;
  processed: ProcessedPostLedger;
  /** Environment keys a run cannot start without */
  missingCredentials?: string[];
  notify?: (results: WorkflowResult[]) => Promise<unknown>;
  random?: () => number;
  now?: () => Date;
}

/**
 * Random caption from the pool, credited to the original account
 */
export function buildCaption(captions: string[], sourceAccount: string, random: () => number = Math.random): string {
  const caption = captions[Math.floor(random() * captions.length)] ?? '';
  return `${caption}\n\nOriginal by: @${sourceAccount}`;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Counts and outcomes of a page, filled in as the page runs
 */
interface PageProgress {
  startedAt: string;
  counts: WorkflowCounts;
  outcomes: PostOutcome[];
  errors: string[];
  modes: Set<FetchMode>;
}

function emptyCounts(): WorkflowCounts {
  return { fetched: 0, ranked: 0, uploaded: 0, published: 0, failed: 0 };
}

/**
 * Drives fetch -> rank -> upload -> schedule -> publish for every configured page
 */
export class WorkflowOrchestrator {
  private running = false;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowDeps) {
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  listPages(): PageConfig[] {
    return this.deps.pages;
  }

  getPage(pageId: string): PageConfig | undefined {
    return this.deps.pages.find((page) => page.id === pageId);
  }

  getRecentResults(limit: number): Promise<WorkflowResult[]> {
    return this.deps.resultsStore.readRecent(limit);
  }

  getScheduleInfo(): ScheduleInfo {
    return this.deps.scheduler.getInfo();
  }

  /**
   * Pages a run would cover. Throws ConfigurationError for missing
   * credentials or an unknown page.
   */
  assertRunnable(pageId?: string): PageConfig[] {
    const missing = this.deps.missingCredentials ?? [];
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
    }

    if (pageId === undefined) {
      return this.deps.pages;
    }

    const page = this.getPage(pageId);
    if (!page) {
      throw new ConfigurationError(`Unknown page "${pageId}"`);
    }
    return [page];
  }

  /**
   * SocialBu accounts visible to the configured token
   */
  checkConnection(): Promise<SocialBuAccount[]> {
    return this.deps.provider.getAccounts();
  }

  /**
   * Run one page, or every page when no id is given. Only configuration
   * problems reject; everything else is reported in the results.
   */
  async run(pageId?: string): Promise<WorkflowResult[]> {
    const pages = this.assertRunnable(pageId);

    if (this.running) {
      throw new Error('A workflow run is already in progress');
    }

    this.running = true;
    try {
      console.log(`[workflow] Starting run for ${pages.length} page(s)`);
      await this.prepareSchedule();

      const results: WorkflowResult[] = [];
      for (const page of pages) {
        results.push(await this.runPageSafely(page));
      }

      const published = results.reduce((sum, r) => sum + r.counts.published, 0);
      const failed = results.reduce((sum, r) => sum + r.counts.failed, 0);
      console.log(`[workflow] Run complete: ${published} scheduled, ${failed} failed`);

      await this.notify(results);
      return results;
    } finally {
      this.running = false;
    }
  }

  private async prepareSchedule(): Promise<void> {
    this.deps.scheduler.beginRun();

    try {
      const booked = await this.deps.provider.listScheduledPublishTimes();
      const added = this.deps.scheduler.markUsed(booked);
      if (added > 0) {
        console.log(`[workflow] ${added} slot(s) already booked on SocialBu`);
      }
    } catch (error) {
      console.warn(`[workflow] Could not load scheduled posts: ${errorMessage(error)}`);
    }
  }

  /**
   * Run a page and always produce its result. An unexpected error stops the
   * page, but outcomes recorded before it are kept.
   */
  private async runPageSafely(page: PageConfig): Promise<WorkflowResult> {
    const progress: PageProgress = {
      startedAt: this.now().toISOString(),
      counts: emptyCounts(),
      outcomes: [],
      errors: [],
      modes: new Set(),
    };

    try {
      await this.runPage(page, progress);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;

      console.error(`[workflow] Page ${page.id} failed:`, errorMessage(error));
      progress.errors.push(errorMessage(error));
    }

    const { counts, modes } = progress;
    const result: WorkflowResult = {
      pageId: page.id,
      startedAt: progress.startedAt,
      completedAt: this.now().toISOString(),
      fetchMode: modes.has('mock') ? 'mock' : modes.has('live') ? 'live' : this.deps.fetcher.mode,
      counts,
      outcomes: progress.outcomes,
      errors: progress.errors,
    };

    console.log(
      `[workflow] Page ${page.id}: ${counts.fetched} fetched, ${counts.published} scheduled, ${counts.failed} failed` +
        (result.fetchMode === 'mock' ? ' (mock data)' : '')
    );

    await this.persist(result);
    return result;
  }

  private async runPage(page: PageConfig, progress: PageProgress): Promise<void> {
    console.log(`[workflow] Processing page ${page.id} (@${page.igAccountName})`);

    const { counts, errors, modes } = progress;
    const selected = await this.selectPosts(page, counts, errors, modes);

    for (const post of selected) {
      const outcome = await this.processPost(page, post, errors);
      progress.outcomes.push(outcome);

      if (outcome.stage !== 'upload') counts.uploaded++;
      if (outcome.success) counts.published++;
      else counts.failed++;
    }
  }

  /**
   * Fetch each source account in random order and keep its top posts until the page cap is met
   */
  private async selectPosts(
    page: PageConfig,
    counts: WorkflowCounts,
    errors: string[],
    modes: Set<FetchMode>
  ): Promise<RankedPost[]> {
    const cap = page.maxTotalPostsToSchedule ?? Infinity;
    const selected: RankedPost[] = [];

    for (const source of shuffle(page.sourceAccounts, this.random)) {
      if (selected.length >= cap) break;

      let posts: RawPost[];
      try {
        const batch = await this.deps.fetcher.fetch([source], page.maxPostsToFetch);
        modes.add(batch.mode);
        posts = batch.posts;
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        const message = `Fetch failed for @${source}: ${errorMessage(error)}`;
        console.error(`[workflow] ${message}`);
        errors.push(message);
        continue;
      }

      counts.fetched += posts.length;
      const fresh = posts.filter(
        (post) => !this.deps.processed.isProcessed(page.id, post.id) && !selected.some((s) => s.id === post.id)
      );
      counts.ranked += fresh.length;

      const top = selectTopPosts(fresh, Math.min(page.topPostsCount, cap - selected.length));
      console.log(`[workflow] @${source}: ${posts.length} videos, ${fresh.length} new, ${top.length} selected`);
      selected.push(...top);
    }

    return selected;
  }

  private async processPost(page: PageConfig, post: RankedPost, errors: string[]): Promise<PostOutcome> {
    const base = {
      postId: post.id,
      postUrl: post.postUrl,
      sourceAccount: post.sourceAccount,
      engagementScore: post.engagementScore,
    };

    let upload: UploadResult;
    try {
      upload = await this.deps.uploader.upload(post.mediaUrl, post.id);
    } catch (error) {
      return { ...base, slot: null, success: false, stage: 'upload', error: errorMessage(error) };
    }

    if (!upload.ok) {
      return { ...base, slot: null, success: false, stage: 'upload', uploadState: upload.state, error: upload.error };
    }

    let slot: Date;
    try {
      slot = this.deps.scheduler.nextSlot({ pageId: page.id, postId: post.id });
    } catch (error) {
      return { ...base, slot: null, success: false, stage: 'schedule', error: errorMessage(error) };
    }

    let outcome: PublishOutcome;
    try {
      outcome = await this.deps.publisher.publish({
        accountIds: [page.socialbuAccountId],
        uploadToken: upload.media.uploadToken,
        caption: buildCaption(page.captions, post.sourceAccount, this.random),
        slot,
        options: {
          postAsReel: true,
          shareReelToFeed: true,
          comment: `Original content by @${post.sourceAccount}`,
        },
      });
    } catch (error) {
      outcome = { success: false, postIds: [], publishAt: '', attempts: 0, error: errorMessage(error) };
    }

    if (!outcome.success) {
      try {
        this.deps.scheduler.release(slot);
      } catch (error) {
        const message = `Could not release slot ${slot.toISOString()}: ${errorMessage(error)}`;
        console.error(`[workflow] ${message}`);
        errors.push(message);
      }
      return {
        ...base,
        slot: slot.toISOString(),
        success: false,
        stage: 'publish',
        error: outcome.error ?? 'Publish failed',
      };
    }

    try {
      this.deps.processed.markProcessed(page.id, post.id, post.postUrl);
    } catch (error) {
      const message = `Scheduled ${post.id} but could not record it as processed: ${errorMessage(error)}`;
      console.error(`[workflow] ${message}`);
      errors.push(message);
    }

    console.log(`[workflow] ${post.postUrl} -> ${formatLocal(slot, this.deps.scheduler.timezone)}`);
    return {
      ...base,
      slot: slot.toISOString(),
      success: true,
      stage: 'scheduled',
      providerPostIds: outcome.postIds,
    };
  }

  private async persist(result: WorkflowResult): Promise<void> {
    try {
      await this.deps.resultsStore.append(result);
    } catch (error) {
      const message = `Failed to save results: ${errorMessage(error)}`;
      console.error(`[results] ${message}`);
      result.errors.push(message);
    }
  }

  private async notify(results: WorkflowResult[]): Promise<void> {
    if (!this.deps.notify || results.length === 0) return;
    try {
      await this.deps.notify(results);
    } catch (error) {
      console.error('[workflow] Notification failed:', errorMessage(error));
    }
  }
}

/**
 * Wire the orchestrator to SocialBu, Apify (or mock data), SQLite and the results file
 */
export function createWorkflowOrchestrator(
  env: Env = getEnv(),
  config: AppConfig = getAppConfig()
): WorkflowOrchestrator {
  const pages = loadPages(env.PAGES_PATH);
  const provider = SocialBuClient.fromEnv(env, config.upload.transferTimeoutMs);

  return new WorkflowOrchestrator({
    pages,
    fetcher: createSourceFetcher(env),
    provider,
    uploader: new MediaUploader({ provider, config: config.upload, retry: config.retry.upload }),
    scheduler: new StrategicScheduler(sqliteSlotStore, config.schedule),
    publisher: new PostPublisher(provider, config.retry.publish),
    resultsStore: new JsonResultsStore(env.RESULTS_PATH, config.results.retention),
    processed: { isProcessed, markProcessed },
    missingCredentials: validateEnv(env).missing,
    notify: (results) => sendNotification(formatRunSummary(results)),
  });
}
