/**
 * Shared types for the reposting workflow
 */

/**
 * A managed account we repost competitor content to
 */
export interface PageConfig {
  /** Key used on the CLI and in results */
  id: string;
  /** Instagram handle of the managed account */
  igAccountName: string;
  /** Competitor handles to pull posts from */
  sourceAccounts: string[];
  /** Generic captions, one is picked at random per post */
  captions: string[];
  /** Latest posts fetched per source account */
  maxPostsToFetch: number;
  /** Top posts selected per source account */
  topPostsCount: number;
  /** Stop selecting once this many posts are queued for the page */
  maxTotalPostsToSchedule?: number;
  /** SocialBu account id that receives the scheduled posts */
  socialbuAccountId: number;
}

/**
 * Where a batch of posts came from
 */
export type FetchMode = 'live' | 'mock';

/**
 * A scraped video post, validated at the fetch boundary
 */
export interface RawPost {
  /** Provider post id */
  id: string;
  /** Handle the post was scraped from (without @) */
  sourceAccount: string;
  /** Direct video URL */
  mediaUrl: string;
  /** Public URL of the original post */
  postUrl: string;
  likes: number;
  comments: number;
  views: number;
  /** When the original was posted */
  timestamp: Date;
  caption?: string;
}

export interface RankedPost extends RawPost {
  engagementScore: number;
}

export interface FetchBatch {
  posts: RawPost[];
  mode: FetchMode;
}

export type UploadState =
  | 'INIT'
  | 'DOWNLOADING'
  | 'DOWNLOADED'
  | 'UPLOAD_INITIALIZED'
  | 'UPLOADING'
  | 'PROCESSING'
  | 'READY'
  | UploadFailureState;

export type UploadFailureState =
  | 'DOWNLOAD_FAILED'
  | 'INIT_FAILED'
  | 'UPLOAD_FAILED'
  | 'PROCESSING_TIMEOUT';

/**
 * A media asset the scheduling provider has finished processing
 */
export interface UploadedMedia {
  uploadToken: string;
  /** Final asset URL reported at upload initialization */
  assetUrl?: string;
  mimeType: string;
  bytes: number;
}

/**
 * Provider flags attached to a scheduled post
 */
export interface PublishOptions {
  postAsReel: boolean;
  shareReelToFeed: boolean;
  postAsStory?: boolean;
  /** First comment posted under the media */
  comment?: string;
}

export interface PublishRequest {
  accountIds: number[];
  uploadToken: string;
  caption: string;
  slot: Date;
  options: PublishOptions;
}

export interface PublishOutcome {
  success: boolean;
  /** Post ids created by the provider */
  postIds: string[];
  /** publish_at value sent to the provider */
  publishAt: string;
  attempts: number;
  status?: number;
  error?: string;
}

export type OutcomeStage = 'upload' | 'schedule' | 'publish' | 'scheduled';

/**
 * What happened to one selected post during a run
 */
export interface PostOutcome {
  postId: string;
  postUrl: string;
  sourceAccount: string;
  engagementScore: number;
  /** ISO timestamp of the slot, null when no slot was assigned */
  slot: string | null;
  success: boolean;
  /** Last stage reached ('scheduled' on success) */
  stage: OutcomeStage;
  /** Terminal upload state, when the upload failed */
  uploadState?: UploadFailureState;
  providerPostIds?: string[];
  error?: string;
}

export interface WorkflowCounts {
  fetched: number;
  ranked: number;
  uploaded: number;
  published: number;
  failed: number;
}

/**
 * Result of processing one page, appended to the results store
 */
export interface WorkflowResult {
  pageId: string;
  startedAt: string;
  completedAt: string;
  fetchMode: FetchMode;
  counts: WorkflowCounts;
  outcomes: PostOutcome[];
  /** Page-level errors (fetch failures, persistence problems) */
  errors: string[];
}

/**
 * Snapshot of the strategic schedule
 */
export interface ScheduleInfo {
  timezone: string;
  strategicTimes: string[];
  nextAvailableSlot: string;
  reservedSlots: string[];
}
