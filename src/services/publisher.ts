import type { PublishOutcome, PublishRequest } from '../lib/types';
import type { CreatePostPayload, SchedulingProvider } from './socialbu';
import { PublishError, errorMessage } from '../lib/errors';
import { withRetry, sleep as defaultSleep, type RetryPolicy } from '../lib/retry';
import { formatPublishAt } from '../lib/time';

export interface PostPublisherOptions {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Build the SocialBu post body for an uploaded video
 */
export function buildPostPayload(request: PublishRequest): CreatePostPayload {
  const options: Record<string, string | boolean> = {
    post_as_reel: request.options.postAsReel,
    share_reel_to_feed: request.options.shareReelToFeed,
  };
  if (request.options.postAsStory) {
    options.post_as_story = true;
  }
  if (request.options.comment) {
    options.comment = request.options.comment;
  }

  return {
    accounts: request.accountIds,
    content: request.caption,
    publish_at: formatPublishAt(request.slot),
    existing_attachments: [{ upload_token: request.uploadToken }],
    options,
  };
}

export class PostPublisher {
  constructor(
    private readonly provider: SchedulingProvider,
    private readonly policy: RetryPolicy,
    private readonly options: PostPublisherOptions = {}
  ) {}

  /**
   * Schedule the post. Failures are returned as an unsuccessful outcome; only
   * rate limiting is retried, so a request that may have landed is never sent twice.
   */
  async publish(request: PublishRequest): Promise<PublishOutcome> {
    const publishAt = formatPublishAt(request.slot);

    if (!request.uploadToken) {
      return { success: false, postIds: [], publishAt, attempts: 0, error: 'Missing upload token' };
    }

    const payload = buildPostPayload(request);
    let attempts = 0;

    try {
      const postIds = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.provider.createPost(payload);
        },
        this.policy,
        {
          shouldRetry: (error) => error instanceof PublishError && error.retryable,
          onRetry: (error, attempt, delayMs) => {
            console.warn(
              `[publisher] Attempt ${attempt}/${this.policy.maxAttempts} rate limited: ${errorMessage(error)}. Retrying in ${delayMs}ms`
            );
          },
          sleep: this.options.sleep ?? defaultSleep,
          random: this.options.random,
        }
      );

      console.log(`[publisher] Scheduled for ${publishAt} UTC (post ids: ${postIds.join(', ') || 'none reported'})`);
      return { success: true, postIds, publishAt, attempts };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[publisher] Publish failed after ${attempts} attempt(s): ${message}`);
      return {
        success: false,
        postIds: [],
        publishAt,
        attempts,
        status: error instanceof PublishError ? error.status : undefined,
        error: message,
      };
    }
  }
}
