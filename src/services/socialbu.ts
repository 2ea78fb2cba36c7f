/**
 * SocialBu API client: media uploads and scheduled posts
 */

import fs from 'fs';
import { z } from 'zod';
import type { Env } from '../lib/env';
import { UploadError, PublishError, errorMessage } from '../lib/errors';
import { parsePublishAt } from '../lib/time';

export interface UploadTarget {
  signedUrl: string;
  /** Key polled for processing status */
  key: string;
  /** Final asset URL once processed */
  assetUrl?: string;
}

export interface UploadStatus {
  ready: boolean;
  uploadToken?: string;
}

export interface CreatePostPayload {
  accounts: number[];
  content: string;
  publish_at: string;
  existing_attachments: Array<{ upload_token: string }>;
  options: Record<string, string | boolean>;
}

export interface SocialBuAccount {
  id: number;
  name: string;
  type: string;
}

/**
 * Remote operations the uploader and publisher depend on
 */
export interface SchedulingProvider {
  initializeUpload(fileName: string, mimeType: string): Promise<UploadTarget>;
  transferFile(target: UploadTarget, filePath: string, mimeType: string, size: number): Promise<void>;
  checkUploadStatus(key: string): Promise<UploadStatus>;
  createPost(payload: CreatePostPayload): Promise<string[]>;
  listScheduledPublishTimes(): Promise<Date[]>;
  getAccounts(): Promise<SocialBuAccount[]>;
}

export interface SocialBuClientOptions {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
  transferTimeoutMs: number;
}

const UploadTargetSchema = z.object({
  signed_url: z.string().min(1),
  key: z.string().min(1),
  url: z.string().nullish(),
});

const UploadStatusSchema = z
  .object({
    success: z.boolean().optional(),
    upload_token: z.string().nullish(),
  })
  .passthrough();

const idList = z.array(z.union([z.string(), z.number()]));

const CreatePostResponseSchema = z
  .object({
    success: z.boolean().optional(),
    message: z.string().nullish(),
    error: z.string().nullish(),
    post_ids: idList.nullish(),
    posts: z.array(z.object({ id: z.union([z.string(), z.number()]) }).passthrough()).nullish(),
    id: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

const ScheduledPostSchema = z.object({ publish_at: z.string().nullish() }).passthrough();

const AccountSchema = z
  .object({
    id: z.number(),
    name: z.string().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 300);
  } catch {
    return '';
  }
}

function listFrom(data: unknown, ...keys: string[]): unknown[] {
  if (Array.isArray(data)) return data;
  if (data && typeof data === 'object') {
    for (const key of keys) {
      const value: unknown = Reflect.get(data, key);
      if (Array.isArray(value)) return value;
    }
  }
  return [];
}

export class SocialBuClient implements SchedulingProvider {
  constructor(private readonly options: SocialBuClientOptions) {}

  static fromEnv(env: Env, transferTimeoutMs: number): SocialBuClient {
    return new SocialBuClient({
      baseUrl: env.SOCIALBU_BASE_URL,
      apiToken: env.SOCIALBU_API_TOKEN,
      timeoutMs: env.SOCIALBU_TIMEOUT_MS,
      transferTimeoutMs,
    });
  }

  private request(method: string, endpoint: string, body?: unknown): Promise<Response> {
    return fetch(`${this.options.baseUrl}${endpoint}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.options.apiToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
  }

  /**
   * Step 1: ask for a signed upload URL
   */
  async initializeUpload(fileName: string, mimeType: string): Promise<UploadTarget> {
    let response: Response;
    try {
      response = await this.request('POST', '/upload_media', { name: fileName, mime_type: mimeType });
    } catch (error) {
      throw new UploadError('INIT_FAILED', `Upload initialization failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const error = await readBody(response);
      throw new UploadError('INIT_FAILED', `Upload initialization failed: ${response.status} - ${error}`, {
        status: response.status,
      });
    }

    const parsed = UploadTargetSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new UploadError('INIT_FAILED', 'Upload initialization returned no signed URL');
    }

    return {
      signedUrl: parsed.data.signed_url,
      key: parsed.data.key,
      assetUrl: parsed.data.url ?? undefined,
    };
  }

  /**
   * Step 2: PUT the file to the signed storage URL
   */
  async transferFile(target: UploadTarget, filePath: string, mimeType: string, size: number): Promise<void> {
    let response: Response;
    try {
      response = await fetch(target.signedUrl, {
        method: 'PUT',
        headers: {
          'Content-Type': mimeType,
          'Content-Length': String(size),
          'x-amz-acl': 'private',
        },
        body: fs.createReadStream(filePath),
        duplex: 'half',
        signal: AbortSignal.timeout(this.options.transferTimeoutMs),
      });
    } catch (error) {
      throw new UploadError('UPLOAD_FAILED', `File transfer failed: ${errorMessage(error)}`, {
        retryable: true,
      });
    }

    if (response.status !== 200 && response.status !== 204) {
      const error = await readBody(response);
      throw new UploadError('UPLOAD_FAILED', `File transfer failed: ${response.status} - ${error}`, {
        status: response.status,
        retryable: response.status >= 500 || response.status === 429,
      });
    }
  }

  /**
   * Step 3: check whether the uploaded file has been processed
   */
  async checkUploadStatus(key: string): Promise<UploadStatus> {
    const response = await this.request('GET', `/upload_media/status?key=${encodeURIComponent(key)}`);

    if (!response.ok) {
      const error = await readBody(response);
      throw new Error(`Status check failed: ${response.status} - ${error}`);
    }

    const parsed = UploadStatusSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      return { ready: false };
    }

    const token = parsed.data.upload_token;
    return token ? { ready: true, uploadToken: token } : { ready: false };
  }

  /**
   * Create a scheduled post, returning the provider's post ids
   */
  async createPost(payload: CreatePostPayload): Promise<string[]> {
    let response: Response;
    try {
      response = await this.request('POST', '/posts', payload);
    } catch (error) {
      throw new PublishError(`Publish request failed: ${errorMessage(error)}`);
    }

    if (response.status === 429) {
      throw new PublishError('Rate limited by SocialBu', { status: 429, retryable: true });
    }

    if (!response.ok) {
      const error = await readBody(response);
      throw new PublishError(`Publish failed: ${response.status} - ${error}`, { status: response.status });
    }

    const raw: unknown = await response.json().catch(() => null);
    if (raw === null) {
      console.warn('[socialbu] Post created but response was not JSON');
      return [];
    }

    const parsed = CreatePostResponseSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[socialbu] Post created but response was not recognised: ${JSON.stringify(raw).slice(0, 200)}`);
      return [];
    }

    const data = parsed.data;
    if (data.success === false) {
      throw new PublishError(`Publish rejected: ${data.message || data.error || 'unknown error'}`, {
        status: response.status,
      });
    }

    if (data.post_ids) return data.post_ids.map(String);
    if (data.posts) return data.posts.map((p) => String(p.id));
    if (data.id != null) return [String(data.id)];
    return [];
  }

  /**
   * Publish times of posts already scheduled on the account
   */
  async listScheduledPublishTimes(): Promise<Date[]> {
    const response = await this.request('GET', '/posts?status=scheduled');

    if (!response.ok) {
      const error = await readBody(response);
      throw new Error(`Listing scheduled posts failed: ${response.status} - ${error}`);
    }

    const data: unknown = await response.json();
    const times: Date[] = [];

    for (const entry of listFrom(data, 'data', 'posts', 'items')) {
      const parsed = ScheduledPostSchema.safeParse(entry);
      const publishAt = parsed.success ? parsed.data.publish_at : null;
      const date = publishAt ? parsePublishAt(publishAt) : null;
      if (date) times.push(date);
    }

    return times;
  }

  /**
   * Connected social accounts (used as a connection check)
   */
  async getAccounts(): Promise<SocialBuAccount[]> {
    const response = await this.request('GET', '/accounts');

    if (!response.ok) {
      const error = await readBody(response);
      throw new Error(`Listing accounts failed: ${response.status} - ${error}`);
    }

    const data: unknown = await response.json();
    const accounts: SocialBuAccount[] = [];

    for (const entry of listFrom(data, 'accounts', 'data', 'items')) {
      const parsed = AccountSchema.safeParse(entry);
      if (parsed.success) {
        accounts.push({
          id: parsed.data.id,
          name: parsed.data.name ?? '',
          type: parsed.data.type ?? 'unknown',
        });
      }
    }

    return accounts;
  }
}
