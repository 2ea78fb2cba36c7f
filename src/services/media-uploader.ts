/**
 * Moves one competitor video into SocialBu:
 * download -> initialize upload -> transfer bytes -> poll until processed.
 *
 * The temp directory holding the download is removed on every exit path.
 */

import fs from 'fs';
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { UploadConfig } from '../lib/config';
import type { UploadedMedia, UploadFailureState, UploadState } from '../lib/types';
import type { SchedulingProvider, UploadTarget } from './socialbu';
import { UploadError, errorMessage } from '../lib/errors';
import { withRetry, sleep as defaultSleep, type RetryPolicy } from '../lib/retry';
import { detectVideoMimeType, extensionFor } from '../lib/mime';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export type UploadResult =
  | { ok: true; state: 'READY'; media: UploadedMedia; history: UploadState[] }
  | { ok: false; state: UploadFailureState; error: string; history: UploadState[] };

export interface MediaUploaderOptions {
  provider: SchedulingProvider;
  config: UploadConfig;
  retry: RetryPolicy;
  /** Parent directory for per-upload temp dirs */
  tmpRoot?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface DownloadedFile {
  path: string;
  name: string;
  mimeType: string;
  size: number;
}

const NEXT: Partial<Record<UploadState, UploadState>> = {
  INIT: 'DOWNLOADING',
  DOWNLOADING: 'DOWNLOADED',
  DOWNLOADED: 'UPLOAD_INITIALIZED',
  UPLOAD_INITIALIZED: 'UPLOADING',
  UPLOADING: 'PROCESSING',
  PROCESSING: 'READY',
};

const FAILURE_FOR: Partial<Record<UploadState, UploadFailureState>> = {
  INIT: 'DOWNLOAD_FAILED',
  DOWNLOADING: 'DOWNLOAD_FAILED',
  DOWNLOADED: 'INIT_FAILED',
  UPLOAD_INITIALIZED: 'UPLOAD_FAILED',
  UPLOADING: 'UPLOAD_FAILED',
  PROCESSING: 'PROCESSING_TIMEOUT',
};

/**
 * State of a single upload. Only forward transitions are allowed.
 */
export class UploadSession {
  private current: UploadState = 'INIT';
  readonly history: UploadState[] = ['INIT'];

  get state(): UploadState {
    return this.current;
  }

  advance(to: UploadState): void {
    if (NEXT[this.current] !== to) {
      throw new Error(`Invalid upload transition ${this.current} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
  }

  /**
   * Move to the terminal failure for the current state, or the error's own state
   */
  fail(error: unknown): UploadFailureState {
    const fallback = FAILURE_FOR[this.current] ?? 'UPLOAD_FAILED';
    const state = error instanceof UploadError ? error.state : fallback;
    this.current = state;
    this.history.push(state);
    return state;
  }
}

export class MediaUploader {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: MediaUploaderOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run the full upload for one video. Never throws; failures come back as a terminal state.
   */
  async upload(mediaUrl: string, fileStem: string): Promise<UploadResult> {
    const session = new UploadSession();
    const stem = fileStem.replace(/[^A-Za-z0-9_-]/g, '_') || 'video';
    let tempDir: string | null = null;

    try {
      session.advance('DOWNLOADING');
      tempDir = await fsp.mkdtemp(path.join(this.options.tmpRoot ?? os.tmpdir(), 'reposter-'));
      const file = await this.download(mediaUrl, tempDir, stem);
      session.advance('DOWNLOADED');
      console.log(`[uploader] Downloaded ${file.name} (${(file.size / (1024 * 1024)).toFixed(2)} MB, ${file.mimeType})`);

      const target = await this.options.provider.initializeUpload(file.name, file.mimeType);
      session.advance('UPLOAD_INITIALIZED');

      session.advance('UPLOADING');
      await this.transfer(target, file);

      session.advance('PROCESSING');
      const uploadToken = await this.waitForProcessing(target.key);
      session.advance('READY');
      console.log(`[uploader] ${file.name} ready`);

      return {
        ok: true,
        state: 'READY',
        media: {
          uploadToken,
          assetUrl: target.assetUrl,
          mimeType: file.mimeType,
          bytes: file.size,
        },
        history: session.history,
      };
    } catch (error) {
      const state = session.fail(error);
      const message = errorMessage(error);
      console.error(`[uploader] ${stem} ${state}: ${message}`);
      return { ok: false, state, error: message, history: session.history };
    } finally {
      if (tempDir) {
        await this.cleanup(tempDir);
      }
    }
  }

  private async download(url: string, dir: string, stem: string): Promise<DownloadedFile> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(this.options.config.downloadTimeoutMs),
      });
    } catch (error) {
      throw new UploadError('DOWNLOAD_FAILED', `Download failed: ${errorMessage(error)}`);
    }

    if (!response.ok || !response.body) {
      throw new UploadError('DOWNLOAD_FAILED', `Download failed: ${response.status}`, {
        status: response.status,
      });
    }

    const partial = path.join(dir, `${stem}.part`);
    try {
      await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(partial));
    } catch (error) {
      throw new UploadError('DOWNLOAD_FAILED', `Download interrupted: ${errorMessage(error)}`);
    }

    const { size } = await fsp.stat(partial);
    if (size === 0) {
      throw new UploadError('DOWNLOAD_FAILED', 'Downloaded file is empty');
    }

    const mimeType = await detectVideoMimeType(partial, response.headers.get('content-type'));
    const name = `${stem}.${extensionFor(mimeType)}`;
    const filePath = path.join(dir, name);
    await fsp.rename(partial, filePath);

    return { path: filePath, name, mimeType, size };
  }

  private async transfer(target: UploadTarget, file: DownloadedFile): Promise<void> {
    await withRetry(
      () => this.options.provider.transferFile(target, file.path, file.mimeType, file.size),
      this.options.retry,
      {
        shouldRetry: (error) => error instanceof UploadError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[uploader] Transfer attempt ${attempt}/${this.options.retry.maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`
          );
        },
        sleep: this.sleep,
      }
    );
  }

  private async waitForProcessing(key: string): Promise<string> {
    const { pollIntervalMs, maxProcessingWaitMs } = this.options.config;
    const start = this.now();

    while (true) {
      try {
        const status = await this.options.provider.checkUploadStatus(key);
        if (status.ready && status.uploadToken) {
          return status.uploadToken;
        }
      } catch (error) {
        console.warn(`[uploader] Status check failed: ${errorMessage(error)}`);
      }

      if (this.now() - start + pollIntervalMs > maxProcessingWaitMs) {
        throw new UploadError(
          'PROCESSING_TIMEOUT',
          `Upload processing timed out after ${Math.round(maxProcessingWaitMs / 1000)}s`
        );
      }
      await this.sleep(pollIntervalMs);
    }
  }

  private async cleanup(dir: string): Promise<void> {
    try {
      await fsp.rm(dir, { recursive: true, force: true });
    } catch (error) {
      console.error(`[uploader] Failed to remove ${dir}:`, error);
    }
  }
}
