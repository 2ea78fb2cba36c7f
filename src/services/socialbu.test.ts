import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SocialBuClient, type UploadTarget } from './socialbu';
import { UploadError, PublishError } from '../lib/errors';
import { createMockFetchResponse, createMp4Bytes, mockSocialBuResponses } from '../test/mocks';

const mockFetch = vi.fn();

const BASE_URL = 'https://socialbu.example.test/api/v1';

describe('SocialBu Client', () => {
  const client = new SocialBuClient({
    baseUrl: BASE_URL,
    apiToken: 'test-socialbu-token',
    timeoutMs: 1000,
    transferTimeoutMs: 1000,
  });

  const target: UploadTarget = {
    signedUrl: mockSocialBuResponses.uploadInit.signed_url,
    key: mockSocialBuResponses.uploadInit.key,
  };

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('initializeUpload', () => {
    it('should request a signed URL for the file', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.uploadInit));

      const result = await client.initializeUpload('clip.mp4', 'video/mp4');

      expect(result).toEqual({
        signedUrl: 'https://uploads.example.test/signed/abc?X-Amz-Signature=test',
        key: 'uploads/test-key-1',
        assetUrl: 'https://media.example.test/uploads/test-key-1.mp4',
      });

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/upload_media`);
      expect(init.method).toBe('POST');
      expect(init.headers.Authorization).toBe('Bearer test-socialbu-token');
      expect(JSON.parse(init.body)).toEqual({ name: 'clip.mp4', mime_type: 'video/mp4' });
    });

    it('should fail with INIT_FAILED on an error status', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ message: 'Unauthenticated.' }, false, 401));

      await expect(client.initializeUpload('clip.mp4', 'video/mp4')).rejects.toMatchObject({
        name: 'UploadError',
        state: 'INIT_FAILED',
        status: 401,
      });
    });

    it('should fail with INIT_FAILED when no signed URL comes back', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ success: true }));

      await expect(client.initializeUpload('clip.mp4', 'video/mp4')).rejects.toThrow(
        'Upload initialization returned no signed URL'
      );
    });
  });

  describe('transferFile', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'socialbu-test-'));
      file = path.join(dir, 'clip.mp4');
      fs.writeFileSync(file, createMp4Bytes(128));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should PUT the file with storage headers', async () => {
      mockFetch.mockResolvedValueOnce(new Response(null, { status: 200 }));

      await client.transferFile(target, file, 'video/mp4', 128);

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(target.signedUrl);
      expect(init.method).toBe('PUT');
      expect(init.headers).toEqual({
        'Content-Type': 'video/mp4',
        'Content-Length': '128',
        'x-amz-acl': 'private',
      });
      expect(init.duplex).toBe('half');
      init.body.destroy();
    });

    it('should accept 204 No Content', async () => {
      mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      await expect(client.transferFile(target, file, 'video/mp4', 128)).resolves.toBeUndefined();
    });

    it('should mark server errors as retryable', async () => {
      mockFetch.mockResolvedValueOnce(new Response('Service Unavailable', { status: 503 }));

      const error = await client.transferFile(target, file, 'video/mp4', 128).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UploadError);
      expect(error).toMatchObject({ state: 'UPLOAD_FAILED', status: 503, retryable: true });
    });

    it('should not retry a rejected signature', async () => {
      mockFetch.mockResolvedValueOnce(new Response('SignatureDoesNotMatch', { status: 403 }));

      await expect(client.transferFile(target, file, 'video/mp4', 128)).rejects.toMatchObject({
        state: 'UPLOAD_FAILED',
        status: 403,
        retryable: false,
      });
    });

    it('should mark network errors as retryable', async () => {
      mockFetch.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(client.transferFile(target, file, 'video/mp4', 128)).rejects.toMatchObject({
        message: 'File transfer failed: socket hang up',
        retryable: true,
      });
    });
  });

  describe('checkUploadStatus', () => {
    it('should report pending uploads', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.statusPending));

      expect(await client.checkUploadStatus('uploads/test-key-1')).toEqual({ ready: false });
      expect(mockFetch.mock.calls[0][0]).toBe(`${BASE_URL}/upload_media/status?key=uploads%2Ftest-key-1`);
    });

    it('should return the upload token once processed', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.statusReady));

      expect(await client.checkUploadStatus('uploads/test-key-1')).toEqual({
        ready: true,
        uploadToken: 'test-upload-token-1',
      });
    });

    it('should throw on an error status', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({}, false, 500));

      await expect(client.checkUploadStatus('uploads/test-key-1')).rejects.toThrow('Status check failed: 500');
    });
  });

  describe('createPost', () => {
    const payload = {
      accounts: [100001],
      content: 'Doberman energy right here 💪\n\nOriginal by: @dobie_adventures',
      publish_at: '2026-10-20 15:00:00',
      existing_attachments: [{ upload_token: 'test-upload-token-1' }],
      options: { post_as_reel: true, share_reel_to_feed: true },
    };

    it('should send the payload and return post ids', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.createPost));

      expect(await client.createPost(payload)).toEqual(['7001']);

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/posts`);
      expect(JSON.parse(init.body)).toEqual(payload);
    });

    it('should read ids from a posts array', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ posts: [{ id: 7002 }, { id: 'abc' }] }));

      expect(await client.createPost(payload)).toEqual(['7002', 'abc']);
    });

    it('should flag rate limiting as retryable', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ message: 'Too Many Attempts.' }, false, 429));

      const error = await client.createPost(payload).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PublishError);
      expect(error).toMatchObject({ status: 429, retryable: true });
    });

    it('should not retry other failures', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ message: 'Invalid account' }, false, 422));

      await expect(client.createPost(payload)).rejects.toMatchObject({ status: 422, retryable: false });
    });

    it('should treat success: false as a rejection', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ success: false, message: 'Account disconnected' }));

      await expect(client.createPost(payload)).rejects.toThrow('Publish rejected: Account disconnected');
    });

    it('should accept a non-JSON success body', async () => {
      mockFetch.mockResolvedValueOnce(new Response('OK', { status: 200 }));

      expect(await client.createPost(payload)).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith('[socialbu] Post created but response was not JSON');
    });
    it('should warn about an unrecognised success body', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ success: 'yes', post_ids: 7001 }));

      expect(await client.createPost(payload)).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith(
        '[socialbu] Post created but response was not recognised: {"success":"yes","post_ids":7001}'
      );
    });
  });

  describe('listScheduledPublishTimes', () => {
    it('should parse publish times and skip bad values', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.scheduledPosts));

      const times = await client.listScheduledPublishTimes();

      expect(times).toEqual([new Date('2026-10-20T15:00:00.000Z')]);
      expect(mockFetch.mock.calls[0][0]).toBe(`${BASE_URL}/posts?status=scheduled`);
    });
  });

  describe('getAccounts', () => {
    it('should list connected accounts', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse(mockSocialBuResponses.accounts));

      expect(await client.getAccounts()).toEqual([
        { id: 100001, name: 'daily_dobermans', type: 'instagram.api' },
      ]);
    });

    it('should throw when the token is rejected', async () => {
      mockFetch.mockResolvedValueOnce(createMockFetchResponse({ message: 'Unauthenticated.' }, false, 401));

      await expect(client.getAccounts()).rejects.toThrow('Listing accounts failed: 401');
    });
  });
});
