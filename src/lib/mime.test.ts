import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { sniffVideoMimeType, detectVideoMimeType, extensionFor } from './mime';
import { createMp4Bytes } from '../test/mocks';

function ftyp(brand: string): Uint8Array {
  const bytes = new Uint8Array(16);
  bytes.set([0x00, 0x00, 0x00, 0x18, 0x66, 0x74, 0x79, 0x70]);
  bytes.set(Array.from(brand, (c) => c.charCodeAt(0)), 8);
  return bytes;
}

describe('mime', () => {
  describe('sniffVideoMimeType', () => {
    it('should detect mp4 from the ftyp box', () => {
      expect(sniffVideoMimeType(createMp4Bytes())).toBe('video/mp4');
    });

    it('should detect quicktime and m4v brands', () => {
      expect(sniffVideoMimeType(ftyp('qt  '))).toBe('video/quicktime');
      expect(sniffVideoMimeType(ftyp('M4V '))).toBe('video/x-m4v');
    });

    it('should detect webm', () => {
      expect(sniffVideoMimeType(new Uint8Array([0x1a, 0x45, 0xdf, 0xa3, 0x01]))).toBe('video/webm');
    });

    it('should return null for unknown content', () => {
      expect(sniffVideoMimeType(new TextEncoder().encode('<html>blocked</html>'))).toBeNull();
      expect(sniffVideoMimeType(new Uint8Array())).toBeNull();
    });
  });

  describe('detectVideoMimeType', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mime-test-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should prefer the file content over the header', async () => {
      const file = path.join(dir, 'clip.bin');
      fs.writeFileSync(file, createMp4Bytes());

      expect(await detectVideoMimeType(file, 'video/webm')).toBe('video/mp4');
    });

    it('should fall back to a video content type', async () => {
      const file = path.join(dir, 'clip.bin');
      fs.writeFileSync(file, 'not a known container');

      expect(await detectVideoMimeType(file, 'video/ogg; codecs=theora')).toBe('video/ogg');
    });

    it('should default to mp4', async () => {
      const file = path.join(dir, 'clip.bin');
      fs.writeFileSync(file, 'not a known container');

      expect(await detectVideoMimeType(file, 'application/octet-stream')).toBe('video/mp4');
    });
  });

  it('should map mime types to file extensions', () => {
    expect(extensionFor('video/quicktime')).toBe('mov');
    expect(extensionFor('video/ogg')).toBe('mp4');
  });
});
