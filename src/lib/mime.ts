import fs from 'fs/promises';

const EXTENSIONS: Record<string, string> = {
  'video/mp4': 'mp4',
  'video/quicktime': 'mov',
  'video/webm': 'webm',
  'video/x-m4v': 'm4v',
};

/**
 * Identify a video container from its leading bytes
 */
export function sniffVideoMimeType(header: Uint8Array): string | null {
  // ISO base media: [size:4]['ftyp'][brand:4]
  if (
    header.length >= 12 &&
    header[4] === 0x66 &&
    header[5] === 0x74 &&
    header[6] === 0x79 &&
    header[7] === 0x70
  ) {
    const brand = String.fromCharCode(header[8], header[9], header[10], header[11]);
    if (brand === 'qt  ') return 'video/quicktime';
    if (brand.startsWith('M4V')) return 'video/x-m4v';
    return 'video/mp4';
  }

  // EBML (Matroska / WebM)
  if (
    header.length >= 4 &&
    header[0] === 0x1a &&
    header[1] === 0x45 &&
    header[2] === 0xdf &&
    header[3] === 0xa3
  ) {
    return 'video/webm';
  }

  return null;
}

/**
 * Content sniffing first, then a video Content-Type header, then mp4
 */
export async function detectVideoMimeType(filePath: string, contentType?: string | null): Promise<string> {
  const handle = await fs.open(filePath, 'r');
  try {
    const header = new Uint8Array(16);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    const sniffed = sniffVideoMimeType(header.subarray(0, bytesRead));
    if (sniffed) return sniffed;
  } finally {
    await handle.close();
  }

  const declared = contentType?.split(';')[0].trim().toLowerCase();
  if (declared && declared.startsWith('video/')) return declared;

  return 'video/mp4';
}

export function extensionFor(mimeType: string): string {
  return EXTENSIONS[mimeType] ?? 'mp4';
}
