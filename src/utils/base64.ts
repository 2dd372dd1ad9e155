import { InvalidImageError } from './errors';

const DATA_URI_PREFIX = /^data:image\/[\w.+-]+;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/** Decode base64 image data, with or without a `data:image/...;base64,` prefix */
export function base64ImageToBuffer(base64: string): Buffer {
  const cleaned = base64.trim().replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');
  if (cleaned.length === 0 || !BASE64_BODY.test(cleaned)) {
    throw new InvalidImageError('Image data is not valid base64');
  }
  return Buffer.from(cleaned, 'base64');
}

/** Convert Buffer to base64 string */
export function bufferToBase64(buffer: Buffer): string {
  return buffer.toString('base64');
}
