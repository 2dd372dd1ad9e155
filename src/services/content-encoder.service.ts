import fs from 'fs';
import type { Stats } from 'fs';
import iconv from 'iconv-lite';
import sharp from 'sharp';
import type { ContentKind, EncodedPayload, PrintContent, PrintPart } from '../models/print-content.model';
import { bufferToBase64 } from '../utils/base64';
import { WHITE_THRESHOLD, encodeMonochromeBmp } from '../utils/bmp';
import { InvalidContentError, InvalidImageError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { withStream, type Transport } from './transport.service';

/**
 * Content encoder: turns a PrintContent into the printer service's wire form.
 *
 * Text is GBK-encoded (the service's text codec) then base64'd. Images are
 * decoded with sharp, narrowed to the paper width, thresholded to black/white
 * and written as a 1-bit BMP before base64. Page URLs are forwarded as-is.
 * Several text and image parts can be joined into one `printcontent` value.
 */

export interface ContentEncoderOptions {
  /** Printable width in dots; wider images are scaled down */
  readonly maxImageWidth: number;
  /** Upper bound for images fetched from a URL */
  readonly maxImageBytes: number;
  readonly timeoutMs?: number;
}

/** Wire prefixes of the `printcontent` field */
const WIRE_PREFIX: Readonly<Record<Exclude<ContentKind, 'URL'>, string>> = {
  TEXT: 'T',
  IMG: 'P',
};

const TEXT_CODEC = 'gbk';
const PART_SEPARATOR = '|';

// ── Text ──

/** Characters the text codec cannot represent, each listed once in order of appearance */
export function unencodableCharacters(text: string): string[] {
  if (iconv.decode(iconv.encode(text, TEXT_CODEC), TEXT_CODEC) === text) {
    return [];
  }
  const found = new Set<string>();
  for (const char of text) {
    if (iconv.decode(iconv.encode(char, TEXT_CODEC), TEXT_CODEC) !== char) {
      found.add(char);
    }
  }
  return [...found];
}

/** Reject text that is empty or would not print as written */
export function assertPrintableText(text: string): void {
  if (text.length === 0) {
    throw new InvalidContentError('Cannot print empty content');
  }
  const rejected = unencodableCharacters(text);
  if (rejected.length > 0) {
    throw new InvalidContentError(`Text contains characters the printer cannot encode: ${rejected.join(' ')}`);
  }
}

export function encodeText(text: string): EncodedPayload {
  assertPrintableText(text);
  return { contentKind: 'TEXT', data: bufferToBase64(iconv.encode(text, TEXT_CODEC)) };
}

/** Inverse of encodeText */
export function decodeText(data: string): string {
  return iconv.decode(Buffer.from(data, 'base64'), TEXT_CODEC);
}

/**
 * Split text into chunks of at most `limit` characters (code points), in order.
 * A chunk ends after the last newline in its window when that newline sits in the
 * window's second half; otherwise the window is cut hard.
 */
export function splitText(text: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Text chunk limit must be a positive integer, got ${limit}`);
  }

  const chars = Array.from(text);
  const chunks: string[] = [];
  let start = 0;

  while (start < chars.length) {
    let end = Math.min(start + limit, chars.length);
    if (end < chars.length) {
      const newline = chars.slice(start, end).lastIndexOf('\n');
      if (newline >= Math.floor(limit / 2)) {
        end = start + newline + 1;
      }
    }
    chunks.push(chars.slice(start, end).join(''));
    start = end;
  }

  return chunks;
}

// ── Images ──

export async function encodeImage(bytes: Buffer, maxImageWidth: number): Promise<EncodedPayload> {
  if (bytes.length === 0) {
    throw new InvalidImageError('Image data is empty');
  }

  let raster: { data: Buffer; info: sharp.OutputInfo };
  try {
    raster = await sharp(bytes)
      .resize({ width: maxImageWidth, withoutEnlargement: true })
      .flatten({ background: '#ffffff' })
      .greyscale()
      .threshold(WHITE_THRESHOLD)
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new InvalidImageError(`Cannot decode image: ${errorMessage(error)}`, { cause: error });
  }

  const { data, info } = raster;
  const bmp = encodeMonochromeBmp({
    width: info.width,
    height: info.height,
    channels: info.channels,
    data,
  });
  logger.debug({ width: info.width, height: info.height, bytes: bmp.length }, 'Image encoded as 1-bit BMP');

  return { contentKind: 'IMG', data: bufferToBase64(bmp) };
}

/** Read a local image file, refusing missing paths, directories and oversized files */
export async function readImageFile(path: string, maxImageBytes: number): Promise<Buffer> {
  let stats: Stats;
  try {
    stats = await fs.promises.stat(path);
  } catch (error) {
    throw new InvalidContentError(`Cannot read image file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  if (!stats.isFile()) {
    throw new InvalidContentError(`Not a file: ${path}`);
  }
  if (stats.size > maxImageBytes) {
    throw new InvalidImageError(`Image file ${path} exceeds ${maxImageBytes} bytes`);
  }

  try {
    return await fs.promises.readFile(path);
  } catch (error) {
    throw new InvalidContentError(`Cannot read image file ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

function parseWebAddress(address: string): URL {
  let url: URL;
  try {
    url = new URL(address);
  } catch (error) {
    throw new InvalidContentError(`Invalid URL: ${address}`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidContentError(`Only http and https URLs are supported, got ${url.protocol}`);
  }
  return url;
}

/** Format an encoded payload as the `printcontent` field of a print request */
export function toPrintContent(payload: EncodedPayload): string {
  if (payload.contentKind === 'URL') {
    throw new InvalidContentError('URL payloads are submitted as printUrl, not printcontent');
  }
  return `${WIRE_PREFIX[payload.contentKind]}:${payload.data}`;
}

export class ContentEncoder {
  constructor(
    private readonly transport: Transport,
    private readonly options: ContentEncoderOptions
  ) {}

  async encode(content: PrintContent): Promise<EncodedPayload> {
    switch (content.kind) {
      case 'text':
        return encodeText(content.body);
      case 'image':
        return encodeImage(content.bytes, this.options.maxImageWidth);
      case 'imageFile': {
        const bytes = await readImageFile(content.path, this.options.maxImageBytes);
        return encodeImage(bytes, this.options.maxImageWidth);
      }
      case 'imageUrl': {
        const bytes = await this.fetchImage(content.address);
        return encodeImage(bytes, this.options.maxImageWidth);
      }
      case 'url':
        parseWebAddress(content.address);
        return { contentKind: 'URL', data: content.address };
      default: {
        const unreachable: never = content;
        throw new InvalidContentError(`Unsupported content: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Encode text and image parts as one `printcontent` value, `T:`/`P:` parts
   * joined by `|`. Every text part but the last ends with a newline.
   */
  async encodeParts(parts: readonly PrintPart[]): Promise<string> {
    if (parts.length === 0) {
      throw new InvalidContentError('Cannot print an empty list of parts');
    }

    const encoded: string[] = [];
    for (const [index, part] of parts.entries()) {
      const last = index === parts.length - 1;
      const content: PrintPart =
        part.kind === 'text' && !last && !part.body.endsWith('\n') ? { kind: 'text', body: `${part.body}\n` } : part;
      encoded.push(toPrintContent(await this.encode(content)));
    }
    return encoded.join(PART_SEPARATOR);
  }

  /** Stream a remote image into memory, releasing the connection on every path */
  private async fetchImage(address: string): Promise<Buffer> {
    const url = parseWebAddress(address);
    const { maxImageBytes, timeoutMs } = this.options;

    return withStream(this.transport, url.href, { timeoutMs, headers: { Accept: 'image/*' } }, async (response) => {
      const contentType = response.headers['content-type'];
      if (contentType && !contentType.toLowerCase().startsWith('image/')) {
        throw new InvalidImageError(`Expected an image from ${url.host}, got ${contentType}`);
      }

      const chunks: Buffer[] = [];
      let size = 0;
      for await (const chunk of response.body) {
        size += chunk.length;
        if (size > maxImageBytes) {
          throw new InvalidImageError(`Image at ${url.host} exceeds ${maxImageBytes} bytes`);
        }
        chunks.push(chunk);
      }

      logger.debug({ host: url.host, bytes: size, contentType }, 'Fetched remote image');
      return Buffer.concat(chunks, size);
    });
  }
}
