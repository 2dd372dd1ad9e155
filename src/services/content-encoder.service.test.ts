import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { FakePrinterService } from '../testing/fake-printer-service';
import { readBmpSize } from '../utils/bmp';
import { InvalidContentError, InvalidImageError } from '../utils/errors';
import {
  ContentEncoder,
  decodeText,
  encodeImage,
  encodeText,
  readImageFile,
  splitText,
  toPrintContent,
  unencodableCharacters,
} from './content-encoder.service';

function solidPng(width: number, height: number, shade: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: shade, g: shade, b: shade } } })
    .png()
    .toBuffer();
}

function bmpOf(data: string): Buffer {
  return Buffer.from(data, 'base64');
}

describe('encodeText', () => {
  it('base64-encodes GBK bytes', () => {
    expect(encodeText('Hello')).toEqual({ contentKind: 'TEXT', data: 'SGVsbG8=' });
    expect(encodeText('你好')).toEqual({ contentKind: 'TEXT', data: 'xOO6ww==' });
  });

  it('decodes back to the same text', () => {
    const text = '打印测试\nLine 2: 温度 23℃';
    expect(decodeText(encodeText(text).data)).toBe(text);
  });

  it('rejects empty text', () => {
    expect(() => encodeText('')).toThrow(InvalidContentError);
  });

  it('rejects characters outside GBK instead of replacing them', () => {
    expect(() => encodeText('Hi 😀 ü é ñ')).toThrow('Text contains characters the printer cannot encode: 😀 ñ');
  });

  it('keeps literal question marks', () => {
    expect(decodeText(encodeText('Why? 为什么？').data)).toBe('Why? 为什么？');
  });
});

describe('unencodableCharacters', () => {
  it('lists each offending character once', () => {
    expect(unencodableCharacters('ñ a ñ 😀')).toEqual(['ñ', '😀']);
    expect(unencodableCharacters('温度 23℃')).toEqual([]);
  });
});

describe('splitText', () => {
  it('breaks after a newline in the second half of the window', () => {
    expect(splitText('aaaa\nbbbb\ncc', 6)).toEqual(['aaaa\n', 'bbbb\n', 'cc']);
  });

  it('cuts hard when there is no usable newline', () => {
    expect(splitText('abcdefgh', 3)).toEqual(['abc', 'def', 'gh']);
    expect(splitText('a\nbcdefg', 4)).toEqual(['a\nbc', 'defg']);
  });

  it('counts code points, not UTF-16 units', () => {
    expect(splitText('😀😀😀', 2)).toEqual(['😀😀', '😀']);
  });

  it('returns short text unchanged', () => {
    expect(splitText('Hello', 1000)).toEqual(['Hello']);
  });

  it('rejects a non-positive limit', () => {
    expect(() => splitText('abc', 0)).toThrow(RangeError);
  });
});

describe('encodeImage', () => {
  it('scales wide images down to the maximum width', async () => {
    const payload = await encodeImage(await solidPng(3000, 1500, 255), 576);

    expect(payload.contentKind).toBe('IMG');
    expect(readBmpSize(bmpOf(payload.data))).toEqual({ width: 576, height: 288 });
  });

  it('never upscales narrow images', async () => {
    const payload = await encodeImage(await solidPng(100, 50, 255), 576);
    expect(readBmpSize(bmpOf(payload.data))).toEqual({ width: 100, height: 50 });
  });

  it('thresholds pixels to black and white', async () => {
    const white = bmpOf((await encodeImage(await solidPng(8, 1, 255), 384)).data);
    const black = bmpOf((await encodeImage(await solidPng(8, 1, 0), 384)).data);

    expect(white[62]).toBe(0xff);
    expect(black[62]).toBe(0x00);
  });

  it('is deterministic', async () => {
    const png = await solidPng(64, 32, 90);
    expect(await encodeImage(png, 384)).toEqual(await encodeImage(png, 384));
  });

  it('rejects empty and undecodable data', async () => {
    await expect(encodeImage(Buffer.alloc(0), 384)).rejects.toThrow('Image data is empty');
    await expect(encodeImage(Buffer.from('not an image'), 384)).rejects.toBeInstanceOf(InvalidImageError);
  });
});

describe('readImageFile', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'print-bridge-'));
  });

  afterAll(() => fs.promises.rm(dir, { recursive: true, force: true }));

  it('reads a file', async () => {
    const file = path.join(dir, 'small.bin');
    await fs.promises.writeFile(file, Buffer.from([1, 2, 3]));

    expect(await readImageFile(file, 1024)).toEqual(Buffer.from([1, 2, 3]));
  });

  it('rejects missing paths and directories', async () => {
    await expect(readImageFile(path.join(dir, 'missing.png'), 1024)).rejects.toThrow(
      `Cannot read image file ${path.join(dir, 'missing.png')}`
    );
    await expect(readImageFile(dir, 1024)).rejects.toThrow(`Not a file: ${dir}`);
  });

  it('rejects files larger than the limit', async () => {
    const file = path.join(dir, 'large.bin');
    await fs.promises.writeFile(file, Buffer.alloc(32));

    await expect(readImageFile(file, 16)).rejects.toBeInstanceOf(InvalidImageError);
  });
});

describe('toPrintContent', () => {
  it('prefixes the payload with its wire kind', () => {
    expect(toPrintContent({ contentKind: 'TEXT', data: 'SGVsbG8=' })).toBe('T:SGVsbG8=');
    expect(toPrintContent({ contentKind: 'IMG', data: 'Qk0=' })).toBe('P:Qk0=');
  });

  it('refuses URL payloads', () => {
    expect(() => toPrintContent({ contentKind: 'URL', data: 'https://example.com' })).toThrow(InvalidContentError);
  });
});

describe('ContentEncoder', () => {
  const imageUrl = 'https://images.test/receipt.png';

  function setup(maxImageBytes = 1024 * 1024) {
    const fake = new FakePrinterService();
    const encoder = new ContentEncoder(fake, { maxImageWidth: 384, maxImageBytes });
    return { fake, encoder };
  }

  it('encodes text content', async () => {
    const { encoder } = setup();
    expect(await encoder.encode({ kind: 'text', body: 'Hello' })).toEqual({ contentKind: 'TEXT', data: 'SGVsbG8=' });
  });

  it('fetches, scales and releases remote images', async () => {
    const { fake, encoder } = setup();
    const png = await solidPng(1000, 250, 255);
    fake.images.set(imageUrl, { contentType: 'image/png', chunks: [png.subarray(0, 50), png.subarray(50)] });

    const payload = await encoder.encode({ kind: 'imageUrl', address: imageUrl });

    expect(readBmpSize(bmpOf(payload.data))).toEqual({ width: 384, height: 96 });
    expect(fake.streamsOpened).toBe(1);
    expect(fake.streamsClosed).toBe(1);
  });

  it('rejects a response that is not an image and still releases it', async () => {
    const { fake, encoder } = setup();
    fake.images.set(imageUrl, { contentType: 'text/html; charset=utf-8', chunks: [Buffer.from('<html>')] });

    await expect(encoder.encode({ kind: 'imageUrl', address: imageUrl })).rejects.toThrow(
      'Expected an image from images.test, got text/html; charset=utf-8'
    );
    expect(fake.streamsClosed).toBe(1);
  });

  it('stops reading images larger than the limit', async () => {
    const { fake, encoder } = setup(16);
    fake.images.set(imageUrl, { contentType: 'image/png', chunks: [Buffer.alloc(10), Buffer.alloc(10)] });

    await expect(encoder.encode({ kind: 'imageUrl', address: imageUrl })).rejects.toThrow(
      'Image at images.test exceeds 16 bytes'
    );
    expect(fake.streamsClosed).toBe(1);
  });

  it('encodes local image files', async () => {
    const { encoder } = setup();
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'print-bridge-'));
    const file = path.join(dir, 'logo.png');
    await fs.promises.writeFile(file, await solidPng(100, 50, 255));

    try {
      const payload = await encoder.encode({ kind: 'imageFile', path: file });
      expect(readBmpSize(bmpOf(payload.data))).toEqual({ width: 100, height: 50 });
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it('joins parts with a separator and ends inner text parts with a newline', async () => {
    const { encoder } = setup();

    const printcontent = await encoder.encodeParts([
      { kind: 'text', body: 'Hello' },
      { kind: 'image', bytes: await solidPng(16, 8, 0) },
      { kind: 'text', body: 'Bye' },
    ]);

    const parts = printcontent.split('|');
    expect(parts).toHaveLength(3);
    expect(parts[0]).toBe('T:SGVsbG8K');
    expect(readBmpSize(bmpOf(parts[1].slice(2)))).toEqual({ width: 16, height: 8 });
    expect(parts[1].startsWith('P:')).toBe(true);
    expect(parts[2]).toBe('T:Qnll');
  });

  it('does not add a second newline to text parts', async () => {
    const { encoder } = setup();

    expect(
      await encoder.encodeParts([
        { kind: 'text', body: 'a\n' },
        { kind: 'text', body: 'b' },
      ])
    ).toBe('T:YQo=|T:Yg==');
  });

  it('rejects an empty list of parts', async () => {
    const { encoder } = setup();
    await expect(encoder.encodeParts([])).rejects.toBeInstanceOf(InvalidContentError);
  });

  it('forwards page URLs without fetching them', async () => {
    const { fake, encoder } = setup();

    expect(await encoder.encode({ kind: 'url', address: 'https://example.com/page' })).toEqual({
      contentKind: 'URL',
      data: 'https://example.com/page',
    });
    expect(fake.streamsOpened).toBe(0);
  });

  it('rejects non-web addresses', async () => {
    const { encoder } = setup();
    await expect(encoder.encode({ kind: 'url', address: 'ftp://example.com/a' })).rejects.toBeInstanceOf(
      InvalidContentError
    );
    await expect(encoder.encode({ kind: 'imageUrl', address: 'not a url' })).rejects.toThrow('Invalid URL: not a url');
  });
});
