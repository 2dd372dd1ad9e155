/**
 * 1-bit BMP writer for thermal print images.
 *
 * Layout: BITMAPFILEHEADER (14) + BITMAPINFOHEADER (40) + 2-entry palette (8),
 * then bottom-up rows, MSB = leftmost pixel, each row padded to 4 bytes.
 * Palette index 0 is black (ink), 1 is white (paper).
 */

export interface GreyscaleRaster {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  /** Row-major samples; only the first channel of each pixel is read */
  readonly data: Uint8Array;
}

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const PALETTE_SIZE = 8;
const PIXEL_OFFSET = FILE_HEADER_SIZE + INFO_HEADER_SIZE + PALETTE_SIZE;
const PIXELS_PER_METRE = 2835; // 72 DPI

/** Samples at or above this level print as paper */
export const WHITE_THRESHOLD = 128;

/** Bytes per stored row: 1 bit per pixel rounded up to a 32-bit boundary */
export function monochromeRowSize(width: number): number {
  return Math.ceil(width / 32) * 4;
}

export function encodeMonochromeBmp(raster: GreyscaleRaster): Buffer {
  const { width, height, channels, data } = raster;
  if (width <= 0 || height <= 0) {
    throw new RangeError(`Bitmap dimensions must be positive, got ${width}x${height}`);
  }
  if (data.length < width * height * channels) {
    throw new RangeError(`Raster data too short for ${width}x${height}x${channels}`);
  }

  const rowSize = monochromeRowSize(width);
  const imageSize = rowSize * height;
  const buffer = Buffer.alloc(PIXEL_OFFSET + imageSize);

  // BITMAPFILEHEADER
  buffer.write('BM', 0, 'ascii');
  buffer.writeUInt32LE(buffer.length, 2);
  buffer.writeUInt32LE(PIXEL_OFFSET, 10);

  // BITMAPINFOHEADER
  buffer.writeUInt32LE(INFO_HEADER_SIZE, 14);
  buffer.writeInt32LE(width, 18);
  buffer.writeInt32LE(height, 22); // positive: bottom-up
  buffer.writeUInt16LE(1, 26); // planes
  buffer.writeUInt16LE(1, 28); // bits per pixel
  buffer.writeUInt32LE(0, 30); // BI_RGB
  buffer.writeUInt32LE(imageSize, 34);
  buffer.writeInt32LE(PIXELS_PER_METRE, 38);
  buffer.writeInt32LE(PIXELS_PER_METRE, 42);
  buffer.writeUInt32LE(2, 46); // colours used
  buffer.writeUInt32LE(2, 50); // important colours

  // Palette (B, G, R, reserved)
  buffer.writeUInt32LE(0x00000000, 54);
  buffer.writeUInt32LE(0x00ffffff, 58);

  for (let y = 0; y < height; y++) {
    const rowStart = PIXEL_OFFSET + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x++) {
      const sample = data[(y * width + x) * channels];
      if (sample >= WHITE_THRESHOLD) {
        buffer[rowStart + (x >> 3)] |= 0x80 >> (x & 7);
      }
    }
  }

  return buffer;
}

/** Read width and height back from a BMP header */
export function readBmpSize(bmp: Buffer): { width: number; height: number } {
  if (bmp.length < PIXEL_OFFSET || bmp.toString('ascii', 0, 2) !== 'BM') {
    throw new RangeError('Not a BMP image');
  }
  return { width: bmp.readInt32LE(18), height: Math.abs(bmp.readInt32LE(22)) };
}
