/**
 * Image dimensions from PNG / JPEG headers.
 *
 * Reads only the header bytes; no decoding. Returns null for anything
 * that is not a well-formed PNG or baseline/progressive JPEG.
 */

export type ImageType = 'png' | 'jpg';

export interface ImageSize {
  width: number;
  height: number;
}

export interface ImageInfo extends ImageSize {
  type: ImageType;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function readImageSize(data: Buffer): ImageInfo | null {
  if (isPng(data)) return readPngSize(data);
  if (data.length > 3 && data[0] === 0xff && data[1] === 0xd8) return readJpegSize(data);
  return null;
}

/**
 * Scale `size` down (never up) to fit inside the box, keeping aspect ratio.
 */
export function fitWithin(size: ImageSize, maxWidth: number, maxHeight: number): ImageSize {
  const scale = Math.min(1, maxWidth / size.width, maxHeight / size.height);
  return {
    width: Math.round(size.width * scale),
    height: Math.round(size.height * scale),
  };
}

function isPng(data: Buffer): boolean {
  return data.length >= 24 && PNG_SIGNATURE.every((byte, i) => data[i] === byte);
}

function readPngSize(data: Buffer): ImageInfo | null {
  // IHDR is always the first chunk: length(4) type(4) width(4) height(4)
  if (data.toString('ascii', 12, 16) !== 'IHDR') return null;
  const width = data.readUInt32BE(16);
  const height = data.readUInt32BE(20);
  return width > 0 && height > 0 ? { type: 'png', width, height } : null;
}

function readJpegSize(data: Buffer): ImageInfo | null {
  let offset = 2;

  while (offset + 4 <= data.length) {
    if (data[offset] !== 0xff) return null;
    const marker = data[offset + 1];

    // Fill bytes
    if (marker === 0xff) {
      offset++;
      continue;
    }
    // Standalone markers carry no length
    if (marker === 0xd8 || (marker >= 0xd0 && marker <= 0xd7) || marker === 0x01) {
      offset += 2;
      continue;
    }

    const length = data.readUInt16BE(offset + 2);
    if (isStartOfFrame(marker)) {
      if (offset + 9 > data.length) return null;
      const height = data.readUInt16BE(offset + 5);
      const width = data.readUInt16BE(offset + 7);
      return width > 0 && height > 0 ? { type: 'jpg', width, height } : null;
    }
    offset += 2 + length;
  }

  return null;
}

/** SOF0-SOF15, excluding DHT (c4), JPG (c8) and DAC (cc) */
function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}
