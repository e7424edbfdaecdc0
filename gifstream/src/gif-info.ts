/**
 * GIF inspection
 *
 * Walks the block structure of a GIF file far enough to report its size,
 * loop count and number of frames. Pixel data is skipped, not decoded.
 */

import { promises as fs } from 'fs';
import { GifExportError, GifExportErrorCode } from './errors.js';

export interface GifInfo {
  version: '87a' | '89a';
  width: number;
  height: number;
  /** NETSCAPE2.0 repeat count (0 = forever), null when the GIF plays once */
  loopCount: number | null;
  frameCount: number;
}

const EXTENSION = 0x21;
const IMAGE_DESCRIPTOR = 0x2c;
const TRAILER = 0x3b;
const APPLICATION_LABEL = 0xff;

const invalid = (message: string): GifExportError =>
  new GifExportError(message, GifExportErrorCode.INVALID_GIF);

class ByteCursor {
  constructor(
    private readonly bytes: Uint8Array,
    public offset = 0
  ) {}

  u8(): number {
    if (this.offset >= this.bytes.length) {
      throw invalid(`Unexpected end of GIF data at byte ${this.offset}`);
    }
    return this.bytes[this.offset++];
  }

  u16(): number {
    const lo = this.u8();
    return lo | (this.u8() << 8);
  }

  ascii(length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) {
      out += String.fromCharCode(this.u8());
    }
    return out;
  }

  skip(length: number): void {
    if (this.offset + length > this.bytes.length) {
      throw invalid(`Unexpected end of GIF data at byte ${this.offset}`);
    }
    this.offset += length;
  }

  /** Read data sub-blocks up to the zero terminator */
  subBlocks(): Uint8Array[] {
    const blocks: Uint8Array[] = [];
    for (let size = this.u8(); size !== 0; size = this.u8()) {
      const start = this.offset;
      this.skip(size);
      blocks.push(this.bytes.subarray(start, start + size));
    }
    return blocks;
  }
}

// 3 * 2^(n+1) bytes when the table flag is set
const colorTableSize = (packed: number): number => (packed & 0x80 ? 3 * (1 << ((packed & 0x07) + 1)) : 0);

export function readGifInfo(bytes: Uint8Array): GifInfo {
  const cursor = new ByteCursor(bytes);

  if (bytes.length < 13 || cursor.ascii(3) !== 'GIF') {
    throw invalid('Not a GIF: missing GIF8 signature');
  }
  const version = cursor.ascii(3);
  if (version !== '87a' && version !== '89a') {
    throw invalid(`Unsupported GIF version "${version}"`);
  }

  const width = cursor.u16();
  const height = cursor.u16();
  const packed = cursor.u8();
  cursor.skip(2); // background color index, pixel aspect ratio
  cursor.skip(colorTableSize(packed));

  let loopCount: number | null = null;
  let frameCount = 0;

  for (;;) {
    const introducer = cursor.u8();

    if (introducer === TRAILER) break;

    if (introducer === IMAGE_DESCRIPTOR) {
      cursor.skip(8); // left, top, width, height
      cursor.skip(colorTableSize(cursor.u8()));
      cursor.skip(1); // LZW minimum code size
      cursor.subBlocks();
      frameCount++;
      continue;
    }

    if (introducer === EXTENSION) {
      const label = cursor.u8();
      const blocks = cursor.subBlocks();
      if (label === APPLICATION_LABEL && blocks.length >= 2) {
        const identifier = String.fromCharCode(...blocks[0]);
        const data = blocks[1];
        if ((identifier === 'NETSCAPE2.0' || identifier === 'ANIMEXTS1.0') && data.length >= 3 && data[0] === 1) {
          loopCount = data[1] | (data[2] << 8);
        }
      }
      continue;
    }

    throw invalid(`Unknown GIF block 0x${introducer.toString(16)} at byte ${cursor.offset - 1}`);
  }

  return { version, width, height, loopCount, frameCount };
}

export async function readGifInfoFromFile(filename: string): Promise<GifInfo> {
  return readGifInfo(await fs.readFile(filename));
}
