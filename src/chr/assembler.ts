import { BIT_DEPTH, CHARS_PER_ROW, CHAR_HEIGHT, IMAGE_WIDTH } from './constants';
import { decodeCharacterSlice, type PixelValue } from './bitplane';
import type { Palette } from './palette';
import { BufferSource, type ByteSource } from './source';
import { readTileStrips } from './tileRows';
import { validateInputSize } from './validate';

export interface ImageHeader {
  width: number;
  height: number;
  bitDepth: number;
  palette: Palette;
}

export interface DecodedImage {
  header: ImageHeader;
  rows: PixelValue[][];
}

// Image dimensions for a source of `size` bytes; throws if the size was not validated first.
export function describeImage(size: number, palette: Palette): ImageHeader {
  const strips = validateInputSize(size);
  if (!strips.ok) throw new RangeError(strips.error.message);
  return { width: IMAGE_WIDTH, height: strips.value * CHAR_HEIGHT, bitDepth: BIT_DEPTH, palette };
}

// Yield full-width scanlines of palette indices, top to bottom.
// Each strip chunk produces CHAR_HEIGHT rows; each row is 16 tile slices of 8 pixels, left to right.
export function* generatePixelRows(source: ByteSource): Generator<PixelValue[], void, void> {
  for (const chunk of readTileStrips(source)) {
    for (let pixelY = 0; pixelY < CHAR_HEIGHT; pixelY++) {
      const pixels: PixelValue[] = [];
      for (let charX = 0; charX < CHARS_PER_ROW; charX++) {
        pixels.push(...decodeCharacterSlice(chunk, pixelY, charX));
      }
      yield pixels;
    }
  }
}

// Decode a whole in-memory CHR blob.
export function decodeChr(bytes: Uint8Array, palette: Palette): DecodedImage {
  const header = describeImage(bytes.length, palette);
  const rows = Array.from(generatePixelRows(new BufferSource(bytes)));
  return { header, rows };
}
