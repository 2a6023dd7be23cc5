import { BYTES_PER_CHAR, CHARS_PER_ROW, CHAR_HEIGHT, CHAR_WIDTH } from './constants';

export type PixelValue = 0 | 1 | 2 | 3;

function toPixelValue(v: number): PixelValue {
  switch (v & 0b11) {
    case 0: return 0;
    case 1: return 1;
    case 2: return 2;
    default: return 3;
  }
}

// Combine one row of the low and high bitplanes into 8 pixels, leftmost first.
// Bits are consumed LSB first (rightmost screen pixel), then the slice is reversed.
export function decodeSliceBytes(loByte: number, hiByte: number): PixelValue[] {
  let lo = loByte & 0xff;
  let hi = hiByte & 0xff;
  const pixels: PixelValue[] = [];
  for (let x = 0; x < CHAR_WIDTH; x++) {
    pixels.push(toPixelValue((lo & 1) | ((hi & 1) << 1)));
    lo >>= 1;
    hi >>= 1;
  }
  return pixels.reverse();
}

// Decode pixel row `pixelY` of tile column `charX` within a 256-byte strip chunk.
export function decodeCharacterSlice(chunk: Uint8Array, pixelY: number, charX: number): PixelValue[] {
  if (!Number.isInteger(pixelY) || pixelY < 0 || pixelY >= CHAR_HEIGHT) {
    throw new RangeError(`pixelY out of range: ${pixelY}`);
  }
  if (!Number.isInteger(charX) || charX < 0 || charX >= CHARS_PER_ROW) {
    throw new RangeError(`charX out of range: ${charX}`);
  }
  const base = charX * BYTES_PER_CHAR;
  const loByte = chunk[base + pixelY];
  const hiByte = chunk[base + 8 + pixelY];
  return decodeSliceBytes(loByte, hiByte);
}
