import fs from 'fs';
import { encode } from 'fast-png';
import type { ImageHeader } from '../chr/assembler';

type IndexedDepth = 1 | 2 | 4 | 8;

function toIndexedDepth(depth: number): IndexedDepth {
  switch (depth) {
    case 1: return 1;
    case 2: return 2;
    case 4: return 4;
    case 8: return 8;
    default: throw new RangeError(`unsupported indexed bit depth: ${depth}`);
  }
}

// Pack palette-index scanlines into PNG row bytes, leftmost pixel in the high bits.
export function packIndices(header: ImageHeader, rows: Iterable<ArrayLike<number>>): Uint8Array {
  const { width, height, palette } = header;
  const depth = toIndexedDepth(header.bitDepth);
  const perByte = 8 / depth;
  const bytesPerRow = Math.ceil(width / perByte);
  const maxIndex = Math.min(palette.length, 1 << depth) - 1;
  const out = new Uint8Array(bytesPerRow * height);
  let y = 0;
  for (const row of rows) {
    if (y >= height) throw new RangeError(`too many scanlines: expected ${height}`);
    if (row.length !== width) throw new RangeError(`scanline ${y} has ${row.length} pixels, expected ${width}`);
    const rowBase = y * bytesPerRow;
    for (let x = 0; x < width; x++) {
      const idx = row[x];
      if (!Number.isInteger(idx) || idx < 0 || idx > maxIndex) {
        throw new RangeError(`palette index ${idx} out of range at (${x},${y})`);
      }
      const shift = 8 - depth * ((x % perByte) + 1);
      out[rowBase + Math.floor(x / perByte)] |= idx << shift;
    }
    y++;
  }
  if (y !== height) throw new RangeError(`too few scanlines: got ${y}, expected ${height}`);
  return out;
}

// Indexed-color PNG (color type 3) with one PLTE entry per palette color.
export function encodePng(header: ImageHeader, rows: Iterable<ArrayLike<number>>): Uint8Array {
  return encode(
    {
      width: header.width,
      height: header.height,
      depth: toIndexedDepth(header.bitDepth),
      channels: 1,
      data: packIndices(header, rows),
      palette: header.palette.map((c) => [c.r, c.g, c.b]),
    },
    { zlib: { level: 9 } }
  );
}

// Write to a new file; fails with EEXIST rather than replacing an existing one.
export async function writePng(outPath: string, header: ImageHeader, rows: Iterable<ArrayLike<number>>): Promise<void> {
  const bytes = encodePng(header, rows);
  await fs.promises.writeFile(outPath, bytes, { flag: 'wx' });
}
