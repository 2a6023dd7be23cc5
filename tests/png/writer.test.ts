import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { decode } from 'fast-png';
import { PNG } from 'pngjs';
import type { ImageHeader } from '../../src/chr/assembler';
import { buildPalette } from '../../src/chr/palette';
import { encodePng, packIndices, writePng } from '../../src/png/writer';
import { pngHeader, pngPalette, unpack2bpp, useTmpDirs } from '../helpers/test_utils';

function mkHeader(height = 8): ImageHeader {
  const palette = buildPalette(['000000', 'ff0000', 'ff8000', 'ffffff']);
  if (!palette.ok) throw new Error(palette.error.message);
  return { width: 128, height, bitDepth: 2, palette: palette.value };
}

function mkRows(height: number, set?: (rows: number[][]) => void): number[][] {
  const rows = Array.from({ length: height }, () => new Array<number>(128).fill(0));
  set?.(rows);
  return rows;
}

function rgbaAt(png: PNG, x: number, y: number): number[] {
  const o = (y * png.width + x) * 4;
  return [png.data[o], png.data[o + 1], png.data[o + 2], png.data[o + 3]];
}

describe('packIndices', () => {
  it('packs four 2-bit indices per byte, leftmost pixel in the high bits', () => {
    const rows = mkRows(8, (r) => {
      r[0][0] = 1;
      r[0][1] = 2;
      r[0][2] = 3;
      r[1][127] = 3;
    });
    const packed = packIndices(mkHeader(), rows);
    expect(packed.length).toBe(32 * 8);
    expect(packed[0]).toBe(0b01101100);
    expect(packed[1]).toBe(0);
    expect(packed[32 + 31]).toBe(0b00000011);
  });
});

describe('encodePng', () => {
  it('writes a 2-bit indexed-color image with the palette in PLTE', () => {
    const bytes = encodePng(mkHeader(), mkRows(8));
    expect(pngHeader(bytes)).toEqual({ width: 128, height: 8, bitDepth: 2, colorType: 3 });
    expect(pngPalette(bytes)).toEqual([[0, 0, 0], [255, 0, 0], [255, 128, 0], [255, 255, 255]]);
  });

  it('keeps palette indices intact', () => {
    const rows = mkRows(8, (r) => {
      r[0][0] = 1;
      r[0][1] = 2;
      r[7][127] = 3;
      r[3][64] = 2;
    });
    const decoded = decode(encodePng(mkHeader(), rows));
    expect(decoded.depth).toBe(2);
    expect(unpack2bpp(decoded.data, 128, 8)).toEqual(rows);
  });

  it('resolves to the palette colors when viewed as RGBA', () => {
    const rows = mkRows(8, (r) => {
      r[0][0] = 1;
      r[0][1] = 2;
      r[7][127] = 3;
    });
    const png = PNG.sync.read(Buffer.from(encodePng(mkHeader(), rows)));
    expect(rgbaAt(png, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(rgbaAt(png, 1, 0)).toEqual([255, 128, 0, 255]);
    expect(rgbaAt(png, 2, 0)).toEqual([0, 0, 0, 255]);
    expect(rgbaAt(png, 127, 7)).toEqual([255, 255, 255, 255]);
  });

  it('produces identical bytes for identical input', () => {
    const rows = mkRows(16, (r) => { r[3][9] = 2; });
    expect(encodePng(mkHeader(16), rows)).toEqual(encodePng(mkHeader(16), rows));
  });

  it('rejects rows that do not fit the header', () => {
    expect(() => encodePng(mkHeader(), mkRows(7))).toThrow('too few scanlines: got 7, expected 8');
    expect(() => encodePng(mkHeader(), mkRows(9))).toThrow('too many scanlines: expected 8');
    const short = mkRows(8);
    short[2] = new Array<number>(120).fill(0);
    expect(() => encodePng(mkHeader(), short)).toThrow('scanline 2 has 120 pixels, expected 128');
    expect(() => encodePng(mkHeader(), mkRows(8, (r) => { r[1][5] = 4; }))).toThrow('palette index 4 out of range at (5,1)');
  });

  it('rejects a bit depth with no indexed PNG form', () => {
    expect(() => encodePng({ ...mkHeader(), bitDepth: 3 }, mkRows(8))).toThrow('unsupported indexed bit depth: 3');
  });
});

describe('writePng', () => {
  const tmpDir = useTmpDirs();

  it('writes a readable indexed PNG file', async () => {
    const out = path.join(tmpDir(), 'out.png');
    await writePng(out, mkHeader(), mkRows(8, (r) => { r[4][64] = 1; }));
    const bytes = new Uint8Array(fs.readFileSync(out));
    expect(pngHeader(bytes).colorType).toBe(3);
    expect(unpack2bpp(decode(bytes).data, 128, 8)[4][64]).toBe(1);
  });

  it('does not replace an existing file', async () => {
    const out = path.join(tmpDir(), 'out.png');
    fs.writeFileSync(out, 'keep');
    await expect(writePng(out, mkHeader(), mkRows(8))).rejects.toThrow(/EEXIST/);
    expect(fs.readFileSync(out, 'utf8')).toBe('keep');
  });
});
