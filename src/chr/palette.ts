import { fail, ok, type Result } from './errors';

export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

// Indexed by 2-bit pixel value.
export type Palette = readonly [Rgb, Rgb, Rgb, Rgb];

export type ColorCodes = readonly [string, string, string, string];

// Gray ramp: black, dark gray, light gray, white
export const DEFAULT_COLOR_CODES: ColorCodes = ['000000', '555555', 'aaaaaa', 'ffffff'];

// HTML-style color code without '#': exactly 6 hex digits.
export function parseColorCode(code: string): Result<Rgb> {
  if (!/^[0-9a-fA-F]{6}$/.test(code)) {
    return fail('InvalidColorCode', `invalid color code: "${code}" (expected 6 hexadecimal digits)`);
  }
  const v = parseInt(code, 16);
  return ok({ r: (v >> 16) & 0xff, g: (v >> 8) & 0xff, b: v & 0xff });
}

export function buildPalette(codes: ColorCodes): Result<Palette> {
  const c0 = parseColorCode(codes[0]);
  if (!c0.ok) return c0;
  const c1 = parseColorCode(codes[1]);
  if (!c1.ok) return c1;
  const c2 = parseColorCode(codes[2]);
  if (!c2.ok) return c2;
  const c3 = parseColorCode(codes[3]);
  if (!c3.ok) return c3;
  return ok(Object.freeze([c0.value, c1.value, c2.value, c3.value] as const));
}

export function formatRgb(c: Rgb): string {
  const hx = (v: number) => v.toString(16).padStart(2, '0');
  return `${hx(c.r)}${hx(c.g)}${hx(c.b)}`;
}
