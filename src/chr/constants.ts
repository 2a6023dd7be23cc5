// NES CHR tile geometry
export const CHAR_WIDTH = 8; // pixels
export const CHAR_HEIGHT = 8; // pixels
export const BYTES_PER_CHAR = 16; // 8 bytes low plane + 8 bytes high plane
export const CHARS_PER_ROW = 16; // tiles per strip in the output image

export const BYTES_PER_STRIP = CHARS_PER_ROW * BYTES_PER_CHAR; // 256
export const IMAGE_WIDTH = CHARS_PER_ROW * CHAR_WIDTH; // 128
export const BIT_DEPTH = 2;
