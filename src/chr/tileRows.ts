import { BYTES_PER_STRIP } from './constants';
import { StreamTruncationError } from './errors';
import type { ByteSource } from './source';

// Yield one 256-byte strip of 16 tiles per pull, from the current position to the end of the source.
// The caller has already checked that the size is a positive multiple of BYTES_PER_STRIP.
export function* readTileStrips(source: ByteSource): Generator<Uint8Array, void, void> {
  while (source.position < source.size) {
    const offset = source.position;
    const chunk = source.read(BYTES_PER_STRIP);
    if (chunk.length !== BYTES_PER_STRIP) {
      throw new StreamTruncationError(offset, BYTES_PER_STRIP, chunk.length);
    }
    yield chunk;
  }
}
