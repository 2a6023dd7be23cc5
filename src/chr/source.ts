import fs from 'fs';

// Sequential, forward-only byte stream with a known total size.
export interface ByteSource {
  readonly size: number;
  readonly position: number;
  // Reads up to `length` bytes; a shorter result means the source is exhausted.
  read(length: number): Uint8Array;
}

export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get size(): number {
    return this.bytes.length;
  }

  get position(): number {
    return this.offset;
  }

  read(length: number): Uint8Array {
    const end = Math.min(this.bytes.length, this.offset + length);
    const out = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return out;
  }
}

// Reads a file through a descriptor so only the current chunk is held in memory.
export class FileSource implements ByteSource {
  readonly size: number;
  private offset = 0;
  private fd: number | null;

  constructor(path: string) {
    this.fd = fs.openSync(path, 'r');
    this.size = fs.fstatSync(this.fd).size;
  }

  get position(): number {
    return this.offset;
  }

  read(length: number): Uint8Array {
    if (this.fd === null) throw new Error('FileSource is closed');
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = fs.readSync(this.fd, out, filled, length - filled, this.offset + filled);
      if (n === 0) break;
      filled += n;
    }
    this.offset += filled;
    return filled === length ? out : out.subarray(0, filled);
  }

  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }
}
