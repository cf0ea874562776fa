export type SeekWhence = 'set' | 'cur' | 'end';

// Seekable byte channel a core serializer reads and writes through.
export interface StateStream {
  read(n: number): Uint8Array;
  write(bytes: Uint8Array): number;
  skip(n: number): number;
  eof(): boolean;
  seek(offset: number, whence: SeekWhence): number;
}

const toCount = (n: number): number => (Number.isFinite(n) && n > 0 ? Math.floor(n) : 0);

/**
 * StateStream over a fixed region of memory.
 *
 * `size` is the logical end of the stream: the full backing capacity while saving,
 * the number of bytes the host supplied while loading. The cursor never leaves
 * [0, size]; transfers that would cross `size` are truncated and `overflowed` latches.
 */
export class BoundedMemoryStream implements StateStream {
  readonly size: number;
  private pos = 0;
  private clipped = false;

  constructor(private readonly backing: Uint8Array, size: number = backing.length) {
    this.size = Math.min(toCount(size), backing.length);
  }

  get cursor(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.size - this.pos;
  }

  // True once a write or skip was cut short by the end of the stream.
  get overflowed(): boolean {
    return this.clipped;
  }

  read(n: number): Uint8Array {
    const count = Math.min(toCount(n), this.remaining);
    if (count <= 0) return new Uint8Array(0);
    const out = this.backing.slice(this.pos, this.pos + count);
    this.pos += count;
    return out;
  }

  write(bytes: Uint8Array): number {
    const count = Math.min(bytes.length, this.remaining);
    if (count < bytes.length) this.clipped = true;
    if (count <= 0) return 0;
    this.backing.set(bytes.subarray(0, count), this.pos);
    this.pos += count;
    return count;
  }

  skip(n: number): number {
    const want = toCount(n);
    const count = Math.min(want, this.remaining);
    if (count < want) this.clipped = true;
    this.pos += count;
    return count;
  }

  eof(): boolean {
    return this.pos >= this.size;
  }

  seek(offset: number, whence: SeekWhence): number {
    const delta = Number.isFinite(offset) ? Math.trunc(offset) : 0;
    const base = whence === 'set' ? 0 : whence === 'cur' ? this.pos : this.size;
    this.pos = Math.max(0, Math.min(this.size, base + delta));
    return this.pos;
  }
}
