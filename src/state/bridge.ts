import type { StateSerializer } from '../emulator/types';
import type { HostLog } from '../utils/log';
import { BoundedMemoryStream } from './stream';

export const STATE_MAX_SIZE = 2 * 1024 * 1024; // base state plus 32X SDRAM/DRAM

export type StateFailure =
  | { ok: false; reason: 'no-session' }
  | { ok: false; reason: 'empty-state' }
  | { ok: false; reason: 'capacity-exceeded'; capacity: number }
  | { ok: false; reason: 'serializer'; status: number };

export type StateResult = { ok: true; size: number } | StateFailure;

/**
 * Runs the core's serializer against a single, lazily allocated state buffer.
 *
 * The host reads `blob()` after a successful save, or writes the incoming blob into
 * `prepareLoad(size)` and then calls `load()`. Every failure leaves nothing published:
 * a save that fails resets the logical size to 0, and precondition failures touch
 * nothing at all.
 */
export class StateBridge {
  private buf: Uint8Array | null = null;
  private _size = 0;

  constructor(
    private readonly serializer: StateSerializer,
    private readonly isActive: () => boolean,
    readonly capacity: number = STATE_MAX_SIZE,
    private readonly log?: HostLog,
  ) {}

  get size(): number {
    return this._size;
  }

  buffer(): Uint8Array | null {
    return this.buf;
  }

  blob(): Uint8Array | null {
    return this.buf && this._size > 0 ? this.buf.subarray(0, this._size) : null;
  }

  exists(): boolean {
    return this.buf !== null && this._size > 0;
  }

  private ensureBuffer(): Uint8Array {
    if (!this.buf) this.buf = new Uint8Array(this.capacity);
    return this.buf;
  }

  save(): StateResult {
    if (!this.isActive()) return { ok: false, reason: 'no-session' };

    const stream = new BoundedMemoryStream(this.ensureBuffer(), this.capacity);
    const status = this.serializer.serializeState(stream, 'save');
    if (status !== 0) {
      this._size = 0;
      this.log?.warn(`save failed: serializer status ${status}`);
      return { ok: false, reason: 'serializer', status };
    }
    // The stream clips silently; a clipped save is a short blob, not a success
    if (stream.overflowed) {
      this._size = 0;
      this.log?.warn(`save failed: state exceeds ${this.capacity} bytes`);
      return { ok: false, reason: 'capacity-exceeded', capacity: this.capacity };
    }
    this._size = stream.cursor;
    this.log?.debug(`saved ${this._size} bytes`);
    return { ok: true, size: this._size };
  }

  // Allocate (or reuse) the buffer and declare the size of the blob about to be written.
  // The declared size is kept as given; load() rejects one the buffer cannot hold.
  prepareLoad(size: number): Uint8Array {
    const buf = this.ensureBuffer();
    this._size = Number.isFinite(size) ? Math.max(0, Math.floor(size)) : 0;
    return buf;
  }

  load(size: number = this._size): StateResult {
    if (!this.isActive()) return { ok: false, reason: 'no-session' };
    const n = Number.isFinite(size) ? Math.floor(size) : 0;
    if (!this.buf || n <= 0) return { ok: false, reason: 'empty-state' };
    if (n > this.capacity) return { ok: false, reason: 'capacity-exceeded', capacity: this.capacity };

    const stream = new BoundedMemoryStream(this.buf, n);
    const status = this.serializer.serializeState(stream, 'load');
    if (status !== 0) {
      this.log?.warn(`load failed: serializer status ${status}`);
      return { ok: false, reason: 'serializer', status };
    }
    this._size = n;
    this.log?.debug(`loaded ${n} bytes`);
    return { ok: true, size: n };
  }
}
