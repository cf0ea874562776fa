import { describe, it, expect } from 'vitest';
import {
  STATE_BAD_MAGIC,
  STATE_MAGIC,
  STATE_OK,
  STATE_TRUNCATED,
  readStateChunks,
  writeStateChunks,
} from '../../src/state/chunks';
import { BoundedMemoryStream } from '../../src/state/stream';

describe('state chunk layout', () => {
  it('writes magic, then id and little-endian payload length ahead of each payload', () => {
    const backing = new Uint8Array(64);
    const s = new BoundedMemoryStream(backing);
    writeStateChunks(s, [{ id: 1, parts: [new Uint8Array([1, 2]), new Uint8Array([3])] }]);
    expect(s.cursor).toBe(16);
    expect(Array.from(backing.subarray(0, 8))).toEqual(Array.from(STATE_MAGIC));
    expect(Array.from(backing.subarray(8, 16))).toEqual([1, 3, 0, 0, 0, 1, 2, 3]);
  });

  it('reads known chunks and skips unknown ones', () => {
    const backing = new Uint8Array(64);
    const w = new BoundedMemoryStream(backing);
    writeStateChunks(w, [
      { id: 9, parts: [new Uint8Array([7, 7, 7, 7])] },
      { id: 1, parts: [new Uint8Array([4, 5])] },
    ]);
    const r = new BoundedMemoryStream(backing, w.cursor);
    const { status, chunks } = readStateChunks(r, new Set([1]));
    expect(status).toBe(STATE_OK);
    expect(chunks.has(9)).toBe(false);
    expect(Array.from(chunks.get(1) ?? [])).toEqual([4, 5]);
  });

  it('rejects a blob without the magic', () => {
    const r = new BoundedMemoryStream(new Uint8Array(32));
    expect(readStateChunks(r, new Set([1])).status).toBe(STATE_BAD_MAGIC);
  });

  it('reports a payload cut short by the end of the blob', () => {
    const backing = new Uint8Array(64);
    const w = new BoundedMemoryStream(backing);
    writeStateChunks(w, [{ id: 2, parts: [new Uint8Array([1, 2, 3, 4])] }]);
    const r = new BoundedMemoryStream(backing, w.cursor - 1);
    expect(readStateChunks(r, new Set([2])).status).toBe(STATE_TRUNCATED);
    const skipped = new BoundedMemoryStream(backing, w.cursor - 1);
    expect(readStateChunks(skipped, new Set<number>()).status).toBe(STATE_TRUNCATED);
  });

  it('leaves the overflow to the stream owner when the capacity runs out', () => {
    const s = new BoundedMemoryStream(new Uint8Array(12));
    writeStateChunks(s, [{ id: 1, parts: [new Uint8Array(8)] }]);
    expect(s.overflowed).toBe(true);
    expect(s.cursor).toBeLessThanOrEqual(12);
  });
});
