import type { StateStream } from './stream';

// Blob layout: 8-byte magic, then records of id:u8 length:u32le payload.
export const STATE_MAGIC = new Uint8Array([0x4d, 0x44, 0x53, 0x54, 0x41, 0x54, 0x45, 0x01]); // "MDSTATE\x01"
const HEADER_BYTES = 5;

export const STATE_OK = 0;
export const STATE_BAD_MAGIC = -1;
export const STATE_TRUNCATED = -2;

export enum ChunkId {
  Cpu = 1,
  WorkRam = 2,
  Vram = 3,
  Cram = 4,
  Misc = 5,
  AddOn = 6,
}

export interface StateChunk {
  id: number;
  parts: Uint8Array[];
}

export interface ChunkReadResult {
  status: number;
  chunks: Map<number, Uint8Array>;
}

function chunkHeader(id: number, length: number): Uint8Array {
  const out = new Uint8Array(HEADER_BYTES);
  const view = new DataView(out.buffer);
  view.setUint8(0, id & 0xff);
  view.setUint32(1, length >>> 0, true);
  return out;
}

// Short writes are not reported here; the stream owner checks for overflow.
export function writeStateChunks(stream: StateStream, chunks: Iterable<StateChunk>): void {
  stream.write(STATE_MAGIC);
  for (const chunk of chunks) {
    const start = stream.seek(0, 'cur');
    stream.write(chunkHeader(chunk.id, 0));
    let length = 0;
    for (const part of chunk.parts) length += stream.write(part);
    // Patch the length now that the payload is down
    const end = stream.seek(0, 'cur');
    stream.seek(start, 'set');
    stream.write(chunkHeader(chunk.id, length));
    stream.seek(end, 'set');
  }
}

export function readStateChunks(stream: StateStream, known: ReadonlySet<number>): ChunkReadResult {
  const chunks = new Map<number, Uint8Array>();
  const magic = stream.read(STATE_MAGIC.length);
  if (magic.length !== STATE_MAGIC.length || magic.some((b, i) => b !== STATE_MAGIC[i])) {
    return { status: STATE_BAD_MAGIC, chunks };
  }
  while (!stream.eof()) {
    const header = stream.read(HEADER_BYTES);
    if (header.length < HEADER_BYTES) return { status: STATE_TRUNCATED, chunks };
    const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
    const id = view.getUint8(0);
    const length = view.getUint32(1, true);
    if (known.has(id)) {
      const data = stream.read(length);
      if (data.length < length) return { status: STATE_TRUNCATED, chunks };
      chunks.set(id, data);
    } else if (stream.skip(length) < length) {
      return { status: STATE_TRUNCATED, chunks };
    }
  }
  return { status: STATE_OK, chunks };
}
