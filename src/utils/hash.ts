const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// FNV-1a 32-bit hash for byte buffers (deterministic, simple)
export function fnv1a32(bytes: ArrayLike<number>): number {
  let hash = FNV_OFFSET >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i] & 0xff;
    hash = Math.imul(hash >>> 0, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

// Same hash over 16-bit samples, fed little-endian (low byte first).
export function fnv1a32Words(words: ArrayLike<number>): number {
  let hash = FNV_OFFSET >>> 0;
  for (let i = 0; i < words.length; i++) {
    hash ^= words[i] & 0xff;
    hash = Math.imul(hash >>> 0, FNV_PRIME) >>> 0;
    hash ^= (words[i] >>> 8) & 0xff;
    hash = Math.imul(hash >>> 0, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

export function toHex32(h: number): string {
  return ('00000000' + (h >>> 0).toString(16)).slice(-8);
}

export function fnv1aHex(bytes: ArrayLike<number>): string {
  return toHex32(fnv1a32(bytes));
}

export function frameHash(frame: Uint16Array): string {
  return toHex32(fnv1a32Words(frame));
}
