// 15-bit RGB555: bits 10-14 = R, 5-9 = G, 0-4 = B
export function decodeRGB555(rgb15: number): { r: number; g: number; b: number; a: number } {
  const r = (rgb15 >> 10) & 0x1f;
  const g = (rgb15 >> 5) & 0x1f;
  const b = rgb15 & 0x1f;
  const scale = (v: number) => Math.floor((v * 255) / 31);
  return { r: scale(r), g: scale(g), b: scale(b), a: 255 };
}

export function encodeRGB555(r5: number, g5: number, b5: number): number {
  return ((r5 & 0x1f) << 10) | ((g5 & 0x1f) << 5) | (b5 & 0x1f);
}

// Expand a visible frame (pitch in pixels) into tightly packed RGBA for canvas/PNG output.
export function frameToRGBA(frame: Uint16Array, width: number, height: number, pitchPixels = width): Uint8ClampedArray {
  const w = Math.max(0, width | 0);
  const h = Math.max(0, height | 0);
  const out = new Uint8ClampedArray(w * h * 4);
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const src = y * pitchPixels + x;
      const c = src < frame.length ? frame[src] : 0;
      const o = (y * w + x) * 4;
      out[o] = Math.floor((((c >> 10) & 0x1f) * 255) / 31);
      out[o + 1] = Math.floor((((c >> 5) & 0x1f) * 255) / 31);
      out[o + 2] = Math.floor(((c & 0x1f) * 255) / 31);
      out[o + 3] = 255;
    }
  }
  return out;
}
