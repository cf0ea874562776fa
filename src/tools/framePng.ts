import { PNG } from 'pngjs';
import { frameToRGBA } from '../video/rgb555';

// Encode the visible RGB555 frame (pitch in bytes) as a PNG image.
export function encodeFramePng(frame: Uint16Array, width: number, height: number, pitchBytes = width * 2): Buffer {
  const w = Math.max(1, width | 0);
  const h = Math.max(1, height | 0);
  const rgba = frameToRGBA(frame, w, h, pitchBytes >> 1);
  const png = new PNG({ width: w, height: h });
  // pngjs expects a Buffer; copy through a Node Buffer view
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}
