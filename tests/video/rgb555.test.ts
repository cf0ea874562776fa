import { describe, it, expect } from 'vitest';
import { decodeRGB555, encodeRGB555, frameToRGBA } from '../../src/video/rgb555';

describe('RGB555 helpers', () => {
  it('packs components red high, blue low', () => {
    expect(encodeRGB555(1, 2, 3)).toBe(1091);
    expect(encodeRGB555(31, 31, 31)).toBe(0x7fff);
    expect(encodeRGB555(32, 0, 0)).toBe(0);
  });

  it('expands 5-bit components to 8 bits', () => {
    expect(decodeRGB555(0x7fff)).toEqual({ r: 255, g: 255, b: 255, a: 255 });
    expect(decodeRGB555(0x0421)).toEqual({ r: 8, g: 8, b: 8, a: 255 });
    expect(decodeRGB555(encodeRGB555(31, 0, 0))).toEqual({ r: 255, g: 0, b: 0, a: 255 });
  });

  it('converts a pitched frame to packed RGBA', () => {
    const frame = new Uint16Array([0x7c00, 0xffff, 0x001f, 0]);
    const rgba = frameToRGBA(frame, 1, 2, 2);
    expect(Array.from(rgba)).toEqual([255, 0, 0, 255, 0, 0, 255, 255]);
  });

  it('treats pixels past the end of the frame as black', () => {
    const rgba = frameToRGBA(new Uint16Array([0x03e0]), 2, 1);
    expect(Array.from(rgba)).toEqual([0, 255, 0, 255, 0, 0, 0, 255]);
  });
});
