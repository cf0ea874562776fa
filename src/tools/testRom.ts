import { HEADER_START } from '../cart/header';

export interface TestRomOptions {
  size?: number;
  system?: string;
  title?: string;
  regions?: string;
  // RGB555 words written after the header, read by the synthetic core as its palette
  palette?: number[];
}

function putAscii(rom: Uint8Array, offset: number, text: string, width: number): void {
  for (let i = 0; i < width; i++) rom[offset + i] = i < text.length ? text.charCodeAt(i) & 0x7f : 0x20;
}

// Minimal cartridge image with a populated header; the body is a repeating byte ramp.
export function buildTestRom(opts: TestRomOptions = {}): Uint8Array {
  const size = Math.max(0x400, opts.size ?? 0x4000);
  const rom = new Uint8Array(size);
  for (let i = 0; i < size; i++) rom[i] = (i * 7 + (i >> 8)) & 0xff;

  putAscii(rom, HEADER_START, opts.system ?? 'SEGA MEGA DRIVE', 16);
  putAscii(rom, HEADER_START + 0x20, opts.title ?? 'TEST CART', 48);
  putAscii(rom, HEADER_START + 0x50, opts.title ?? 'TEST CART', 48);
  putAscii(rom, HEADER_START + 0x80, 'GM 00000000-00', 14);
  rom[HEADER_START + 0x8e] = 0x12;
  rom[HEADER_START + 0x8f] = 0x34;
  putAscii(rom, HEADER_START + 0xf0, opts.regions ?? 'JUE', 16);

  const palette = opts.palette ?? Array.from({ length: 64 }, (_, i) => ((i & 0x1f) << 10) | (((i * 3) & 0x1f) << 5) | ((31 - i) & 0x1f));
  for (let i = 0; i < 64; i++) {
    const c = (palette[i] ?? 0) & 0x7fff;
    rom[0x200 + i * 2] = c >> 8;
    rom[0x200 + i * 2 + 1] = c & 0xff;
  }
  return rom;
}
