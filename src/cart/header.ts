import { headerRegionMask } from '../emulator/region';

// The media header occupies ROM 0x100..0x1FF; offsets below are relative to it.
export const HEADER_START = 0x100;
export const HEADER_SIZE = 0x100;
const TITLE_OFF = 0x20;
const OVERSEAS_OFF = 0x50;
const TITLE_LEN = 48;
const SERIAL_OFF = 0x80;
const CHECKSUM_OFF = 0x8e;
const REGION_OFF = 0xf0;

export interface ParsedHeader {
  system: string;
  title: string;
  overseasTitle: string;
  serial: string;
  checksum: number;
  regions: number; // Region bit mask
}

export function mediaHeader(rom: Uint8Array): Uint8Array {
  return rom.subarray(Math.min(HEADER_START, rom.length), Math.min(HEADER_START + HEADER_SIZE, rom.length));
}

function readString(header: Uint8Array, off: number, len: number): string {
  const bytes = header.subarray(off, off + len);
  const nul = bytes.indexOf(0);
  return new TextDecoder('ascii', { fatal: false }).decode(nul >= 0 ? bytes.subarray(0, nul) : bytes);
}

// Domestic title, trailing spaces trimmed (leading spaces are kept).
export function romTitle(header: Uint8Array): string {
  return readString(header, TITLE_OFF, TITLE_LEN).replace(/ +$/, '');
}

export function parseHeader(header: Uint8Array): ParsedHeader {
  const checksum = header.length >= CHECKSUM_OFF + 2 ? ((header[CHECKSUM_OFF] << 8) | header[CHECKSUM_OFF + 1]) & 0xffff : 0;
  return {
    system: readString(header, 0, 16).trim(),
    title: romTitle(header),
    overseasTitle: readString(header, OVERSEAS_OFF, TITLE_LEN).replace(/ +$/, ''),
    serial: readString(header, SERIAL_OFF, 14).trim(),
    checksum,
    regions: headerRegionMask(readString(header, REGION_OFF, 3)),
  };
}

export function isAddOnImage(filename: string): boolean {
  return /\.32x$/i.test(filename);
}
