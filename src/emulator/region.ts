// Region override values accepted by the core (0 = detect from the cartridge header)
export enum Region {
  Auto = 0,
  JapanNtsc = 1,
  JapanPal = 2,
  Usa = 4,
  Europe = 8,
}

export type HardwareRegion = 'japan-ntsc' | 'japan-pal' | 'usa' | 'europe';

// Version register: bit7 = overseas, bit6 = PAL
export const HW_REGION_MASK = 0xc0;
const HW_OVERSEAS = 0x80;
const HW_PAL = 0x40;

const NAMES = new Map<string, Region>([
  ['auto', Region.Auto],
  ['jp-ntsc', Region.JapanNtsc],
  ['jp-pal', Region.JapanPal],
  ['usa', Region.Usa],
  ['europe', Region.Europe],
]);

const HW_BITS: Record<Exclude<Region, Region.Auto>, number> = {
  [Region.JapanNtsc]: 0x00,
  [Region.JapanPal]: HW_PAL,
  [Region.Usa]: HW_OVERSEAS,
  [Region.Europe]: HW_OVERSEAS | HW_PAL,
};

export function isRegion(v: number): v is Region {
  return v === Region.Auto || v === Region.JapanNtsc || v === Region.JapanPal || v === Region.Usa || v === Region.Europe;
}

export function parseRegion(raw: string): Region | null {
  const key = raw.trim().toLowerCase();
  const named = NAMES.get(key);
  if (named !== undefined) return named;
  const n = Number(key);
  return key !== '' && Number.isInteger(n) && isRegion(n) ? n : null;
}

export function regionToHardware(region: Exclude<Region, Region.Auto>): number {
  return HW_BITS[region];
}

export function hardwareRegionName(hw: number): HardwareRegion {
  const bits = hw & HW_REGION_MASK;
  if (bits === HW_OVERSEAS) return 'usa';
  if (bits === (HW_OVERSEAS | HW_PAL)) return 'europe';
  return bits === HW_PAL ? 'japan-pal' : 'japan-ntsc';
}

/**
 * Supported-region mask from the header's region field (offset 0x1F0).
 * Old cartridges list letters (J, U, E); newer ones use a single hex digit
 * whose bits match the Region values.
 */
export function headerRegionMask(field: string): number {
  let mask = 0;
  for (const ch of field.toUpperCase()) {
    if (ch === 'J') mask |= Region.JapanNtsc;
    else if (ch === 'U') mask |= Region.Usa;
    else if (ch === 'E') mask |= Region.Europe;
  }
  if (mask === 0) {
    const digit = parseInt(field.trim().charAt(0), 16);
    if (Number.isInteger(digit)) mask = digit & 0x0f;
  }
  return mask;
}

// Pick a region from the supported mask, trying the order's nibbles low to high.
export function pickRegion(supported: number, autoOrder: number): Exclude<Region, Region.Auto> {
  for (let shift = 0; shift < 12; shift += 4) {
    const candidate = (autoOrder >> shift) & 0x0f;
    if (isRegion(candidate) && candidate !== Region.Auto && (supported & candidate) !== 0) return candidate;
  }
  const first = autoOrder & 0x0f;
  return isRegion(first) && first !== Region.Auto ? first : Region.Usa;
}
