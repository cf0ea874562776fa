import type { Word } from '../emulator/types';

export type Button = 'Up' | 'Down' | 'Left' | 'Right' | 'B' | 'C' | 'A' | 'Start' | 'Z' | 'Y' | 'X' | 'Mode';

// Six-button pad word: MXYZ SACB RLDU
export const BUTTON_BITS: Readonly<Record<Button, number>> = {
  Up: 1 << 0,
  Down: 1 << 1,
  Left: 1 << 2,
  Right: 1 << 3,
  B: 1 << 4,
  C: 1 << 5,
  A: 1 << 6,
  Start: 1 << 7,
  Z: 1 << 8,
  Y: 1 << 9,
  X: 1 << 10,
  Mode: 1 << 11,
};

export const BUTTON_ORDER: readonly Button[] = ['Up', 'Down', 'Left', 'Right', 'B', 'C', 'A', 'Start', 'Z', 'Y', 'X', 'Mode'];

export const PAD_COUNT = 2;

const validPad = (pad: number): boolean => Number.isInteger(pad) && pad >= 0 && pad < PAD_COUNT;

export function buttonMask(state: Partial<Record<Button, boolean>>): Word {
  let mask = 0;
  for (const button of BUTTON_ORDER) {
    if (state[button]) mask |= BUTTON_BITS[button];
  }
  return mask & 0xffff;
}

// Latched per-pad state the host writes between frames.
export class PadLatch {
  private readonly pads = new Uint16Array(PAD_COUNT);

  set(pad: number, buttons: Word): void {
    if (validPad(pad)) this.pads[pad] = buttons & 0xffff;
  }

  get(pad: number): Word {
    return validPad(pad) ? this.pads[pad] : 0;
  }

  clear(): void {
    this.pads.fill(0);
  }
}
