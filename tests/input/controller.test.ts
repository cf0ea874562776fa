import { describe, it, expect } from 'vitest';
import { BUTTON_BITS, PadLatch, buttonMask } from '../../src/input/controller';

describe('pad input', () => {
  it('builds the six-button pad word', () => {
    expect(buttonMask({ Start: true, A: true })).toBe(0xc0);
    expect(buttonMask({ Mode: true, Up: true })).toBe(0x801);
    expect(buttonMask({ B: false })).toBe(0);
    expect(BUTTON_BITS.X).toBe(0x400);
  });

  it('latches the low 16 bits per pad', () => {
    const pads = new PadLatch();
    pads.set(0, 0x1ffff);
    pads.set(1, 0x0080);
    expect(pads.get(0)).toBe(0xffff);
    expect(pads.get(1)).toBe(0x0080);
  });

  it('ignores pads outside 0..1', () => {
    const pads = new PadLatch();
    pads.set(2, 0xff);
    pads.set(-1, 0xff);
    pads.set(0.5, 0xff);
    expect(pads.get(0)).toBe(0);
    expect(pads.get(1)).toBe(0);
    expect(pads.get(2)).toBe(0);
  });

  it('clear releases every button', () => {
    const pads = new PadLatch();
    pads.set(0, 0xfff);
    pads.clear();
    expect(pads.get(0)).toBe(0);
  });
});
