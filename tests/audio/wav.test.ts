import { describe, it, expect } from 'vitest';
import { PcmRecorder, WAV_HEADER_BYTES } from '../../src/audio/wav';

const packet = (...samples: number[]) => ({ sampleCount: samples.length / 2, samples: new Int16Array(samples) });

describe('PcmRecorder', () => {
  it('concatenates pushed packets in order', () => {
    const rec = new PcmRecorder();
    rec.push(packet(1, 2));
    rec.push(packet(3, 4, 5, 6));
    expect(rec.length).toBe(6);
    expect(rec.sampleFrames).toBe(3);
    expect(Array.from(rec.samples())).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('writes a 16-bit PCM RIFF header and little-endian samples', () => {
    const rec = new PcmRecorder();
    rec.push(packet(1, -1));
    rec.push(packet(256, -256));
    const wav = rec.toWav(44100);
    expect(wav.length).toBe(WAV_HEADER_BYTES + 8);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(36 + 8);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt32LE(16)).toBe(16);
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(2);
    expect(wav.readUInt32LE(24)).toBe(44100);
    expect(wav.readUInt32LE(28)).toBe(176400);
    expect(wav.readUInt16LE(32)).toBe(4);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(8);
    expect(Array.from(wav.subarray(44))).toEqual([0x01, 0x00, 0xff, 0xff, 0x00, 0x01, 0x00, 0xff]);
  });

  it('writes a header-only file when nothing was recorded', () => {
    const wav = new PcmRecorder(1).toWav(22050);
    expect(wav.length).toBe(WAV_HEADER_BYTES);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(28)).toBe(44100);
    expect(wav.readUInt32LE(40)).toBe(0);
  });
});
