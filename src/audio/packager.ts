import type { AudioPacket, HostCallbacks } from '../emulator/host';

export const CHANNELS = 2;
export const BYTES_PER_SAMPLE = 2;
const FRAME_BYTES = CHANNELS * BYTES_PER_SAMPLE;
const MIN_FPS = 50;

// Stereo frames the sample buffer holds: one 50 Hz frame of audio, doubled for headroom.
export function maxSampleFrames(rate: number): number {
  return Math.floor(rate / MIN_FPS) * 2;
}

// Turns the core's sample flushes into one independent packet each.
export class AudioPackager {
  readonly buffer: Int16Array;

  constructor(private readonly host: HostCallbacks, readonly rate: number) {
    this.buffer = new Int16Array(maxSampleFrames(rate) * CHANNELS);
  }

  get capacityFrames(): number {
    return this.buffer.length / CHANNELS;
  }

  // byteLength counts bytes of interleaved int16 stereo the core just wrote.
  flush(byteLength: number): AudioPacket | null {
    const consumer = this.host.onAudioWrite;
    if (!consumer) return null;
    const requested = Number.isFinite(byteLength) ? Math.max(0, Math.floor(byteLength / FRAME_BYTES)) : 0;
    const sampleCount = Math.min(requested, this.capacityFrames);
    const packet: AudioPacket = { sampleCount, samples: this.buffer.slice(0, sampleCount * CHANNELS) };
    consumer(packet);
    return packet;
  }

  clear(): void {
    this.buffer.fill(0);
  }
}
