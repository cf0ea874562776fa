import type { AudioPacket } from '../emulator/host';
import { BYTES_PER_SAMPLE, CHANNELS } from './packager';

export const WAV_HEADER_BYTES = 44;
const FMT_CHUNK_BYTES = 16;
const PCM_FORMAT = 1;

// Collects the host's audio packets and writes them out as one 16-bit PCM RIFF file.
export class PcmRecorder {
  private readonly packets: Int16Array[] = [];
  private total = 0;

  constructor(readonly channels: number = CHANNELS) {}

  // Packets are already detached from the core's buffer, so they are kept as delivered.
  push(packet: AudioPacket): void {
    this.packets.push(packet.samples);
    this.total += packet.samples.length;
  }

  // Interleaved sample count across all packets
  get length(): number {
    return this.total;
  }

  get sampleFrames(): number {
    return Math.floor(this.total / this.channels);
  }

  samples(): Int16Array {
    const out = new Int16Array(this.total);
    let o = 0;
    for (const p of this.packets) { out.set(p, o); o += p.length; }
    return out;
  }

  toWav(rate: number): Buffer {
    const blockAlign = this.channels * BYTES_PER_SAMPLE;
    const dataBytes = this.total * BYTES_PER_SAMPLE;
    const out = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

    out.write('RIFF', 0, 'ascii');
    out.writeUInt32LE(WAV_HEADER_BYTES - 8 + dataBytes, 4);
    out.write('WAVEfmt ', 8, 'ascii');
    out.writeUInt32LE(FMT_CHUNK_BYTES, 16);
    out.writeUInt16LE(PCM_FORMAT, 20);
    out.writeUInt16LE(this.channels, 22);
    out.writeUInt32LE(rate, 24);
    out.writeUInt32LE(rate * blockAlign, 28);
    out.writeUInt16LE(blockAlign, 32);
    out.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
    out.write('data', 36, 'ascii');
    out.writeUInt32LE(dataBytes, 40);

    let o = WAV_HEADER_BYTES;
    for (const p of this.packets) {
      for (let i = 0; i < p.length; i++, o += BYTES_PER_SAMPLE) out.writeInt16LE(p[i], o);
    }
    return out;
  }
}
