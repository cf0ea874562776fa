import { mediaHeader, parseHeader, HEADER_START, HEADER_SIZE } from '../cart/header';
import { Region, isRegion, pickRegion, regionToHardware } from '../emulator/region';
import type {
  CoreSoundSink,
  CoreVideoHooks,
  EmulationCore,
  InputDevice,
  MediaType,
  PixelFormat,
  StateMode,
  Word,
} from '../emulator/types';
import { ChunkId, STATE_OK, STATE_TRUNCATED, readStateChunks, writeStateChunks } from '../state/chunks';
import type { StateChunk } from '../state/chunks';
import type { StateStream } from '../state/stream';

const CPU_CHUNK_BYTES = 10;
const WORK_RAM_BYTES = 0x10000;
const ADDON_RAM_BYTES = 0x80000; // SDRAM + frame DRAM
const CRAM_ENTRIES = 64;
const PALETTE_OFFSET = HEADER_START + HEADER_SIZE; // palette words follow the header
const KNOWN_CHUNKS: ReadonlySet<number> = new Set([ChunkId.Cpu, ChunkId.WorkRam, ChunkId.Cram, ChunkId.AddOn]);

export interface OutputTarget {
  buffer: Uint16Array | null;
  pitch: number;
  format: PixelFormat;
  lineMode: boolean;
}

function xorshift32(x: number): number {
  x ^= x << 13;
  x ^= x >>> 17;
  x ^= x << 5;
  return x >>> 0;
}

/**
 * Deterministic stand-in for the emulation core.
 *
 * It renders a pattern derived from the ROM bytes and a per-frame LFSR, emits a
 * square wave, reports display-mode changes the way a VDP-driven core does (at the
 * start of the first frame that runs in a new mode) and serializes its state in the
 * chunked state layout. Two runs from the same state produce identical frames.
 */
export class SyntheticCore implements EmulationCore {
  options = 0;
  regionOverride: number = Region.Auto;
  autoRegionOrder = 0x184;

  private hooks: CoreVideoHooks | null = null;
  private sink: CoreSoundSink | null = null;
  private out: OutputTarget = { buffer: null, pitch: 0, format: 'rgb565', lineMode: false };
  private paletteDirty = true;
  private readonly devices: InputDevice[] = ['none', 'none'];
  private readonly pads = new Uint16Array(2);
  private rom: Uint8Array | null = null;
  private _hardware = regionToHardware(Region.Usa);
  private _addOnActive = false;
  private fps = 60;
  private samplesPerFrame = 0;
  private reportedMode = '';

  // Machine state (serialized)
  private readonly workRam = new Uint8Array(WORK_RAM_BYTES);
  private readonly cram = new Uint16Array(CRAM_ENTRIES);
  private readonly addOnRam = new Uint8Array(ADDON_RAM_BYTES);
  private frameCount = 0;
  private lfsr = 1;
  private h40 = true;
  private v30 = false;

  // Palette as last resolved; refreshed only when dirty
  private readonly resolved = new Uint16Array(CRAM_ENTRIES);

  get isPal(): boolean {
    return (this._hardware & 0x40) !== 0;
  }

  get hardware(): number {
    return this._hardware;
  }

  get mediaHeader(): Uint8Array {
    return this.rom ? mediaHeader(this.rom) : new Uint8Array(0);
  }

  get addOnActive(): boolean {
    return this._addOnActive;
  }

  get frames(): number {
    return this.frameCount;
  }

  get outputTarget(): OutputTarget {
    return { ...this.out };
  }

  get isPaletteDirty(): boolean {
    return this.paletteDirty;
  }

  inputDevice(port: number): InputDevice {
    return this.devices[port] ?? 'none';
  }

  init(): void {
    this.out = { buffer: null, pitch: 0, format: 'rgb565', lineMode: false };
    this.paletteDirty = true;
  }

  exit(): void {
    this.unloadCart();
    this.hooks = null;
    this.sink = null;
    this.out = { buffer: null, pitch: 0, format: 'rgb565', lineMode: false };
  }

  setVideoHooks(hooks: CoreVideoHooks | null): void {
    this.hooks = hooks;
  }

  setSoundSink(sink: CoreSoundSink | null): void {
    this.sink = sink;
    this.rerateSound();
  }

  setOutFormat(format: PixelFormat, lineMode: boolean): void {
    this.out = { ...this.out, format, lineMode };
  }

  setOutBuffer(buffer: Uint16Array | null, pitchBytes: number): void {
    this.out = { ...this.out, buffer, pitch: pitchBytes };
  }

  markPaletteDirty(): void {
    this.paletteDirty = true;
  }

  setInputDevice(port: number, device: InputDevice): void {
    if (port === 0 || port === 1) this.devices[port] = device;
  }

  setPad(port: number, buttons: Word): void {
    if (port === 0 || port === 1) this.pads[port] = buttons & 0xffff;
  }

  // Game-side display mode register: H40 (320 columns) / H32 (256), V30 (240 lines) / V28 (224).
  setDisplayMode(h40: boolean, v30: boolean): void {
    this.h40 = h40;
    this.v30 = v30;
  }

  loadMedia(filename: string, rom: Uint8Array): MediaType | null {
    if (rom.length < PALETTE_OFFSET) return null;
    this.rom = rom.slice();
    for (let i = 0; i < CRAM_ENTRIES; i++) {
      const o = PALETTE_OFFSET + i * 2;
      this.cram[i] = o + 1 < rom.length ? ((rom[o] << 8) | rom[o + 1]) & 0x7fff : 0;
    }
    this.detectRegion();
    this.power();
    return parseHeader(mediaHeader(rom)).system.includes('32X') || /\.32x$/i.test(filename) ? '32x' : 'md';
  }

  unloadCart(): void {
    this.rom = null;
    this.reportedMode = '';
    this._addOnActive = false;
  }

  prepareLoop(): void {
    this.fps = this.isPal ? 50 : 60;
  }

  rerateSound(): void {
    this.samplesPerFrame = this.sink ? Math.floor(this.sink.rate / this.fps) : 0;
  }

  detectRegion(): void {
    const override = this.regionOverride;
    if (isRegion(override) && override !== Region.Auto) {
      this._hardware = regionToHardware(override);
      return;
    }
    const supported = parseHeader(this.mediaHeader).regions;
    this._hardware = regionToHardware(pickRegion(supported, this.autoRegionOrder));
  }

  reset(): void {
    this.frameCount = 0;
    this.lfsr = 1;
  }

  startAddOn(): void {
    this._addOnActive = true;
    // Add-on activation drops the core's output setup back to defaults
    this.out = { buffer: null, pitch: 0, format: 'rgb565', lineMode: true };
    this.hooks?.onAddOnStartup();
  }

  resetAddOnCpus(): void {
    this.addOnRam.fill(0, 0, 0x100);
  }

  runFrame(): void {
    const rom = this.rom;
    if (!rom) return;

    const lineCount = this.v30 ? 240 : 224;
    const startLine = (240 - lineCount) >> 1;
    const colCount = this.h40 ? 320 : 256;
    const mode = `${startLine}:${lineCount}:${colCount}`;
    if (mode !== this.reportedMode) {
      this.reportedMode = mode;
      this.hooks?.onModeChange(startLine, lineCount, 0, colCount);
    }

    this.lfsr = xorshift32((this.lfsr ^ this.pads[0] ^ (this.pads[1] << 16)) >>> 0) || 1;
    this.workRam[this.frameCount & 0xffff] = this.lfsr & 0xff;
    if (this._addOnActive) this.addOnRam[(this.frameCount * 7) % ADDON_RAM_BYTES] = (this.lfsr >>> 8) & 0xff;

    if (this.paletteDirty) {
      for (let i = 0; i < CRAM_ENTRIES; i++) this.resolved[i] = this.cram[i] & 0x7fff;
      this.paletteDirty = false;
    }

    this.render(rom, startLine, lineCount, colCount);
    this.mixAudio();
    this.frameCount++;
  }

  private render(rom: Uint8Array, startLine: number, lineCount: number, colCount: number): void {
    const buf = this.out.buffer;
    if (!buf) return;
    const pitchPx = this.out.pitch >> 1;
    const width = Math.min(colCount, pitchPx);
    const shift = this.lfsr & 0xff;
    for (let y = 0; y < lineCount; y++) {
      const row = (startLine + y) * pitchPx;
      if (row + width > buf.length) break;
      const ramByte = this.workRam[y & 0xff];
      for (let x = 0; x < width; x++) {
        const src = rom[(y * colCount + x + shift + ramByte) % rom.length];
        buf[row + x] = this.resolved[src & (CRAM_ENTRIES - 1)];
      }
    }
  }

  private mixAudio(): void {
    const sink = this.sink;
    if (!sink || this.samplesPerFrame <= 0) return;
    const frames = Math.min(this.samplesPerFrame, sink.buffer.length >> 1);
    const period = 100 + (this.lfsr & 0x3f);
    for (let i = 0; i < frames; i++) {
      const v = ((this.frameCount * frames + i) % period) < period / 2 ? 2000 : -2000;
      sink.buffer[i * 2] = v;
      sink.buffer[i * 2 + 1] = -v;
    }
    sink.write(frames * 4);
  }

  serializeState(stream: StateStream, mode: StateMode): number {
    return mode === 'save' ? this.saveState(stream) : this.loadState(stream);
  }

  private saveState(stream: StateStream): number {
    const cpu = new Uint8Array(CPU_CHUNK_BYTES);
    const view = new DataView(cpu.buffer);
    view.setUint32(0, this.frameCount >>> 0, true);
    view.setUint32(4, this.lfsr >>> 0, true);
    view.setUint8(8, (this.h40 ? 1 : 0) | (this.v30 ? 2 : 0));
    view.setUint8(9, this._hardware);

    const cram = new Uint8Array(CRAM_ENTRIES * 2);
    const cramView = new DataView(cram.buffer);
    for (let i = 0; i < CRAM_ENTRIES; i++) cramView.setUint16(i * 2, this.cram[i], true);

    const chunks: StateChunk[] = [
      { id: ChunkId.Cpu, parts: [cpu] },
      { id: ChunkId.WorkRam, parts: [this.workRam] },
      { id: ChunkId.Cram, parts: [cram] },
    ];
    if (this._addOnActive) chunks.push({ id: ChunkId.AddOn, parts: [this.addOnRam] });
    writeStateChunks(stream, chunks);
    return STATE_OK;
  }

  private loadState(stream: StateStream): number {
    const { status, chunks } = readStateChunks(stream, KNOWN_CHUNKS);
    if (status !== STATE_OK) return status;
    const cpu = chunks.get(ChunkId.Cpu);
    if (!cpu || cpu.length < CPU_CHUNK_BYTES) return STATE_TRUNCATED;

    const view = new DataView(cpu.buffer, cpu.byteOffset, cpu.byteLength);
    this.frameCount = view.getUint32(0, true);
    this.lfsr = view.getUint32(4, true) || 1;
    const flags = view.getUint8(8);
    this.h40 = (flags & 1) !== 0;
    this.v30 = (flags & 2) !== 0;
    this._hardware = view.getUint8(9);

    const ram = chunks.get(ChunkId.WorkRam);
    if (ram) this.workRam.set(ram.subarray(0, WORK_RAM_BYTES));
    const cram = chunks.get(ChunkId.Cram);
    if (cram) {
      const cramView = new DataView(cram.buffer, cram.byteOffset, cram.byteLength);
      for (let i = 0; i < CRAM_ENTRIES && i * 2 + 1 < cram.length; i++) this.cram[i] = cramView.getUint16(i * 2, true) & 0x7fff;
    }
    const addOn = chunks.get(ChunkId.AddOn);
    if (addOn) {
      if (!this._addOnActive) this.startAddOn();
      this.addOnRam.set(addOn.subarray(0, ADDON_RAM_BYTES));
    }
    this.paletteDirty = true;
    return STATE_OK;
  }

  private power(): void {
    this.workRam.fill(0);
    this.addOnRam.fill(0);
    this.frameCount = 0;
    this.lfsr = 1;
    this.h40 = true;
    this.v30 = false;
    this.reportedMode = '';
    this.paletteDirty = true;
    this._addOnActive = false;
  }
}
