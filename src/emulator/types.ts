import type { StateStream } from '../state/stream';

export type Byte = number; // 0..255
export type Word = number; // 0..65535

export type PixelFormat = 'rgb555' | 'rgb565';
export type InputDevice = 'none' | 'pad3' | 'pad6' | 'mouse';
export type MediaType = 'md' | 'cd' | 'sms' | '32x';
export type StateMode = 'save' | 'load';

// Core option bits (subset the host layer touches)
export enum CoreOpt {
  EnableFM = 1 << 0,
  EnablePSG = 1 << 1,
  EnableZ80 = 1 << 2,
  EnableStereo = 1 << 3,
  AltRenderer = 1 << 4,
  Hide32ColumnBorder = 1 << 6,
  EnableCdPcm = 1 << 10,
  EnableCdAudio = 1 << 11,
  EnableCdGraphics = 1 << 13,
  AccurateSprites = 1 << 14,
  SoftScale = 1 << 19,
  Enable32X = 1 << 20,
  EnablePWM = 1 << 21,
}

// Called by the core from inside runFrame().
export interface CoreVideoHooks {
  onModeChange(startLine: number, lineCount: number, startCol: number, colCount: number): void;
  onAddOnStartup(): void;
}

export interface CoreSoundSink {
  rate: number;
  buffer: Int16Array; // interleaved L/R, filled by the core before write()
  write(byteLength: number): void;
}

// Video output surface of the core, all the presenter needs.
export interface VideoOutput {
  setOutFormat(format: PixelFormat, lineMode: boolean): void;
  setOutBuffer(buffer: Uint16Array | null, pitchBytes: number): void;
  markPaletteDirty(): void;
}

// Serializer entry point: returns 0 on success, any other value is a core status code.
export interface StateSerializer {
  serializeState(stream: StateStream, mode: StateMode): number;
}

export interface EmulationCore extends VideoOutput, StateSerializer {
  options: number;
  regionOverride: number;
  autoRegionOrder: number;

  init(): void;
  exit(): void;

  setVideoHooks(hooks: CoreVideoHooks | null): void;
  setSoundSink(sink: CoreSoundSink | null): void;
  setInputDevice(port: number, device: InputDevice): void;
  setPad(port: number, buttons: Word): void;

  // null when the image cannot be detected or loaded
  loadMedia(filename: string, rom: Uint8Array): MediaType | null;
  unloadCart(): void;
  prepareLoop(): void;
  rerateSound(): void;
  detectRegion(): void;
  reset(): void;
  runFrame(): void;

  readonly isPal: boolean;
  readonly hardware: Byte; // version register, bits 6-7 carry the region
  readonly mediaHeader: Uint8Array; // 0x100-byte header at ROM offset 0x100

  readonly addOnActive: boolean;
  startAddOn(): void;
  resetAddOnCpus(): void;
}
