import { AudioPackager } from '../audio/packager';
import { isAddOnImage, romTitle } from '../cart/header';
import { PadLatch } from '../input/controller';
import { StateBridge } from '../state/bridge';
import type { StateResult } from '../state/bridge';
import { createLog } from '../utils/log';
import type { HostLog } from '../utils/log';
import { VideoPresenter } from '../video/presenter';
import { loadHostConfig } from './config';
import type { HostConfig } from './config';
import type { HostCallbacks } from './host';
import { HW_REGION_MASK } from './region';
import { CoreOpt } from './types';
import type { EmulationCore, Word } from './types';

export const DEFAULT_CORE_OPTIONS =
  CoreOpt.EnableStereo | CoreOpt.EnableFM | CoreOpt.EnablePSG | CoreOpt.EnableZ80 |
  CoreOpt.EnableCdPcm | CoreOpt.EnableCdAudio | CoreOpt.EnableCdGraphics |
  CoreOpt.AccurateSprites | CoreOpt.Enable32X | CoreOpt.EnablePWM |
  CoreOpt.Hide32ColumnBorder;

/**
 * The host-facing session: owns the pixel, sample, ROM and state buffers for the one
 * emulation session a host runs, and sequences the core through its lifecycle.
 *
 * Calls made in the wrong state (running a frame with nothing loaded, exiting twice)
 * are no-ops rather than errors.
 */
export class HostSession {
  readonly video: VideoPresenter;
  readonly audio: AudioPackager;
  readonly state: StateBridge;
  private readonly pads = new PadLatch();
  private readonly host: HostCallbacks = {};
  private readonly log: HostLog;
  private initialized = false;
  private gameLoaded = false;
  private rom: Uint8Array | null = null;
  private frameCount = 0;

  constructor(private readonly core: EmulationCore, callbacks: HostCallbacks = {}, readonly config: HostConfig = loadHostConfig()) {
    this.setCallbacks(callbacks);
    this.log = createLog('host', config.debug);
    this.video = new VideoPresenter(core, this.host, createLog('video', config.debug));
    this.audio = new AudioPackager(this.host, config.soundRate);
    this.state = new StateBridge(core, () => this.gameLoaded, config.stateMaxSize, createLog('state', config.debug));
  }

  get isInitialized(): boolean { return this.initialized; }
  get isGameLoaded(): boolean { return this.gameLoaded; }
  get frames(): number { return this.frameCount; }

  // Callbacks can be swapped at any time; unset entries are simply not called.
  setCallbacks(callbacks: HostCallbacks): void {
    this.host.onVideoModeChange = callbacks.onVideoModeChange;
    this.host.onAudioWrite = callbacks.onAudioWrite;
  }

  init(): boolean {
    if (this.initialized) return true;

    this.core.init();
    this.core.options = DEFAULT_CORE_OPTIONS;
    this.core.regionOverride = this.config.region;
    this.core.autoRegionOrder = this.config.autoRegionOrder;

    this.core.setSoundSink({
      rate: this.config.soundRate,
      buffer: this.audio.buffer,
      write: (byteLength) => { this.audio.flush(byteLength); },
    });
    this.core.setVideoHooks({
      onModeChange: (startLine, lineCount, startCol, colCount) => this.video.modeChanged(startLine, lineCount, startCol, colCount),
      onAddOnStartup: () => this.video.addOnStartup(),
    });
    this.video.attach();

    this.core.setInputDevice(0, 'pad6');
    this.core.setInputDevice(1, 'pad6');

    this.initialized = true;
    this.log.debug(`initialized (rate=${this.config.soundRate} region=${this.config.region})`);
    return true;
  }

  exit(): void {
    if (!this.initialized) return;
    this.rom = null;
    this.core.exit();
    this.initialized = false;
    this.gameLoaded = false;
  }

  // The host copies the image into the returned buffer, then calls loadRom().
  getRomBuffer(size: number): Uint8Array {
    this.rom = new Uint8Array(Math.max(0, Math.floor(size) || 0));
    return this.rom;
  }

  loadRom(filename: string): boolean {
    if (!this.initialized) return false;
    if (!this.rom || this.rom.length === 0) return false;

    if (this.gameLoaded) {
      this.core.unloadCart();
      this.gameLoaded = false;
    }

    const media = this.core.loadMedia(filename, this.rom);
    if (media === null) {
      this.log.warn(`could not load ${filename}`);
      return false;
    }

    this.core.prepareLoop();
    this.audio.clear();
    this.core.rerateSound();

    this.core.options = (this.core.options & ~(CoreOpt.AltRenderer | CoreOpt.SoftScale)) | CoreOpt.Hide32ColumnBorder;
    this.video.attach();

    this.gameLoaded = true;
    this.frameCount = 0;

    if ((this.core.options & CoreOpt.Enable32X) !== 0 && !this.core.addOnActive && isAddOnImage(filename)) {
      this.core.startAddOn();
      this.core.resetAddOnCpus();
    }
    this.log.debug(`loaded ${filename} (${media}, ${this.rom.length} bytes)`);
    return true;
  }

  reset(): void {
    if (this.gameLoaded) this.core.reset();
  }

  setInput(pad: number, buttons: Word): void {
    this.pads.set(pad, buttons);
  }

  runFrame(): void {
    if (!this.gameLoaded) return;
    this.core.setPad(0, this.pads.get(0));
    this.core.setPad(1, this.pads.get(1));
    this.core.runFrame();
    this.frameCount++;
  }

  getVideoBuffer(): Uint16Array {
    return this.video.frame();
  }

  getVideoWidth(): number {
    return this.video.width;
  }

  getVideoHeight(): number {
    return this.video.height;
  }

  isPal(): boolean {
    return this.core.isPal;
  }

  getRomName(): string {
    return this.gameLoaded ? romTitle(this.core.mediaHeader) : '';
  }

  setRegion(region: number): void {
    this.core.regionOverride = region;
    if (this.gameLoaded) {
      this.core.detectRegion();
      this.core.prepareLoop();
      this.core.rerateSound();
    }
  }

  getRegion(): number {
    return this.core.hardware & HW_REGION_MASK;
  }

  saveState(): StateResult {
    return this.state.save();
  }

  loadState(size?: number): StateResult {
    return this.state.load(size);
  }

  stateExists(): boolean {
    return this.state.exists();
  }

  getStateBuffer(): Uint8Array | null {
    return this.state.buffer();
  }

  getStateSize(): number {
    return this.state.size;
  }

  getStateLoadBuffer(size: number): Uint8Array {
    return this.state.prepareLoad(size);
  }
}
