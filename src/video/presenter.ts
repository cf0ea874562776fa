import type { HostCallbacks } from '../emulator/host';
import type { VideoOutput } from '../emulator/types';
import type { HostLog } from '../utils/log';

export const VOUT_MAX_WIDTH = 320;
export const VOUT_MAX_HEIGHT = 240;
export const BYTES_PER_PIXEL = 2;

export interface DisplayMode {
  startLine: number;
  lineCount: number;
  startCol: number;
  colCount: number;
}

const clamp = (v: number, lo: number, hi: number): number => Math.max(lo, Math.min(hi, v));

/**
 * Owns the fixed RGB555 pixel buffer the core renders into and keeps the visible
 * window addressing (width, height, byte offset of the first visible line) in step
 * with the core's display mode.
 *
 * The core renders every line, including the ones above the visible window, at
 * `pitch` bytes per row from the start of the buffer; the host reads from `offset`.
 */
export class VideoPresenter {
  readonly pixels = new Uint16Array(VOUT_MAX_WIDTH * VOUT_MAX_HEIGHT);
  private _width = VOUT_MAX_WIDTH;
  private _height = VOUT_MAX_HEIGHT;
  private _offset = 0;
  // Last reported mode, replayed when add-on hardware resets the core's output setup
  private lastMode: DisplayMode | null = null;

  constructor(
    private readonly core: VideoOutput,
    private readonly host: HostCallbacks = {},
    private readonly log?: HostLog,
  ) {}

  get width(): number { return this._width; }
  get height(): number { return this._height; }
  // Byte displacement of the first visible line
  get offset(): number { return this._offset; }
  get pitch(): number { return this._width * BYTES_PER_PIXEL; }

  currentMode(): DisplayMode | null {
    return this.lastMode ? { ...this.lastMode } : null;
  }

  // Visible frame: a view beginning exactly `offset` bytes into the pixel buffer.
  frame(): Uint16Array {
    return this.pixels.subarray(this._offset / BYTES_PER_PIXEL);
  }

  // Default output setup (init, media load): RGB555 into the buffer at the current pitch.
  attach(): void {
    this.core.setOutFormat('rgb555', false);
    this.core.setOutBuffer(this.pixels, this.pitch);
  }

  modeChanged(startLine: number, lineCount: number, startCol: number, colCount: number): void {
    this.lastMode = { startLine, lineCount, startCol, colCount };

    this._width = clamp(colCount | 0, 0, VOUT_MAX_WIDTH);
    this._height = clamp(lineCount | 0, 0, VOUT_MAX_HEIGHT);

    // Stale pixels would otherwise show through a smaller window
    this.pixels.fill(0);
    this.core.setOutBuffer(this.pixels, this.pitch);

    const maxOffset = this._width * (VOUT_MAX_HEIGHT - 1) * BYTES_PER_PIXEL;
    this._offset = clamp(this._width * (startLine | 0) * BYTES_PER_PIXEL, 0, maxOffset);

    this.core.markPaletteDirty();
    this.log?.debug(`mode ${colCount}x${lineCount} @${startCol},${startLine} -> ${this._width}x${this._height} offset=${this._offset}`);
    this.host.onVideoModeChange?.(this._width, this._height);
  }

  // Add-on startup resets the core's output format and target; restore the negotiated mode.
  addOnStartup(): void {
    this.core.setOutFormat('rgb555', false);
    const mode = this.lastMode;
    if (mode) {
      this.modeChanged(mode.startLine, mode.lineCount, mode.startCol, mode.colCount);
    } else {
      this.core.setOutBuffer(this.pixels, this.pitch);
    }
  }
}
