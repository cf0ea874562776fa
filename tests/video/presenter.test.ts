import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { PixelFormat, VideoOutput } from '../../src/emulator/types';
import { VideoPresenter, VOUT_MAX_HEIGHT, VOUT_MAX_WIDTH } from '../../src/video/presenter';

class FakeOutput implements VideoOutput {
  calls: string[] = [];
  buffer: Uint16Array | null = null;
  pitch = 0;

  setOutFormat(format: PixelFormat, lineMode: boolean): void {
    this.calls.push(`format ${format} ${lineMode}`);
  }

  setOutBuffer(buffer: Uint16Array | null, pitchBytes: number): void {
    this.buffer = buffer;
    this.pitch = pitchBytes;
    this.calls.push(`buffer ${pitchBytes}`);
  }

  markPaletteDirty(): void {
    this.calls.push('palette');
  }
}

describe('VideoPresenter', () => {
  it('attaches the pixel buffer in RGB555 at the current pitch', () => {
    const core = new FakeOutput();
    const video = new VideoPresenter(core);
    video.attach();
    expect(core.calls).toEqual(['format rgb555 false', 'buffer 640']);
    expect(core.buffer).toBe(video.pixels);
  });

  it('computes dimensions and the visible offset from a mode change', () => {
    const core = new FakeOutput();
    const sizes: Array<[number, number]> = [];
    const video = new VideoPresenter(core, { onVideoModeChange: (w, h) => sizes.push([w, h]) });
    video.modeChanged(8, 224, 0, 320);
    expect(video.width).toBe(320);
    expect(video.height).toBe(224);
    expect(video.offset).toBe(5120);
    expect(video.frame().byteOffset).toBe(5120);
    expect(core.calls).toEqual(['buffer 640', 'palette']);
    expect(sizes).toEqual([[320, 224]]);
  });

  it('uses a 512-byte pitch in 32-column mode', () => {
    const core = new FakeOutput();
    const video = new VideoPresenter(core);
    video.modeChanged(0, 224, 0, 256);
    expect(core.pitch).toBe(512);
    expect(video.offset).toBe(0);
  });

  it('clamps oversized dimensions', () => {
    const video = new VideoPresenter(new FakeOutput());
    video.modeChanged(0, 300, 0, 400);
    expect(video.width).toBe(VOUT_MAX_WIDTH);
    expect(video.height).toBe(VOUT_MAX_HEIGHT);
  });

  it('keeps the offset inside the buffer for out-of-range start lines', () => {
    const video = new VideoPresenter(new FakeOutput());
    video.modeChanged(500, 10, 0, 256);
    expect(video.offset).toBe(256 * 239 * 2);
    video.modeChanged(-4, 224, 0, 256);
    expect(video.offset).toBe(0);
  });

  it('clears stale pixels on every mode change', () => {
    const video = new VideoPresenter(new FakeOutput());
    video.pixels[100] = 0x7fff;
    video.modeChanged(8, 224, 0, 320);
    expect(video.pixels[100]).toBe(0);
  });

  it('offset is always a pixel boundary within the buffer', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1000, max: 1000 }),
        fc.integer({ min: 0, max: 1000 }),
        fc.integer({ min: 0, max: 1000 }),
        (startLine, lineCount, colCount) => {
          const video = new VideoPresenter(new FakeOutput());
          video.modeChanged(startLine, lineCount, 0, colCount);
          const byteLen = video.pixels.byteLength;
          return video.offset >= 0 && video.offset % 2 === 0 && video.offset <= byteLen - video.pitch
            && video.width <= VOUT_MAX_WIDTH && video.height <= VOUT_MAX_HEIGHT;
        },
      ),
      { numRuns: 300 },
    );
  });

  it('restores the default output setup on add-on startup before any mode', () => {
    const core = new FakeOutput();
    const video = new VideoPresenter(core);
    video.addOnStartup();
    expect(core.calls).toEqual(['format rgb555 false', 'buffer 640']);
  });

  it('replays the last mode on add-on startup', () => {
    const core = new FakeOutput();
    const sizes: Array<[number, number]> = [];
    const video = new VideoPresenter(core, { onVideoModeChange: (w, h) => sizes.push([w, h]) });
    video.modeChanged(8, 224, 0, 256);
    core.calls = [];
    video.addOnStartup();
    expect(core.calls).toEqual(['format rgb555 false', 'buffer 512', 'palette']);
    expect(sizes).toEqual([[256, 224], [256, 224]]);
    expect(video.offset).toBe(256 * 8 * 2);
    expect(video.currentMode()).toEqual({ startLine: 8, lineCount: 224, startCol: 0, colCount: 256 });
  });
});
