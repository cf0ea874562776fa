import fs from 'fs';
import path from 'path';
import { PcmRecorder } from '../src/audio/wav';
import { SyntheticCore } from '../src/core/syntheticCore';
import { loadHostConfig } from '../src/emulator/config';
import { hardwareRegionName } from '../src/emulator/region';
import { HostSession } from '../src/emulator/session';
import { buttonMask } from '../src/input/controller';
import { encodeFramePng } from '../src/tools/framePng';
import { buildTestRom } from '../src/tools/testRom';
import { frameHash } from '../src/utils/hash';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom;
  const outDir = args.out || 'out';
  const frames = Number.isFinite(Number(args.frames)) ? Math.max(1, Number(args.frames)) : 120;
  const holdStart = (args.holdStart ?? '0') !== '0';
  const config = loadHostConfig();

  const recorder = new PcmRecorder();
  const session = new HostSession(new SyntheticCore(), {
    onVideoModeChange: (w, h) => console.log(`[headless] video mode ${w}x${h}`),
    onAudioWrite: (packet) => recorder.push(packet),
  }, config);
  session.init();

  const image = romPath ? new Uint8Array(fs.readFileSync(romPath)) : buildTestRom();
  session.getRomBuffer(image.length).set(image);
  const name = romPath ? path.basename(romPath) : 'test.bin';
  if (!session.loadRom(name)) {
    console.error(`[headless] could not load ${romPath ?? 'built-in test ROM'}`);
    process.exit(1);
  }
  console.log(`[headless] ROM: "${session.getRomName()}" region=${hardwareRegionName(session.getRegion())} pal=${session.isPal()} frames=${frames}`);

  if (holdStart) session.setInput(0, buttonMask({ Start: true }));
  for (let i = 0; i < frames; i++) {
    session.runFrame();
    if (i % 60 === 59) console.log(`[headless] stepped ${i + 1} frames`);
  }

  fs.mkdirSync(outDir, { recursive: true });
  const width = session.getVideoWidth();
  const height = session.getVideoHeight();
  const frame = session.getVideoBuffer();
  fs.writeFileSync(path.join(outDir, 'frame.png'), encodeFramePng(frame, width, height, session.video.pitch));
  fs.writeFileSync(path.join(outDir, 'audio.wav'), recorder.toWav(config.soundRate));

  const saved = session.saveState();
  if (saved.ok) {
    const blob = session.state.blob();
    if (blob) fs.writeFileSync(path.join(outDir, 'state.bin'), blob);
  } else {
    console.warn(`[headless] save failed: ${saved.reason}`);
  }

  console.log(`Wrote ${outDir} (${width}x${height}, frame ${frameHash(frame.subarray(0, width * height))}, ${recorder.sampleFrames} sample frames)`);
  session.exit();
}

main().catch((e) => {
  console.error('[headless] Unhandled error:', e);
  process.exit(1);
});
