import { describe, it, expect } from 'vitest';
import { loadHostConfig } from '../../src/emulator/config';
import { STATE_MAX_SIZE } from '../../src/state/bridge';
import { Region } from '../../src/emulator/region';

describe('loadHostConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadHostConfig({})).toEqual({
      soundRate: 44100,
      stateMaxSize: STATE_MAX_SIZE,
      region: Region.Auto,
      autoRegionOrder: 0x184,
      debug: false,
    });
    expect(STATE_MAX_SIZE).toBe(2097152);
  });

  it('reads overrides from the environment', () => {
    const cfg = loadHostConfig({
      MDHOST_SOUND_RATE: '22050',
      MDHOST_STATE_MAX: '4096',
      MDHOST_REGION: 'europe',
      MDHOST_AUTO_REGION_ORDER: '0x481',
      MDHOST_DEBUG: '1',
    });
    expect(cfg).toEqual({ soundRate: 22050, stateMaxSize: 4096, region: Region.Europe, autoRegionOrder: 0x481, debug: true });
    expect(loadHostConfig({ MDHOST_DEBUG: 'true' }).debug).toBe(true);
    expect(loadHostConfig({ MDHOST_SOUND_RATE: ' ' }).soundRate).toBe(44100);
  });

  it('rejects malformed or out-of-range values', () => {
    expect(() => loadHostConfig({ MDHOST_SOUND_RATE: 'abc' })).toThrow('Invalid MDHOST_SOUND_RATE: abc');
    expect(() => loadHostConfig({ MDHOST_SOUND_RATE: '1000' })).toThrow('Invalid MDHOST_SOUND_RATE: 1000');
    expect(() => loadHostConfig({ MDHOST_STATE_MAX: '0' })).toThrow('Invalid MDHOST_STATE_MAX: 0');
    expect(() => loadHostConfig({ MDHOST_AUTO_REGION_ORDER: '4096' })).toThrow('Invalid MDHOST_AUTO_REGION_ORDER: 4096');
    expect(() => loadHostConfig({ MDHOST_REGION: 'mars' })).toThrow('Invalid MDHOST_REGION: mars');
  });
});
