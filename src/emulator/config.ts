import { STATE_MAX_SIZE } from '../state/bridge';
import { Region, parseRegion } from './region';

export const DEFAULT_SOUND_RATE = 44100;
export const DEFAULT_AUTO_REGION_ORDER = 0x184; // USA, then Europe, then Japan

export interface HostConfig {
  soundRate: number;
  stateMaxSize: number;
  region: Region;
  autoRegionOrder: number;
  debug: boolean;
}

export type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw.trim());
  if (!Number.isInteger(v)) throw new Error(`Invalid ${name}: ${raw}`);
  return v;
}

export function loadHostConfig(env: Env = process.env): HostConfig {
  const soundRate = intFrom(env, 'MDHOST_SOUND_RATE', DEFAULT_SOUND_RATE);
  const stateMaxSize = intFrom(env, 'MDHOST_STATE_MAX', STATE_MAX_SIZE);
  const autoRegionOrder = intFrom(env, 'MDHOST_AUTO_REGION_ORDER', DEFAULT_AUTO_REGION_ORDER);
  const region = parseRegion(env.MDHOST_REGION ?? 'auto');
  const debug = (env.MDHOST_DEBUG ?? '0') === '1' || env.MDHOST_DEBUG === 'true';

  if (soundRate < 8000 || soundRate > 96000) throw new Error(`Invalid MDHOST_SOUND_RATE: ${soundRate}`);
  if (stateMaxSize <= 0) throw new Error(`Invalid MDHOST_STATE_MAX: ${stateMaxSize}`);
  if (autoRegionOrder < 0 || autoRegionOrder > 0xfff) throw new Error(`Invalid MDHOST_AUTO_REGION_ORDER: ${autoRegionOrder}`);
  if (region === null) throw new Error(`Invalid MDHOST_REGION: ${env.MDHOST_REGION}`);

  return { soundRate, stateMaxSize, region, autoRegionOrder, debug };
}
