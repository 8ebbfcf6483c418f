import { Injectable } from '@angular/core';
import { DEFAULT_WORLD_CONFIG, WorldConfig } from '../model/world-config';

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export interface LoopSettings {
  /** Generations per second. */
  tickRate: number;
  pauseOnStalemate: boolean;
  pauseOnOscillation: boolean;
}

export const DEFAULT_LOOP_SETTINGS: Readonly<LoopSettings> = {
  tickRate: 60,
  pauseOnStalemate: false,
  pauseOnOscillation: false
};

export const WORLD_ENV_KEYS = {
  width: 'LIFE_GRID_WIDTH',
  height: 'LIFE_GRID_HEIGHT',
  seed: 'LIFE_SEED',
  toroidal: 'LIFE_TOROIDAL',
  fade: 'LIFE_FADE',
  fadeRate: 'LIFE_FADE_RATE',
  fadeStart: 'LIFE_FADE_START',
  tickRate: 'LIFE_TICK_RATE',
  pauseOnStalemate: 'LIFE_PAUSE_ON_STALEMATE',
  pauseOnOscillation: 'LIFE_PAUSE_ON_OSCILLATION'
} as const;

/**
 * Reads world and loop settings from environment variables. Values that do
 * not parse are reported and replaced by the default; range checks happen
 * when the world is built.
 */
@Injectable({ providedIn: 'root' })
export class WorldConfigService {
  readWorldConfig(env: EnvironmentSource = process.env): WorldConfig {
    return {
      width: readInteger(env, WORLD_ENV_KEYS.width, DEFAULT_WORLD_CONFIG.width),
      height: readInteger(env, WORLD_ENV_KEYS.height, DEFAULT_WORLD_CONFIG.height),
      seed: readInteger(env, WORLD_ENV_KEYS.seed, DEFAULT_WORLD_CONFIG.seed),
      toroidal: readBool(env, WORLD_ENV_KEYS.toroidal, DEFAULT_WORLD_CONFIG.toroidal),
      fade: readBool(env, WORLD_ENV_KEYS.fade, DEFAULT_WORLD_CONFIG.fade),
      fadeRate: readNumber(env, WORLD_ENV_KEYS.fadeRate, DEFAULT_WORLD_CONFIG.fadeRate),
      fadeStart: readNumber(env, WORLD_ENV_KEYS.fadeStart, DEFAULT_WORLD_CONFIG.fadeStart)
    };
  }

  readLoopSettings(env: EnvironmentSource = process.env): LoopSettings {
    return {
      tickRate: readNumber(env, WORLD_ENV_KEYS.tickRate, DEFAULT_LOOP_SETTINGS.tickRate),
      pauseOnStalemate: readBool(env, WORLD_ENV_KEYS.pauseOnStalemate, DEFAULT_LOOP_SETTINGS.pauseOnStalemate),
      pauseOnOscillation: readBool(env, WORLD_ENV_KEYS.pauseOnOscillation, DEFAULT_LOOP_SETTINGS.pauseOnOscillation)
    };
  }
}

function readRaw(env: EnvironmentSource, key: string) {
  const raw = env[key];
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  return trimmed ? trimmed : null;
}

function readNumber(env: EnvironmentSource, key: string, fallback: number) {
  const raw = readRaw(env, key);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.error('[WorldConfig] Ignoring non-numeric setting.', { key, raw, fallback });
    return fallback;
  }
  return value;
}

function readInteger(env: EnvironmentSource, key: string, fallback: number) {
  const raw = readRaw(env, key);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.error('[WorldConfig] Ignoring non-integer setting.', { key, raw, fallback });
    return fallback;
  }
  return value;
}

function readBool(env: EnvironmentSource, key: string, fallback: boolean) {
  const raw = readRaw(env, key);
  if (raw === null) return fallback;
  const normalized = raw.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  console.error('[WorldConfig] Ignoring non-boolean setting.', { key, raw, fallback });
  return fallback;
}
