import { assertDimensions } from './cell-grid';
import { InvalidConfigurationError } from './world-errors';
import { RANDOM_SEED } from './rng';

export interface WorldConfig {
  width: number;
  height: number;
  /** -1 picks a fresh random seed when the world is created. */
  seed: number;
  toroidal: boolean;
  fade: boolean;
  fadeRate: number;
  fadeStart: number;
}

export const DEFAULT_WORLD_CONFIG: Readonly<WorldConfig> = {
  width: 160,
  height: 90,
  seed: RANDOM_SEED,
  toroidal: false,
  fade: false,
  fadeRate: 0.01,
  fadeStart: 0.5
};

export function validateWorldConfig(config: WorldConfig): WorldConfig {
  assertDimensions(config.width, config.height);
  if (!Number.isInteger(config.seed) || config.seed < RANDOM_SEED) {
    throw new InvalidConfigurationError('seed', `Seed must be -1 or a non-negative integer, got ${config.seed}.`);
  }
  if (config.fade && !(Number.isFinite(config.fadeRate) && config.fadeRate > 0)) {
    throw new InvalidConfigurationError('fadeRate', `Fade rate must be greater than 0, got ${config.fadeRate}.`);
  }
  if (!(Number.isFinite(config.fadeStart) && config.fadeStart > 0 && config.fadeStart <= 1)) {
    throw new InvalidConfigurationError('fadeStart', `Fade start must be in (0, 1], got ${config.fadeStart}.`);
  }
  return {
    width: config.width,
    height: config.height,
    seed: config.seed,
    toroidal: !!config.toroidal,
    fade: !!config.fade,
    fadeRate: config.fadeRate,
    fadeStart: config.fadeStart
  };
}
