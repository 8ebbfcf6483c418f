import { ALIVE, CellGrid, DEAD, createGrid, isAlive, sameShape } from './cell-grid';
import { MalformedGridError } from './world-errors';

export type RuleMode = 'binary' | 'fade';

export interface FadeParameters {
  /** Subtracted from a dead cell each generation. */
  fadeRate: number;
  /** Value a cell takes on the generation it dies. */
  fadeStart: number;
}

// Decayed values below this snap to exactly 0 so the fade always ends.
export const FADE_EPSILON = 1e-5;

export type RuleEngine = (grid: CellGrid, counts: Uint8Array, target?: CellGrid) => CellGrid;

/** Classic B3/S23. Reads `grid`, writes a separate grid, never mutates the input. */
export function applyBinaryRules(grid: CellGrid, counts: Uint8Array, target?: CellGrid): CellGrid {
  const next = prepareTarget(grid, counts, target);
  const source = grid.cells;
  const out = next.cells;
  for (let i = 0; i < source.length; i++) {
    const count = counts[i];
    if (isAlive(source[i])) {
      out[i] = count === 2 || count === 3 ? ALIVE : DEAD;
    } else {
      out[i] = count === 3 ? ALIVE : DEAD;
    }
  }
  return next;
}

/**
 * B3/S23 where dying cells drop to `fadeStart` and then lose `fadeRate` per
 * generation. A fading cell with exactly 3 neighbors is born again at 1.0
 * whatever its current level.
 */
export function applyFadeRules(
  grid: CellGrid,
  counts: Uint8Array,
  params: FadeParameters,
  target?: CellGrid
): CellGrid {
  const next = prepareTarget(grid, counts, target);
  const source = grid.cells;
  const out = next.cells;
  for (let i = 0; i < source.length; i++) {
    const count = counts[i];
    let value: number;
    if (isAlive(source[i])) {
      value = count === 2 || count === 3 ? ALIVE : params.fadeStart;
    } else {
      value = count === 3 ? ALIVE : source[i] - params.fadeRate;
    }
    out[i] = value < FADE_EPSILON ? DEAD : value;
  }
  return next;
}

export function ruleEngineFor(mode: RuleMode, params: FadeParameters): RuleEngine {
  switch (mode) {
    case 'fade': {
      const fade: FadeParameters = { fadeRate: params.fadeRate, fadeStart: params.fadeStart };
      return (grid, counts, target) => applyFadeRules(grid, counts, fade, target);
    }
    case 'binary':
      return applyBinaryRules;
  }
}

function prepareTarget(grid: CellGrid, counts: Uint8Array, target?: CellGrid): CellGrid {
  if (counts.length !== grid.cells.length) {
    throw new MalformedGridError(`Neighbor counts cover ${counts.length} cells, grid has ${grid.cells.length}.`);
  }
  if (target && target !== grid && sameShape(target, grid)) return target;
  return createGrid(grid.width, grid.height);
}
