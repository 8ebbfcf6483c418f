import {
  ALIVE,
  CellGrid,
  DEAD,
  GridRows,
  assertDimensions,
  createGrid,
  cropGrid,
  gridFromRows,
  isAlive,
  padGrid,
  sameShape
} from './cell-grid';
import { MalformedGridError } from './world-errors';
import { Rng, createRng, resolveSeed } from './rng';

export type PopulateMode = 'seed' | 'random' | 'alive' | 'dead' | 'kill';

// Seeded and random fills are deliberately sparse.
export const ALIVE_PROBABILITY = 0.25;

const POPULATE_MODES: Readonly<Record<string, PopulateMode>> = {
  seed: 'seed',
  random: 'random',
  alive: 'alive',
  'all-alive': 'alive',
  dead: 'dead',
  'all-dead': 'dead',
  kill: 'kill'
};

export function normalizePopulateMode(mode: PopulateMode | string | null | undefined): PopulateMode | null {
  const value = String(mode || '').trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(POPULATE_MODES, value) ? POPULATE_MODES[value] : null;
}

export class GridBuffer {
  private grid: CellGrid;
  private oneBack: CellGrid | null = null;
  private twoBack: CellGrid | null = null;
  // Recycled write target for the next generation; never aliased with the grids above.
  private spare: CellGrid | null = null;
  private readonly entropy: Rng = createRng(Math.floor(Math.random() * 4294967296));

  private constructor(grid: CellGrid, readonly seed: number) {
    this.grid = grid;
  }

  static create(width: number, height: number, seed: number): GridBuffer {
    assertDimensions(width, height);
    const buffer = new GridBuffer(createGrid(width, height), resolveSeed(seed));
    buffer.populate('seed');
    return buffer;
  }

  static fromGrid(grid: CellGrid, seed: number): GridBuffer {
    assertDimensions(grid.width, grid.height);
    return new GridBuffer(grid, seed);
  }

  get current(): CellGrid {
    return this.grid;
  }

  get previous(): CellGrid | null {
    return this.oneBack;
  }

  get beforePrevious(): CellGrid | null {
    return this.twoBack;
  }

  get width() {
    return this.grid.width;
  }

  get height() {
    return this.grid.height;
  }

  /**
   * Reinitializes every cell. `kill` turns alive cells into `killValue` and
   * leaves the rest alone. Returns false for an unknown mode.
   */
  populate(mode: PopulateMode | string, killValue: number = DEAD): boolean {
    const normalized = normalizePopulateMode(mode);
    const cells = this.grid.cells;
    switch (normalized) {
      case 'seed':
        fillSparse(cells, createRng(this.seed));
        return true;
      case 'random':
        fillSparse(cells, this.entropy);
        return true;
      case 'alive':
        cells.fill(ALIVE);
        return true;
      case 'dead':
        cells.fill(DEAD);
        return true;
      case 'kill':
        for (let i = 0; i < cells.length; i++) {
          if (isAlive(cells[i])) cells[i] = killValue;
        }
        return true;
      default:
        return false;
    }
  }

  load(rows: GridRows) {
    this.install(gridFromRows(rows));
  }

  /** Replaces the grid and forgets history, since old snapshots no longer describe it. */
  install(grid: CellGrid) {
    assertDimensions(grid.width, grid.height);
    this.grid = grid;
    this.oneBack = null;
    this.twoBack = null;
    this.spare = null;
  }

  extend() {
    this.grid = padGrid(this.grid);
  }

  reduce(): boolean {
    const cropped = cropGrid(this.grid);
    if (!cropped) return false;
    this.grid = cropped;
    return true;
  }

  /**
   * Computes the next generation into a scratch grid, then rotates:
   * two-back <- one-back, one-back <- current, current <- next.
   * If `compute` throws, nothing observable has changed.
   */
  advance(compute: (current: CellGrid, target: CellGrid) => CellGrid): CellGrid {
    const target = this.spare && sameShape(this.spare, this.grid)
      ? this.spare
      : createGrid(this.grid.width, this.grid.height);
    const next = compute(this.grid, target);
    if (next === this.grid || next === this.oneBack || next === this.twoBack) {
      throw new MalformedGridError('Next generation must not alias a retained grid.');
    }

    this.spare = this.twoBack;
    this.twoBack = this.oneBack;
    this.oneBack = this.grid;
    this.grid = next;
    return next;
  }

  contains(x: number, y: number) {
    return Number.isInteger(x) && Number.isInteger(y)
      && x >= 0 && y >= 0 && x < this.grid.width && y < this.grid.height;
  }

  get(x: number, y: number): number | null {
    if (!this.contains(x, y)) return null;
    return this.grid.cells[y * this.grid.width + x];
  }

  set(x: number, y: number, value: number): boolean {
    if (!this.contains(x, y)) return false;
    if (!Number.isFinite(value) || value < DEAD || value > ALIVE) {
      throw new MalformedGridError(`Cell value out of range: ${value}.`);
    }
    this.grid.cells[y * this.grid.width + x] = value;
    return true;
  }
}

function fillSparse(cells: Float64Array, rng: Rng) {
  for (let i = 0; i < cells.length; i++) {
    cells[i] = rng() < ALIVE_PROBABILITY ? ALIVE : DEAD;
  }
}
