import {
  ALIVE,
  CellGrid,
  DEAD,
  GridRows,
  countAlive,
  gridFromRows,
  gridToRows,
  gridsEqual,
  isAlive
} from './cell-grid';
import { GridBuffer, PopulateMode } from './grid-buffer';
import { NeighborCounter, Topology, neighborCounterFor } from './neighbor-counter';
import { RuleEngine, RuleMode, ruleEngineFor } from './rule-engine';
import { DEFAULT_WORLD_CONFIG, WorldConfig, validateWorldConfig } from './world-config';
import { MalformedGridError } from './world-errors';

export interface WorldSnapshot {
  width: number;
  height: number;
  seed: number;
  generation: number;
  rows: number[][];
}

/**
 * One simulation: owns the grid buffer and its two history snapshots, and
 * advances them one generation per `step()`. Topology and rule mode are fixed
 * at construction.
 */
export class World {
  readonly topology: Topology;
  readonly ruleMode: RuleMode;
  private readonly settings: WorldConfig;
  private readonly countNeighbors: NeighborCounter;
  private readonly applyRules: RuleEngine;
  private buffer: GridBuffer;
  private counts: Uint8Array = new Uint8Array(0);
  private generationCount = 0;

  constructor(config: Partial<WorldConfig> = {}) {
    const settings = validateWorldConfig({ ...DEFAULT_WORLD_CONFIG, ...config });
    this.topology = settings.toroidal ? 'toroidal' : 'bounded';
    this.ruleMode = settings.fade ? 'fade' : 'binary';
    this.countNeighbors = neighborCounterFor(this.topology);
    this.applyRules = ruleEngineFor(this.ruleMode, settings);
    this.buffer = GridBuffer.create(settings.width, settings.height, settings.seed);
    this.settings = { ...settings, seed: this.buffer.seed };
  }

  /**
   * Restores a world from exported rows: the grid rows followed by a `[seed]`
   * row and a `[generation]` row. Grid dimensions come from the rows.
   */
  static fromRows(rows: GridRows, config: Partial<WorldConfig> = {}): World {
    if (!Array.isArray(rows) || rows.length < 3) {
      throw new MalformedGridError('Exported rows need at least one grid row plus seed and generation rows.');
    }
    const seed = readTrailingInteger(rows[rows.length - 2], 'seed');
    const generation = readTrailingInteger(rows[rows.length - 1], 'generation');
    const grid = gridFromRows(rows.slice(0, -2));

    const world = new World({ ...config, width: grid.width, height: grid.height, seed });
    world.install(grid);
    world.generationCount = generation;
    return world;
  }

  get width() {
    return this.buffer.width;
  }

  get height() {
    return this.buffer.height;
  }

  get seed() {
    return this.buffer.seed;
  }

  get generation() {
    return this.generationCount;
  }

  /** Resolved construction settings; `seed` is never -1 here. */
  get config(): WorldConfig {
    return { ...this.settings };
  }

  /** Value a cell takes when killed: `fadeStart` in fade mode, 0 otherwise. */
  get killValue() {
    return this.ruleMode === 'fade' ? this.settings.fadeStart : DEAD;
  }

  step() {
    this.buffer.advance((current, target) => {
      this.counts = this.countNeighbors(current, this.counts);
      return this.applyRules(current, this.counts, target);
    });
    this.generationCount++;
  }

  steps(generations: number) {
    const count = Math.max(0, Math.floor(generations));
    for (let i = 0; i < count; i++) {
      this.step();
    }
    return count;
  }

  isStalemate() {
    return gridsEqual(this.buffer.current, this.buffer.previous);
  }

  // Period 2 only: a fixed point also matches two back and is reported as a stalemate instead.
  isOscillating() {
    return gridsEqual(this.buffer.current, this.buffer.beforePrevious)
      && !gridsEqual(this.buffer.current, this.buffer.previous);
  }

  populate(mode: PopulateMode | string) {
    return this.buffer.populate(mode, this.killValue);
  }

  extend() {
    this.buffer.extend();
  }

  /** Returns false, leaving the grid alone, when either dimension is below 3. */
  reduce() {
    return this.buffer.reduce();
  }

  /** Replaces the grid with `rows`. Seed and generation are kept. */
  load(rows: GridRows) {
    this.install(gridFromRows(rows));
  }

  rows(): number[][] {
    return gridToRows(this.buffer.current);
  }

  exportRows(): number[][] {
    return [...this.rows(), [this.seed], [this.generationCount]];
  }

  snapshot(): WorldSnapshot {
    return {
      width: this.width,
      height: this.height,
      seed: this.seed,
      generation: this.generationCount,
      rows: this.rows()
    };
  }

  population() {
    return countAlive(this.buffer.current);
  }

  getCell(x: number, y: number) {
    return this.buffer.get(x, y);
  }

  /**
   * Drawing sets a cell alive. Erasing turns an alive cell into the kill
   * value and leaves dead or fading cells as they are.
   */
  setCell(x: number, y: number, alive: boolean) {
    const value = this.buffer.get(x, y);
    if (value === null) return false;
    if (alive) return this.buffer.set(x, y, ALIVE);
    if (isAlive(value)) return this.buffer.set(x, y, this.killValue);
    return true;
  }

  toggleCell(x: number, y: number) {
    const value = this.buffer.get(x, y);
    if (value === null) return false;
    return this.setCell(x, y, !isAlive(value));
  }

  private install(grid: CellGrid) {
    if (this.ruleMode === 'binary') {
      const fractional = grid.cells.findIndex(value => value !== DEAD && value !== ALIVE);
      if (fractional >= 0) {
        throw new MalformedGridError(
          `Cell (${fractional % grid.width}, ${Math.floor(fractional / grid.width)}) is fading but fade mode is off.`
        );
      }
    }
    this.buffer.install(grid);
  }
}

function readTrailingInteger(row: ReadonlyArray<number> | undefined, label: string) {
  const value = Array.isArray(row) && row.length > 0 ? row[0] : NaN;
  if (!Number.isInteger(value) || value < 0) {
    throw new MalformedGridError(`Exported ${label} row must hold a non-negative integer, got ${String(value)}.`);
  }
  return value;
}
