import { InvalidDimensionsError, MalformedGridError } from './world-errors';

export const ALIVE = 1.0;
export const DEAD = 0.0;

/**
 * Dense row-major grid of cell values in [0, 1]. Cell (x, y) lives at
 * `cells[y * width + x]`.
 */
export interface CellGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: Float64Array;
}

export type GridRows = ReadonlyArray<ReadonlyArray<number>>;

export function isAlive(value: number) {
  return value >= ALIVE;
}

export function assertDimensions(width: number, height: number) {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(width, height);
  }
}

export function createGrid(width: number, height: number, fill: number = DEAD): CellGrid {
  assertDimensions(width, height);
  const cells = new Float64Array(width * height);
  if (fill !== 0) cells.fill(fill);
  return { width, height, cells };
}

export function cloneGrid(grid: CellGrid): CellGrid {
  return { width: grid.width, height: grid.height, cells: grid.cells.slice() };
}

export function sameShape(a: CellGrid, b: CellGrid) {
  return a.width === b.width && a.height === b.height;
}

export function gridsEqual(a: CellGrid | null, b: CellGrid | null) {
  if (!a || !b) return false;
  if (!sameShape(a, b)) return false;
  for (let i = 0; i < a.cells.length; i++) {
    if (a.cells[i] !== b.cells[i]) return false;
  }
  return true;
}

export function countAlive(grid: CellGrid) {
  let alive = 0;
  for (let i = 0; i < grid.cells.length; i++) {
    if (isAlive(grid.cells[i])) alive++;
  }
  return alive;
}

export function gridFromRows(rows: GridRows): CellGrid {
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new MalformedGridError('Grid rows are empty.');
  }
  const height = rows.length;
  const firstRow = rows[0];
  const width = Array.isArray(firstRow) ? firstRow.length : 0;
  if (width === 0) {
    throw new MalformedGridError('Grid row 0 is empty.');
  }

  const cells = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = rows[y];
    if (!Array.isArray(row) || row.length !== width) {
      throw new MalformedGridError(`Grid row ${y} has ${Array.isArray(row) ? row.length : 0} cells, expected ${width}.`);
    }
    for (let x = 0; x < width; x++) {
      const value = row[x];
      if (typeof value !== 'number' || !Number.isFinite(value) || value < DEAD || value > ALIVE) {
        throw new MalformedGridError(`Cell (${x}, ${y}) is out of range: ${String(value)}.`);
      }
      cells[y * width + x] = value;
    }
  }
  return { width, height, cells };
}

export function gridToRows(grid: CellGrid): number[][] {
  const rows: number[][] = [];
  for (let y = 0; y < grid.height; y++) {
    const start = y * grid.width;
    rows.push(Array.from(grid.cells.subarray(start, start + grid.width)));
  }
  return rows;
}

export function padGrid(grid: CellGrid): CellGrid {
  const width = grid.width + 2;
  const padded = createGrid(width, grid.height + 2);
  for (let y = 0; y < grid.height; y++) {
    const start = y * grid.width;
    padded.cells.set(grid.cells.subarray(start, start + grid.width), (y + 1) * width + 1);
  }
  return padded;
}

/** Strips the outer ring. Returns null when either dimension is below 3. */
export function cropGrid(grid: CellGrid): CellGrid | null {
  if (grid.width < 3 || grid.height < 3) return null;
  const width = grid.width - 2;
  const cropped = createGrid(width, grid.height - 2);
  for (let y = 0; y < cropped.height; y++) {
    const start = (y + 1) * grid.width + 1;
    cropped.cells.set(grid.cells.subarray(start, start + width), y * width);
  }
  return cropped;
}
