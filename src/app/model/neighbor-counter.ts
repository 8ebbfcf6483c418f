import { CellGrid, isAlive } from './cell-grid';

export type Topology = 'bounded' | 'toroidal';

/** Returns one count in [0, 8] per cell, reusing `target` when it has the right length. */
export type NeighborCounter = (grid: CellGrid, target?: Uint8Array) => Uint8Array;

// Fading values (< 1.0) count as dead.
export function countBoundedNeighbors(grid: CellGrid, target?: Uint8Array): Uint8Array {
  const { width, height, cells } = grid;
  const counts = prepareTarget(target, cells.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let count = 0;
      for (let dy = -1; dy <= 1; dy++) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (let dx = -1; dx <= 1; dx++) {
          if (dx === 0 && dy === 0) continue;
          const nx = x + dx;
          if (nx < 0 || nx >= width) continue;
          if (isAlive(cells[ny * width + nx])) count++;
        }
      }
      counts[y * width + x] = count;
    }
  }
  return counts;
}

/**
 * Edges wrap to the opposite side. On tiny grids the wrapped offsets land on
 * the same cell more than once and each hit counts: an alive 1x1 grid sees
 * itself as all 8 neighbors.
 */
export function countToroidalNeighbors(grid: CellGrid, target?: Uint8Array): Uint8Array {
  const { width, height, cells } = grid;
  const counts = prepareTarget(target, cells.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let count = 0;
      for (let dy = -1; dy <= 1; dy++) {
        const row = wrap(y + dy, height) * width;
        for (let dx = -1; dx <= 1; dx++) {
          if (dx === 0 && dy === 0) continue;
          if (isAlive(cells[row + wrap(x + dx, width)])) count++;
        }
      }
      counts[y * width + x] = count;
    }
  }
  return counts;
}

export function neighborCounterFor(topology: Topology): NeighborCounter {
  switch (topology) {
    case 'toroidal':
      return countToroidalNeighbors;
    case 'bounded':
      return countBoundedNeighbors;
  }
}

function wrap(value: number, size: number) {
  return ((value % size) + size) % size;
}

function prepareTarget(target: Uint8Array | undefined, length: number) {
  return target && target.length === length ? target : new Uint8Array(length);
}
