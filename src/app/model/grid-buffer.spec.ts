import { createGrid, gridToRows, gridsEqual } from './cell-grid';
import { GridBuffer, normalizePopulateMode } from './grid-buffer';
import { InvalidDimensionsError, MalformedGridError } from './world-errors';

describe('GridBuffer', () => {
  it('rejects non-positive dimensions', () => {
    expect(() => GridBuffer.create(0, 4, 1)).toThrowError(InvalidDimensionsError);
    expect(() => GridBuffer.create(4, -2, 1)).toThrowError(InvalidDimensionsError);
  });

  it('fills the same grid for the same seed', () => {
    const a = GridBuffer.create(12, 9, 4242);
    const b = GridBuffer.create(12, 9, 4242);

    expect(gridsEqual(a.current, b.current)).toBeTrue();
    expect(Array.from(a.current.cells).every(value => value === 0 || value === 1)).toBeTrue();
  });

  it('keeps roughly a quarter of seeded cells alive', () => {
    const buffer = GridBuffer.create(100, 100, 7);
    const alive = Array.from(buffer.current.cells).filter(value => value === 1).length;

    expect(alive).toBeGreaterThan(2000);
    expect(alive).toBeLessThan(3000);
  });

  it('resolves the -1 seed to a concrete value', () => {
    const buffer = GridBuffer.create(3, 3, -1);
    expect(buffer.seed).toBeGreaterThanOrEqual(0);
    expect(Number.isInteger(buffer.seed)).toBeTrue();
  });

  it('repopulates from the stored seed', () => {
    const buffer = GridBuffer.create(10, 10, 99);
    const original = gridToRows(buffer.current);

    buffer.populate('dead');
    expect(buffer.populate('seed')).toBeTrue();
    expect(gridToRows(buffer.current)).toEqual(original);
  });

  it('supports alive, dead and kill modes', () => {
    const buffer = GridBuffer.fromGrid(createGrid(2, 1), 1);

    buffer.populate('all-alive');
    expect(gridToRows(buffer.current)).toEqual([[1, 1]]);

    buffer.set(1, 0, 0.3);
    buffer.populate('kill', 0.5);
    expect(gridToRows(buffer.current)).toEqual([[0.5, 0.3]]);

    buffer.populate('all-dead');
    expect(gridToRows(buffer.current)).toEqual([[0, 0]]);
  });

  it('reports unknown populate modes without touching the grid', () => {
    const buffer = GridBuffer.create(4, 4, 3);
    const before = gridToRows(buffer.current);

    expect(buffer.populate('sideways')).toBeFalse();
    expect(gridToRows(buffer.current)).toEqual(before);
    expect(normalizePopulateMode(' All-Dead ')).toBe('dead');
    expect(normalizePopulateMode('constructor')).toBeNull();
  });

  it('leaves the grid untouched when a load fails', () => {
    const buffer = GridBuffer.create(3, 3, 5);
    const before = gridToRows(buffer.current);

    expect(() => buffer.load([[0, 1], [1, 0, 1]])).toThrowError(MalformedGridError);
    expect(gridToRows(buffer.current)).toEqual(before);

    buffer.load([[1, 0], [0, 1]]);
    expect(buffer.width).toBe(2);
    expect(buffer.height).toBe(2);
  });

  it('grows and shrinks by one ring per call', () => {
    const buffer = GridBuffer.fromGrid(createGrid(3, 2, 1), 1);

    buffer.extend();
    expect(buffer.width).toBe(5);
    expect(buffer.height).toBe(4);
    expect(gridToRows(buffer.current)[0]).toEqual([0, 0, 0, 0, 0]);

    expect(buffer.reduce()).toBeTrue();
    expect(gridToRows(buffer.current)).toEqual([[1, 1, 1], [1, 1, 1]]);

    expect(buffer.reduce()).toBeFalse();
    expect(buffer.width).toBe(3);
    expect(buffer.height).toBe(2);
  });

  it('rotates history without aliasing the current grid', () => {
    const buffer = GridBuffer.fromGrid(createGrid(2, 2, 1), 1);
    const first = buffer.current;

    buffer.advance((_current, target) => {
      target.cells.fill(0.5);
      return target;
    });
    expect(buffer.previous).toBe(first);
    expect(buffer.beforePrevious).toBeNull();

    const second = buffer.current;
    buffer.advance((_current, target) => {
      target.cells.fill(0);
      return target;
    });
    expect(buffer.previous).toBe(second);
    expect(buffer.beforePrevious).toBe(first);
    expect(buffer.current).not.toBe(first);
    expect(buffer.current).not.toBe(second);
  });

  it('keeps history intact when computing the next generation fails', () => {
    const buffer = GridBuffer.fromGrid(createGrid(2, 2, 1), 1);
    const current = buffer.current;

    expect(() => buffer.advance(() => {
      throw new Error('boom');
    })).toThrowError('boom');
    expect(() => buffer.advance(grid => grid)).toThrowError(MalformedGridError);
    expect(buffer.current).toBe(current);
    expect(buffer.previous).toBeNull();
  });

  it('ignores out-of-range coordinates and rejects out-of-range values', () => {
    const buffer = GridBuffer.fromGrid(createGrid(2, 2), 1);

    expect(buffer.get(2, 0)).toBeNull();
    expect(buffer.set(-1, 0, 1)).toBeFalse();
    expect(() => buffer.set(0, 0, 2)).toThrowError(MalformedGridError);
    expect(buffer.set(1, 1, 1)).toBeTrue();
    expect(buffer.get(1, 1)).toBe(1);
  });
});
