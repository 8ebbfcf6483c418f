import { createGrid, gridFromRows } from './cell-grid';
import { FadeParameters, applyBinaryRules, applyFadeRules, ruleEngineFor } from './rule-engine';
import { MalformedGridError } from './world-errors';

function single(value: number) {
  return gridFromRows([[value]]);
}

function counts(...values: number[]) {
  return Uint8Array.from(values);
}

describe('binary rules', () => {
  it('brings any cell with exactly three neighbors to life', () => {
    expect(applyBinaryRules(single(0), counts(3)).cells[0]).toBe(1);
    expect(applyBinaryRules(single(1), counts(3)).cells[0]).toBe(1);
  });

  it('keeps a live cell with two neighbors and leaves a dead one dead', () => {
    expect(applyBinaryRules(single(1), counts(2)).cells[0]).toBe(1);
    expect(applyBinaryRules(single(0), counts(2)).cells[0]).toBe(0);
  });

  it('kills live cells with 0, 1 or 4 to 8 neighbors', () => {
    for (const count of [0, 1, 4, 5, 6, 7, 8]) {
      expect(applyBinaryRules(single(1), counts(count)).cells[0])
        .withContext(`count ${count}`)
        .toBe(0);
    }
  });

  it('writes to a new grid without touching the input', () => {
    const grid = gridFromRows([[1, 1, 0]]);
    const next = applyBinaryRules(grid, counts(1, 2, 3));

    expect(next).not.toBe(grid);
    expect(Array.from(grid.cells)).toEqual([1, 1, 0]);
    expect(Array.from(next.cells)).toEqual([0, 1, 1]);
  });

  it('rejects counts that do not match the grid', () => {
    expect(() => applyBinaryRules(createGrid(2, 2), counts(0, 0))).toThrowError(MalformedGridError);
  });
});

describe('fade rules', () => {
  const params: FadeParameters = { fadeRate: 0.1, fadeStart: 0.5 };

  it('starts a dying cell at fadeStart instead of zero', () => {
    for (const count of [0, 1, 4, 8]) {
      expect(applyFadeRules(single(1), counts(count), params).cells[0]).toBe(0.5);
    }
    expect(applyFadeRules(single(1), counts(2), params).cells[0]).toBe(1);
  });

  it('revives a fading cell with exactly three neighbors', () => {
    expect(applyFadeRules(single(0.2), counts(3), params).cells[0]).toBe(1);
    expect(applyFadeRules(single(0), counts(3), params).cells[0]).toBe(1);
  });

  it('decays fading cells by fadeRate and snaps tiny values to zero', () => {
    expect(applyFadeRules(single(0.5), counts(2), params).cells[0]).toBe(0.4);
    expect(applyFadeRules(single(0.05), counts(0), params).cells[0]).toBe(0);
    expect(applyFadeRules(single(0), counts(0), params).cells[0]).toBe(0);
  });

  it('reaches exactly zero within ceil(fadeStart / fadeRate) generations', () => {
    const cases: FadeParameters[] = [
      { fadeRate: 0.1, fadeStart: 0.5 },
      { fadeRate: 0.25, fadeStart: 0.75 },
      { fadeRate: 0.01, fadeStart: 0.5 },
      { fadeRate: 0.3, fadeStart: 0.7 }
    ];
    for (const fade of cases) {
      let grid = applyFadeRules(single(1), counts(0), fade);
      expect(grid.cells[0]).toBe(fade.fadeStart);

      const limit = Math.ceil(fade.fadeStart / fade.fadeRate);
      let generations = 0;
      while (grid.cells[0] !== 0 && generations < limit + 1) {
        grid = applyFadeRules(grid, counts(0), fade);
        expect(grid.cells[0]).toBeGreaterThanOrEqual(0);
        generations++;
      }
      expect(grid.cells[0]).withContext(JSON.stringify(fade)).toBe(0);
      expect(generations).toBeLessThanOrEqual(limit);
    }
  });

  it('is selected by rule mode', () => {
    const fade = ruleEngineFor('fade', params);
    const binary = ruleEngineFor('binary', params);

    expect(fade(single(1), counts(0)).cells[0]).toBe(0.5);
    expect(binary(single(1), counts(0)).cells[0]).toBe(0);
  });
});
