import { Injectable } from '@angular/core';
import { BehaviorSubject } from 'rxjs';
import { GridRows } from '../model/cell-grid';
import { PopulateMode, normalizePopulateMode } from '../model/grid-buffer';
import { World, WorldSnapshot } from '../model/world';
import { DEFAULT_WORLD_CONFIG, WorldConfig } from '../model/world-config';
import { WorldConfigService } from './world-config.service';

export type WorldStatus = 'evolving' | 'stalemate' | 'oscillating';

export interface WorldDimensions {
  width: number;
  height: number;
}

/**
 * Holds the active World and publishes its generation, size and stasis state.
 * Run-control requests from a driver or UI go through here.
 */
@Injectable({ providedIn: 'root' })
export class WorldModelService {
  private world: World;
  private generationSubject = new BehaviorSubject<number>(0);
  generation$ = this.generationSubject.asObservable();
  private dimensionsSubject = new BehaviorSubject<WorldDimensions>({ width: 0, height: 0 });
  dimensions$ = this.dimensionsSubject.asObservable();
  private statusSubject = new BehaviorSubject<WorldStatus>('evolving');
  status$ = this.statusSubject.asObservable();

  constructor(private configService: WorldConfigService) {
    this.world = this.buildInitialWorld();
    this.publish();
  }

  createWorld(overrides: Partial<WorldConfig> = {}) {
    const config = { ...this.configService.readWorldConfig(), ...overrides };
    try {
      this.world = new World(config);
    } catch (error) {
      console.error('[WorldModel] Rejected world configuration.', { config, error });
      throw error;
    }
    this.publish();
    return this.world.config;
  }

  /** Restores grid, seed and generation from exported rows. */
  loadRows(rows: GridRows, overrides: Partial<WorldConfig> = {}) {
    const config = { ...this.world.config, ...overrides };
    try {
      this.world = World.fromRows(rows, config);
    } catch (error) {
      console.error('[WorldModel] Failed to restore world from rows.', { rowCount: rows.length, error });
      throw error;
    }
    this.publish();
  }

  /** Replaces only the grid; seed and generation stay. */
  loadGrid(rows: GridRows) {
    try {
      this.world.load(rows);
    } catch (error) {
      console.error('[WorldModel] Failed to load grid rows.', { rowCount: rows.length, error });
      throw error;
    }
    this.publish();
  }

  exportRows() {
    return this.world.exportRows();
  }

  snapshot(): WorldSnapshot {
    return this.world.snapshot();
  }

  step(generations: number = 1) {
    const steps = Math.max(1, Math.floor(Number(generations) || 1));
    this.world.steps(steps);
    this.publish();
    return steps;
  }

  populate(mode: PopulateMode | string) {
    const normalized = normalizePopulateMode(mode);
    if (!normalized) {
      console.error('[WorldModel] Rejected invalid populate mode.', { requested: mode });
      return false;
    }
    this.world.populate(normalized);
    this.publish();
    return true;
  }

  extend() {
    this.world.extend();
    this.publish();
  }

  reduce() {
    const reduced = this.world.reduce();
    if (!reduced) {
      console.info('[WorldModel] Grid is already at its minimum size; reduce skipped.', this.getDimensions());
      return false;
    }
    this.publish();
    return true;
  }

  setCellAlive(x: number, y: number, alive: boolean) {
    const changed = this.world.setCell(x, y, alive);
    if (changed) this.publishStatus();
    return changed;
  }

  toggleCell(x: number, y: number) {
    const changed = this.world.toggleCell(x, y);
    if (changed) this.publishStatus();
    return changed;
  }

  isCellAlive(x: number, y: number) {
    return this.world.getCell(x, y) === 1;
  }

  getCell(x: number, y: number) {
    return this.world.getCell(x, y);
  }

  getRows() {
    return this.world.rows();
  }

  getSeed() {
    return this.world.seed;
  }

  getGeneration() {
    return this.world.generation;
  }

  getDimensions(): WorldDimensions {
    return { width: this.world.width, height: this.world.height };
  }

  getConfig() {
    return this.world.config;
  }

  getPopulation() {
    return this.world.population();
  }

  getStatus() {
    return this.statusSubject.value;
  }

  isStalemate() {
    return this.world.isStalemate();
  }

  isOscillating() {
    return this.world.isOscillating();
  }

  private buildInitialWorld() {
    const config = this.configService.readWorldConfig();
    try {
      return new World(config);
    } catch (error) {
      console.error('[WorldModel] Configured world is invalid; falling back to defaults.', { config, error });
      return new World(DEFAULT_WORLD_CONFIG);
    }
  }

  private publish() {
    this.generationSubject.next(this.world.generation);
    const { width, height } = this.dimensionsSubject.value;
    if (width !== this.world.width || height !== this.world.height) {
      this.dimensionsSubject.next(this.getDimensions());
    }
    this.publishStatus();
  }

  private publishStatus() {
    const status: WorldStatus = this.world.isStalemate()
      ? 'stalemate'
      : this.world.isOscillating() ? 'oscillating' : 'evolving';
    if (status !== this.statusSubject.value) {
      this.statusSubject.next(status);
    }
  }
}
