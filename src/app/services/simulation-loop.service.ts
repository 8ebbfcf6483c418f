import { Injectable, OnDestroy } from '@angular/core';
import { BehaviorSubject, Subject } from 'rxjs';
import { LoopSettings, WorldConfigService } from './world-config.service';
import { WorldModelService } from './world-model.service';

export type StasisReason = 'stalemate' | 'oscillation';

export interface StasisEvent {
  reason: StasisReason;
  generation: number;
  population: number;
}

export interface SimulationLoopConfig extends LoopSettings {
  onError?: (error: unknown) => void;
}

const MIN_TICK_RATE = 0.1;
const MAX_TICK_RATE = 1000;

/**
 * Drives the world model on a timer, one generation per tick. Optionally
 * stops itself once the world reaches a stalemate or a period-2 oscillation.
 */
@Injectable({ providedIn: 'root' })
export class SimulationLoopService implements OnDestroy {
  private config: SimulationLoopConfig | null = null;
  private timerId: ReturnType<typeof setTimeout> | null = null;
  private runningSubject = new BehaviorSubject<boolean>(false);
  readonly running$ = this.runningSubject.asObservable();
  private stasisSubject = new Subject<StasisEvent>();
  readonly stasis$ = this.stasisSubject.asObservable();

  constructor(
    private model: WorldModelService,
    private configService: WorldConfigService
  ) {}

  ngOnDestroy() {
    this.stop();
    this.stasisSubject.complete();
  }

  start(overrides: Partial<SimulationLoopConfig> = {}) {
    this.stop();
    this.config = { ...this.configService.readLoopSettings(), ...overrides };
    this.runningSubject.next(true);
    this.scheduleNextTick();
  }

  stop() {
    if (this.timerId !== null) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    if (this.runningSubject.value) {
      this.runningSubject.next(false);
    }
  }

  isRunning() {
    return this.runningSubject.value;
  }

  getTickIntervalMs() {
    return tickIntervalMs(this.config ? this.config.tickRate : this.configService.readLoopSettings().tickRate);
  }

  private scheduleNextTick() {
    if (!this.isRunning() || !this.config) return;
    this.timerId = setTimeout(() => this.onTick(), tickIntervalMs(this.config.tickRate));
  }

  private onTick() {
    this.timerId = null;
    const config = this.config;
    if (!this.isRunning() || !config) return;

    try {
      this.model.step(1);
    } catch (error) {
      this.stop();
      if (config.onError) {
        config.onError(error);
      } else {
        console.error('[SimulationLoop] Generation step failed; loop stopped.', error);
      }
      return;
    }

    const reason = detectStasis(this.model, config);
    if (reason) {
      this.stop();
      const event: StasisEvent = {
        reason,
        generation: this.model.getGeneration(),
        population: this.model.getPopulation()
      };
      console.info(`[SimulationLoop] Paused on ${reason}.`, event);
      this.stasisSubject.next(event);
      return;
    }

    this.scheduleNextTick();
  }
}

function detectStasis(model: WorldModelService, config: LoopSettings): StasisReason | null {
  if (config.pauseOnStalemate && model.isStalemate()) return 'stalemate';
  if (config.pauseOnOscillation && model.isOscillating()) return 'oscillation';
  return null;
}

function tickIntervalMs(tickRate: number) {
  const rate = clamp(Number(tickRate), MIN_TICK_RATE, MAX_TICK_RATE);
  return Math.max(1, Math.floor(1000 / rate));
}

function clamp(value: number, min: number, max: number) {
  const normalized = Number.isFinite(value) ? value : min;
  return Math.min(max, Math.max(min, normalized));
}
