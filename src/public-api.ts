export * from './app/model/world-errors';
export * from './app/model/cell-grid';
export * from './app/model/rng';
export * from './app/model/grid-buffer';
export * from './app/model/neighbor-counter';
export * from './app/model/rule-engine';
export * from './app/model/world-config';
export * from './app/model/world';
export * from './app/services/world-config.service';
export * from './app/services/world-model.service';
export * from './app/services/simulation-loop.service';
