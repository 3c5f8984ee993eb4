export * from './enums.js';
export * from './effect-bundle.js';
export * from './world-state.js';
export * from './sim-config.js';
export * from './catalog.js';
export * from './turn-report.js';
