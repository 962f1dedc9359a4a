export * from './enums.js';
export * from './stats.js';
export * from './combatant.js';
export * from './battle-state.js';
export * from './game-state.js';
export * from './battle-events.js';
