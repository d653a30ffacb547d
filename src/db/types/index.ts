export * from './enums.js';
export * from './inventory.js';
export * from './player.js';
export * from './npc.js';
export * from './memory-types.js';
export * from './quest.js';
export * from './world-state.js';
export * from './game-state.js';
export * from './effect.js';
export * from './save-snapshot.js';
