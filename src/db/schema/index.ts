export { aiTurnLogs } from './ai-turn-logs.js';
export { saveSnapshots } from './save-snapshots.js';
