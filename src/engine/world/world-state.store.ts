import type { GameState } from '../../db/types/index.js';
import { InternalError } from '../../common/errors/game-errors.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Owns one session's GameState. Readers get a frozen view; the only way to
 * change it is `commit`, with the next version, from a working copy.
 */
export class WorldStateStore {
  private state: GameState;

  constructor(initial: GameState) {
    this.state = deepFreeze(structuredClone(initial));
  }

  get version(): number {
    return this.state.world.version;
  }

  /** Frozen; mutating it throws. */
  read(): GameState {
    return this.state;
  }

  /** A mutable deep copy to apply a turn against. */
  workingCopy(): GameState {
    return structuredClone(this.state);
  }

  /**
   * Atomically replaces the state. `baseVersion` is the version the working
   * copy was taken from; `next` must carry exactly baseVersion + 1.
   */
  commit(next: GameState, baseVersion: number): void {
    if (baseVersion !== this.state.world.version) {
      throw new InternalError('Stale working copy', {
        baseVersion,
        currentVersion: this.state.world.version,
      });
    }
    if (next.world.version !== baseVersion + 1) {
      throw new InternalError('Commit must advance the version by exactly one', {
        baseVersion,
        nextVersion: next.world.version,
      });
    }
    this.state = deepFreeze(structuredClone(next));
  }

  /** Swaps in a restored save. Used only by the load path, inside the turn gate. */
  restore(state: GameState): void {
    this.state = deepFreeze(structuredClone(state));
  }
}
