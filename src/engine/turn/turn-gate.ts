import { TurnConflictError } from '../../common/errors/game-errors.js';
import type { TurnConcurrencyPolicy } from '../engine-config.service.js';

interface Waiter {
  start: () => void;
  reject: (err: Error) => void;
}

/** Settles when the task holding the gate has finished. */
interface Holder {
  released: Promise<void>;
  release: () => void;
}

function newHolder(): Holder {
  let release: () => void = () => undefined;
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { released, release };
}

/**
 * Serializes turns of one session. At most one task runs at a time; others
 * wait in FIFO order or are turned away, depending on the policy.
 */
export class TurnGate {
  private holder: Holder | null = null;
  private readonly waiting: Waiter[] = [];

  get inFlight(): boolean {
    return this.holder !== null;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>, policy: TurnConcurrencyPolicy = 'queue'): Promise<T> {
    if (this.holder) {
      if (policy === 'reject') {
        throw new TurnConflictError('TURN_IN_PROGRESS', 'A turn is already being processed');
      }
      // release() installs this waiter's holder before starting it
      await new Promise<void>((resolve, reject) => {
        this.waiting.push({ start: resolve, reject });
      });
    } else {
      this.holder = newHolder();
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Rejects every queued task with TURN_CANCELLED, then waits for the one
   * holding the gate to settle, including one handed the gate that has not
   * started yet. Resolves with the number of tasks cancelled.
   */
  async cancelPending(): Promise<number> {
    const cancelled = this.waiting.splice(0);
    for (const waiter of cancelled) {
      waiter.reject(new TurnConflictError('TURN_CANCELLED', 'Turn cancelled before it started'));
    }
    const current = this.holder;
    if (current) {
      await current.released;
    }
    return cancelled.length;
  }

  private release(): void {
    const finished = this.holder;
    const next = this.waiting.shift();
    this.holder = next ? newHolder() : null;
    finished?.release();
    next?.start();
  }
}
