import type { QuestState } from '../../db/types/index.js';
import { IllegalTransitionError } from '../../common/errors/game-errors.js';

const TRANSITIONS: Readonly<Record<QuestState, readonly QuestState[]>> = {
  Undiscovered: ['Offered'],
  Offered: ['Active', 'Abandoned'],
  Active: ['Completed', 'Failed', 'Abandoned'],
  Completed: [],
  Failed: [],
  Abandoned: [],
};

export function canTransition(from: QuestState, to: QuestState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: QuestState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function assertTransition(questId: string, from: QuestState, to: QuestState): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(
      `Quest "${questId}" cannot move from ${from} to ${to}`,
      { questId, from, to, allowed: [...TRANSITIONS[from]] },
    );
  }
}
