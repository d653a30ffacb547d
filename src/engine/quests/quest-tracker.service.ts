// Quest Tracker: lifecycle transitions and objective checks over a GameState

import { Injectable } from '@nestjs/common';
import type {
  GameState,
  ObjectivePredicate,
  Quest,
  QuestState,
} from '../../db/types/index.js';
import { countOf } from '../../db/types/index.js';
import { InternalError } from '../../common/errors/game-errors.js';
import { normalizeName } from '../../common/text-utils.js';
import { assertTransition } from './quest-state-machine.js';

export type ObjectiveStatus = 'SATISFIED' | 'PENDING' | 'UNSATISFIABLE';

export interface QuestChange {
  questId: string;
  from: QuestState;
  to: QuestState;
  reason: string;
}

@Injectable()
export class QuestTrackerService {
  /**
   * Checks a quest's objective against authoritative state. The model's
   * claim that a quest is done is never consulted here.
   */
  evaluateObjective(state: GameState, quest: Quest): ObjectiveStatus {
    return this.evaluate(state, quest);
  }

  /**
   * Moves a quest along a legal edge on `draft`. Throws IllegalTransitionError
   * for anything the state machine does not allow.
   */
  transition(draft: GameState, questId: string, to: QuestState, version: number): QuestChange {
    const quest = draft.quests[questId];
    if (!quest) {
      throw new InternalError(`Transition on unknown quest "${questId}"`);
    }
    const from = quest.state;
    assertTransition(questId, from, to);
    quest.state = to;
    quest.updatedAtVersion = version;
    if (to === 'Active') {
      quest.activatedAtVersion = version;
      if (quest.objective.type === 'DELIVER_ITEM') {
        const recipient = draft.npcs[quest.objective.npcId];
        quest.deliveryBaseline = recipient ? countOf(recipient.inventory, quest.objective.itemId) : 0;
      }
    }
    return { questId, from, to, reason: 'proposed' };
  }

  /**
   * Fails every active quest whose objective can no longer be met, e.g. when
   * the NPC it depends on was deactivated during this turn.
   */
  reconcile(draft: GameState, version: number): QuestChange[] {
    const changes: QuestChange[] = [];
    for (const quest of Object.values(draft.quests)) {
      if (quest.state !== 'Active') continue;
      if (this.evaluateObjective(draft, quest) !== 'UNSATISFIABLE') continue;
      const change = this.transition(draft, quest.questId, 'Failed', version);
      changes.push({ ...change, reason: 'objective unsatisfiable' });
    }
    return changes;
  }

  active(state: GameState): Quest[] {
    return this.sorted(state).filter((q) => q.state === 'Active');
  }

  /** Offered and terminal quests, oldest update first. */
  inactive(state: GameState): Quest[] {
    return this.sorted(state).filter((q) => q.state !== 'Active');
  }

  journal(state: GameState): Quest[] {
    return this.sorted(state);
  }

  /** Finds a quest by exact id or by words of its summary. */
  find(state: GameState, query: string, states?: readonly QuestState[]): Quest | undefined {
    const q = normalizeName(query);
    if (!q) return undefined;
    const pool = this.sorted(state).filter((quest) => !states || states.includes(quest.state));
    return (
      pool.find((quest) => normalizeName(quest.questId) === q) ??
      pool.find((quest) => normalizeName(quest.summary).includes(q))
    );
  }

  describeObjective(objective: ObjectivePredicate): string {
    switch (objective.type) {
      case 'DELIVER_ITEM':
        return `deliver ${objective.itemId} to ${objective.npcId}`;
      case 'OBTAIN_ITEM':
        return `obtain ${objective.itemId}`;
      case 'DEFEAT_NPC':
        return `defeat ${objective.npcId}`;
      case 'TALK_TO_NPC':
        return `speak with ${objective.npcId}`;
      case 'REACH_LOCATION':
        return `reach ${objective.locationId}`;
      case 'SET_FLAG':
        return `bring about "${objective.flag}"`;
    }
  }

  private evaluate(state: GameState, quest: Quest): ObjectiveStatus {
    const { objective } = quest;
    const since = quest.activatedAtVersion ?? quest.offeredAtVersion;
    switch (objective.type) {
      case 'DELIVER_ITEM': {
        // only items handed over after the quest began count
        const npc = state.npcs[objective.npcId];
        if (npc && countOf(npc.inventory, objective.itemId) > (quest.deliveryBaseline ?? 0)) return 'SATISFIED';
        if (!npc || !npc.active) return 'UNSATISFIABLE';
        return 'PENDING';
      }
      case 'OBTAIN_ITEM':
        return countOf(state.player.inventory, objective.itemId) > 0 ? 'SATISFIED' : 'PENDING';
      case 'DEFEAT_NPC': {
        const npc = state.npcs[objective.npcId];
        return npc && !npc.active ? 'SATISFIED' : 'PENDING';
      }
      case 'TALK_TO_NPC': {
        const memory = state.memories[objective.npcId];
        const spoke = memory?.turns.some((t) => t.speaker === 'npc' && t.worldVersion >= since) ?? false;
        if (spoke) return 'SATISFIED';
        const npc = state.npcs[objective.npcId];
        if (!npc || !npc.active) return 'UNSATISFIABLE';
        return 'PENDING';
      }
      case 'REACH_LOCATION':
        return state.player.locationId === objective.locationId ? 'SATISFIED' : 'PENDING';
      case 'SET_FLAG':
        return state.world.flags.includes(objective.flag) ? 'SATISFIED' : 'PENDING';
    }
  }

  private sorted(state: GameState): Quest[] {
    return Object.values(state.quests).sort(
      (a, b) => a.updatedAtVersion - b.updatedAtVersion || a.questId.localeCompare(b.questId),
    );
  }
}
