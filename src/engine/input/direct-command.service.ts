import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { EngineConfigService } from '../engine-config.service.js';
import { QuestTrackerService } from '../quests/quest-tracker.service.js';
import type { EffectIntent, EffectProposal, GameState, LocationState, NpcState } from '../../db/types/index.js';
import { dispositionLabel } from '../../db/types/index.js';
import { normalizeName } from '../../common/text-utils.js';
import type { ParsedCommand, ReadCommandType, TargetCommandType } from './command-parser.service.js';

export type DirectOutcome =
  | { type: 'READ'; narration: string }
  | { type: 'PROPOSAL'; proposal: EffectProposal }
  | { type: 'SAVE' }
  | { type: 'REJECTED'; narration: string };

type DirectCommand = Exclude<ParsedCommand, { type: 'NARRATIVE' }>;

/**
 * Commands the engine answers without the model. Read-only ones render
 * text; mutating ones become deterministic proposals for the Event Applier.
 */
@Injectable()
export class DirectCommandService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly quests: QuestTrackerService,
    private readonly engineConfig: EngineConfigService,
  ) {}

  execute(state: GameState, command: DirectCommand): DirectOutcome {
    switch (command.type) {
      case 'LOOK':
      case 'INVENTORY':
      case 'JOURNAL':
      case 'HELP':
      case 'SAVE':
        return this.read(state, command.type);
      case 'MOVE':
      case 'ACCEPT':
      case 'DECLINE':
      case 'ABANDON':
        return this.mutate(state, command.type, command.target);
      case 'ATTACK':
        return this.attack(state, command.target);
      case 'TRADE':
        return this.trade(state, command.target);
    }
  }

  describeLocation(state: GameState): string {
    const location = state.locations[state.world.currentLocationId];
    if (!location) return 'You are nowhere in particular.';

    const lines = [`${location.name}. ${location.description}`];
    const present = Object.values(state.npcs).filter(
      (n) => n.active && n.locationId === location.locationId,
    );
    if (present.length > 0) {
      lines.push(
        `Here: ${present.map((n) => `${n.name} (${dispositionLabel(n.disposition)})`).join(', ')}.`,
      );
    }
    const exits = location.exits.map((id) => state.locations[id]?.name ?? id);
    lines.push(exits.length > 0 ? `Exits: ${exits.join(', ')}.` : 'There is no way onward.');
    return lines.join('\n');
  }

  private read(state: GameState, type: ReadCommandType): DirectOutcome {
    switch (type) {
      case 'LOOK':
        return { type: 'READ', narration: this.describeLocation(state) };
      case 'INVENTORY': {
        const entries = Object.entries(state.player.inventory);
        if (entries.length === 0) return { type: 'READ', narration: 'You carry nothing.' };
        const lines = entries.map(([itemId, count]) => `${count} x ${state.items[itemId]?.name ?? itemId}`);
        return { type: 'READ', narration: `You carry:\n${lines.join('\n')}` };
      }
      case 'JOURNAL': {
        const quests = this.quests.journal(state);
        if (quests.length === 0) return { type: 'READ', narration: 'Your journal is empty.' };
        const lines = quests.map(
          (q) => `[${q.state}] ${q.summary} (${this.quests.describeObjective(q.objective)})`,
        );
        return { type: 'READ', narration: lines.join('\n') };
      }
      case 'HELP':
        return { type: 'READ', narration: this.content.getNarration().help };
      case 'SAVE':
        return { type: 'SAVE' };
    }
  }

  /**
   * One exchange of blows: the player deals their strength in damage and an
   * NPC left standing strikes back with its own.
   */
  private attack(state: GameState, target: string): DirectOutcome {
    const npc = this.findNpcHere(state, target);
    if (!npc) return { type: 'REJECTED', narration: 'There is no one like that here.' };

    const damage = Math.max(1, state.player.stats.strength ?? 1);
    const effects: EffectIntent[] = [{ kind: 'ModifyNpcHealth', npcId: npc.npcId, delta: -damage }];
    const lines = [`You strike ${npc.name} for ${damage} damage.`];
    if (damage >= npc.health) {
      lines.push(`${npc.name} falls.`);
    } else if (npc.strength > 0) {
      effects.push({ kind: 'ModifyStat', stat: 'health', delta: -npc.strength });
      lines.push(`${npc.name} strikes back for ${npc.strength} damage.`);
    }
    return { type: 'PROPOSAL', proposal: { narration: lines.join(' '), effects } };
  }

  /** A merchant sells a healing draught, drunk on the spot. */
  private trade(state: GameState, target: string): DirectOutcome {
    const npc = this.findNpcHere(state, target);
    if (!npc || npc.role !== 'merchant') {
      return { type: 'REJECTED', narration: 'There is no merchant like that here.' };
    }
    const { tradePrice, tradeHeal } = this.engineConfig.get();
    const gold = state.player.stats.gold ?? 0;
    if (gold < tradePrice) {
      return {
        type: 'REJECTED',
        narration: `${npc.name} wants ${tradePrice} gold for a healing draught. You have ${gold}.`,
      };
    }
    return {
      type: 'PROPOSAL',
      proposal: {
        narration: `You pay ${npc.name} ${tradePrice} gold for a healing draught and drink it down.`,
        effects: [
          { kind: 'ModifyStat', stat: 'gold', delta: -tradePrice },
          { kind: 'ModifyStat', stat: 'health', delta: tradeHeal },
        ],
      },
    };
  }

  private mutate(state: GameState, type: Exclude<TargetCommandType, 'ATTACK' | 'TRADE'>, target: string): DirectOutcome {
    const narration = this.content.getNarration();

    if (type === 'MOVE') {
      const destination = this.findExit(state, target);
      if (!destination) return { type: 'REJECTED', narration: narration.unknownExit };
      return {
        type: 'PROPOSAL',
        proposal: {
          narration: `You make your way to ${destination.name}.`,
          effects: [{ kind: 'MovePlayer', locationId: destination.locationId }],
        },
      };
    }

    const from = type === 'ABANDON' ? 'Active' : 'Offered';
    const quest = this.quests.find(state, target, [from]);
    if (!quest) return { type: 'REJECTED', narration: narration.noSuchQuest };

    const to = type === 'ACCEPT' ? 'Active' : 'Abandoned';
    const verb = { ACCEPT: 'take on', DECLINE: 'turn down', ABANDON: 'give up on' }[type];
    return {
      type: 'PROPOSAL',
      proposal: {
        narration: `You ${verb} the task: ${quest.summary}`,
        effects: [{ kind: 'AdvanceQuest', questId: quest.questId, to }],
      },
    };
  }

  private findNpcHere(state: GameState, target: string): NpcState | undefined {
    const here = Object.values(state.npcs).filter(
      (n) => n.active && n.locationId === state.world.currentLocationId,
    );
    return (
      here.find((n) => normalizeName(n.npcId) === target) ??
      here.find((n) => normalizeName(n.name) === target) ??
      here.find((n) => normalizeName(n.name).includes(target))
    );
  }

  private findExit(state: GameState, target: string): LocationState | undefined {
    const here = state.locations[state.world.currentLocationId];
    if (!here) return undefined;
    const exits = here.exits
      .map((id) => state.locations[id])
      .filter((loc): loc is LocationState => loc !== undefined);
    return (
      exits.find((loc) => normalizeName(loc.locationId) === target) ??
      exits.find((loc) => normalizeName(loc.name) === target) ??
      exits.find((loc) => normalizeName(loc.name).includes(target))
    );
  }
}
