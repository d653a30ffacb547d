// Event Applier: the only writer of session state

import { Injectable, Logger } from '@nestjs/common';
import type {
  AppliedEffect,
  EffectIntent,
  EffectOf,
  EffectProposal,
  GameState,
  GameStatus,
  Inventory,
  Quest,
  QuestReward,
} from '../../db/types/index.js';
import { PLAYER_REF, addItem, removeItem } from '../../db/types/index.js';
import { EffectApplicationError } from '../../common/errors/game-errors.js';
import { joinParagraphs } from '../../common/text-utils.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { EngineConfigService, type EngineConfig } from '../engine-config.service.js';
import { NpcMemory } from '../memory/npc-memory.js';
import { QuestTrackerService, type QuestChange } from '../quests/quest-tracker.service.js';
import { assertTransition } from '../quests/quest-state-machine.js';
import type { WorldStateStore } from '../world/world-state.store.js';
import { adjustDifficulty, isDifficultyTurn } from '../world/difficulty.js';
import { pendingResidents, spawnResidents } from '../world/residents.js';

export interface ApplyOptions {
  /** The player's command, remembered by every NPC that answers it. */
  playerUtterance?: string;
  now?: Date;
}

export interface ApplyResult {
  version: number;
  narration: string;
  appliedEffects: AppliedEffect[];
  questChanges: QuestChange[];
  status: GameStatus;
}

interface TurnDraft {
  state: GameState;
  baseVersion: number;
  nextVersion: number;
  config: EngineConfig;
  narration: string[];
  /** NPCs that already have this turn's player utterance in memory */
  heard: Set<string>;
  utterance: string | undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

@Injectable()
export class EffectApplierService {
  private readonly logger = new Logger(EffectApplierService.name);

  constructor(
    private readonly engineConfig: EngineConfigService,
    private readonly quests: QuestTrackerService,
    private readonly content: ContentLoaderService,
  ) {}

  /**
   * Applies every intent, in order, to a working copy of the store's state
   * and commits it as version + 1. If any intent throws, nothing is
   * committed and the store keeps its previous state.
   */
  apply(store: WorldStateStore, proposal: EffectProposal, options: ApplyOptions = {}): ApplyResult {
    const baseVersion = store.version;
    const draft: TurnDraft = {
      state: store.workingCopy(),
      baseVersion,
      nextVersion: baseVersion + 1,
      config: this.engineConfig.get(),
      narration: [proposal.narration],
      heard: new Set<string>(),
      utterance: options.playerUtterance,
    };

    const appliedEffects: AppliedEffect[] = [];
    proposal.effects.forEach((intent, index) => {
      try {
        appliedEffects.push(this.applyIntent(draft, intent));
      } catch (err) {
        this.logger.warn(`Intent #${index} (${intent.kind}) failed, turn discarded`);
        throw err;
      }
    });

    const { state, nextVersion } = draft;
    const questChanges = this.quests.reconcile(state, nextVersion);
    for (const change of questChanges) {
      appliedEffects.push({
        kind: 'AdvanceQuest',
        summary: `Quest ${change.questId} failed: ${change.reason}`,
        honored: true,
      });
    }

    const previousStatus = state.world.status;
    state.world.status = this.deriveStatus(state);
    if (previousStatus === 'PLAYING' && state.world.status !== 'PLAYING') {
      const templates = this.content.getNarration();
      draft.narration.push(state.world.status === 'GAME_OVER' ? templates.gameOver : templates.victory);
    } else if (state.world.status === 'PLAYING' && isDifficultyTurn(nextVersion, draft.config)) {
      const adjustment = adjustDifficulty(state, nextVersion, draft.config);
      draft.narration.push(...adjustment.narration);
      appliedEffects.push(...adjustment.applied);
      if (adjustment.applied.length > 0) {
        this.logger.log(`Difficulty pass at v${nextVersion}: ${adjustment.applied[0].summary}`);
      }
    }

    state.world.version = nextVersion;
    state.world.timestamp = (options.now ?? new Date()).toISOString();
    store.commit(state, baseVersion);

    return {
      version: nextVersion,
      narration: joinParagraphs(draft.narration),
      appliedEffects,
      questChanges,
      status: state.world.status,
    };
  }

  private applyIntent(draft: TurnDraft, intent: EffectIntent): AppliedEffect {
    switch (intent.kind) {
      case 'ModifyDisposition':
        return this.modifyDisposition(draft, intent);
      case 'ModifyStat':
        return this.modifyStat(draft, intent.stat, intent.delta, intent.kind);
      case 'GrantItem': {
        const inventory = this.holderInventory(draft.state, intent.targetId);
        this.requireItem(draft.state, intent.itemId);
        addItem(inventory, intent.itemId, intent.quantity);
        return this.done(intent.kind, `${intent.targetId} gains ${intent.quantity} x ${intent.itemId}`);
      }
      case 'RemoveItem': {
        const inventory = this.holderInventory(draft.state, intent.targetId);
        if (!removeItem(inventory, intent.itemId, intent.quantity)) {
          throw new EffectApplicationError(`${intent.targetId} does not hold ${intent.quantity} x ${intent.itemId}`, {
            targetId: intent.targetId,
            itemId: intent.itemId,
          });
        }
        return this.done(intent.kind, `${intent.targetId} loses ${intent.quantity} x ${intent.itemId}`);
      }
      case 'SetFlag': {
        const flags = draft.state.world.flags;
        if (!flags.includes(intent.flag)) flags.push(intent.flag);
        return this.done(intent.kind, `flag ${intent.flag} set`);
      }
      case 'ClearFlag':
        draft.state.world.flags = draft.state.world.flags.filter((f) => f !== intent.flag);
        return this.done(intent.kind, `flag ${intent.flag} cleared`);
      case 'MovePlayer':
        return this.movePlayer(draft, intent);
      case 'IntroduceNpc':
        return this.introduceNpc(draft, intent);
      case 'IntroduceItem':
        if (draft.state.items[intent.itemId]) {
          throw new EffectApplicationError(`Item ${intent.itemId} already exists`);
        }
        draft.state.items[intent.itemId] = {
          itemId: intent.itemId,
          name: intent.name,
          description: intent.description,
        };
        return this.done(intent.kind, `${intent.name} introduced`);
      case 'DeactivateNpc': {
        const npc = this.requireNpc(draft.state, intent.npcId);
        npc.active = false;
        return this.done(intent.kind, `${npc.name} is gone (${intent.reason})`);
      }
      case 'ModifyNpcHealth':
        return this.modifyNpcHealth(draft, intent);
      case 'OfferQuest':
        return this.offerQuest(draft, intent);
      case 'AdvanceQuest':
        return this.advanceQuest(draft, intent);
      case 'NpcSpeech':
        return this.npcSpeech(draft, intent);
      case 'EmitNarration':
        draft.narration.push(intent.text);
        return this.done(intent.kind, 'narration');
    }
  }

  private modifyDisposition(draft: TurnDraft, intent: EffectOf<'ModifyDisposition'>): AppliedEffect {
    const npc = this.requireNpc(draft.state, intent.npcId);
    const before = npc.disposition;
    npc.disposition = clamp(before + intent.delta, draft.config.dispositionMin, draft.config.dispositionMax);
    return this.done(intent.kind, `${npc.name} disposition ${before} -> ${npc.disposition}`);
  }

  private modifyStat(
    draft: TurnDraft,
    stat: string,
    delta: number,
    kind: 'ModifyStat' | 'AdvanceQuest',
  ): AppliedEffect {
    const stats = draft.state.player.stats;
    const before = stats[stat];
    if (before === undefined) {
      throw new EffectApplicationError(`Unknown stat "${stat}"`, { stat });
    }
    let ceiling = draft.config.statCap;
    if (stat === 'health' && stats.maxHealth !== undefined) ceiling = Math.min(ceiling, stats.maxHealth);
    stats[stat] = clamp(before + delta, 0, ceiling);
    if (stat === 'maxHealth' && stats.health !== undefined && stats.health > stats[stat]) {
      stats.health = stats[stat];
    }
    return this.done(kind, `${stat} ${before} -> ${stats[stat]}`);
  }

  private modifyNpcHealth(draft: TurnDraft, intent: EffectOf<'ModifyNpcHealth'>): AppliedEffect {
    const npc = this.requireNpc(draft.state, intent.npcId);
    if (!npc.active) {
      throw new EffectApplicationError(`${npc.name} is no longer here`, { npcId: npc.npcId });
    }
    const before = npc.health;
    npc.health = clamp(before + intent.delta, 0, npc.maxHealth);
    if (npc.health === 0) {
      npc.active = false;
      return this.done(intent.kind, `${npc.name} health ${before} -> 0, defeated`);
    }
    return this.done(intent.kind, `${npc.name} health ${before} -> ${npc.health}`);
  }

  private movePlayer(draft: TurnDraft, intent: EffectOf<'MovePlayer'>): AppliedEffect {
    const { state } = draft;
    const location = state.locations[intent.locationId];
    if (!location) {
      throw new EffectApplicationError(`Unknown location "${intent.locationId}"`);
    }
    state.player.locationId = location.locationId;
    state.world.currentLocationId = location.locationId;
    const spawned = spawnResidents(state, location.locationId, draft.nextVersion, draft.config.memoryCapacity);
    const met = spawned.length > 0 ? ` (met ${spawned.join(', ')})` : '';
    return this.done(intent.kind, `moved to ${location.name}${met}`);
  }

  private introduceNpc(draft: TurnDraft, intent: EffectOf<'IntroduceNpc'>): AppliedEffect {
    const { state, config } = draft;
    if (state.npcs[intent.npcId]) {
      throw new EffectApplicationError(`NPC ${intent.npcId} already exists`);
    }
    if (!state.locations[intent.locationId]) {
      throw new EffectApplicationError(`Unknown location "${intent.locationId}"`);
    }
    state.npcs[intent.npcId] = {
      npcId: intent.npcId,
      name: intent.name,
      role: intent.role,
      description: intent.description,
      locationId: intent.locationId,
      disposition: clamp(intent.disposition, config.dispositionMin, config.dispositionMax),
      inventory: {},
      health: intent.health,
      maxHealth: intent.health,
      strength: intent.strength,
      active: true,
      introducedAtVersion: draft.nextVersion,
    };
    state.memories[intent.npcId] = NpcMemory.empty(config.memoryCapacity);
    return this.done(intent.kind, `${intent.name} appears`);
  }

  private offerQuest(draft: TurnDraft, intent: EffectOf<'OfferQuest'>): AppliedEffect {
    const { state, nextVersion } = draft;
    if (!state.quests[intent.questId]) {
      const quest: Quest = {
        questId: intent.questId,
        state: 'Undiscovered',
        summary: intent.summary,
        objective: intent.objective,
        reward: intent.reward,
        giverNpcId: intent.giverNpcId,
        offeredAtVersion: nextVersion,
        activatedAtVersion: null,
        updatedAtVersion: nextVersion,
      };
      state.quests[intent.questId] = quest;
    }
    this.quests.transition(state, intent.questId, 'Offered', nextVersion);
    return this.done(intent.kind, `quest offered: ${intent.summary}`);
  }

  /**
   * Completion and failure are only honoured when the objective, checked
   * against the working copy, agrees. A declined claim is not an error.
   */
  private advanceQuest(draft: TurnDraft, intent: EffectOf<'AdvanceQuest'>): AppliedEffect {
    const { state, nextVersion } = draft;
    const quest = state.quests[intent.questId];
    if (!quest) {
      throw new EffectApplicationError(`Unknown quest "${intent.questId}"`);
    }
    assertTransition(quest.questId, quest.state, intent.to);

    if (intent.to === 'Completed' || intent.to === 'Failed') {
      const status = this.quests.evaluateObjective(state, quest);
      const required = intent.to === 'Completed' ? 'SATISFIED' : 'UNSATISFIABLE';
      if (status !== required) {
        return {
          kind: intent.kind,
          summary: `quest ${quest.questId} stays ${quest.state}: objective is ${status}`,
          honored: false,
        };
      }
    }

    this.quests.transition(state, quest.questId, intent.to, nextVersion);
    if (intent.to === 'Completed') {
      this.grantReward(draft, quest.reward);
    }
    return this.done(intent.kind, `quest ${quest.questId} -> ${intent.to}`);
  }

  private grantReward(draft: TurnDraft, reward: QuestReward): void {
    const { state } = draft;
    for (const itemId of reward.items) {
      this.requireItem(state, itemId);
      addItem(state.player.inventory, itemId);
    }
    for (const [stat, delta] of Object.entries(reward.stats)) {
      this.modifyStat(draft, stat, delta, 'AdvanceQuest');
    }
    for (const flag of reward.flags) {
      if (!state.world.flags.includes(flag)) state.world.flags.push(flag);
    }
  }

  private npcSpeech(draft: TurnDraft, intent: EffectOf<'NpcSpeech'>): AppliedEffect {
    const { state, baseVersion, config } = draft;
    const npc = this.requireNpc(state, intent.npcId);
    if (!npc.active) {
      throw new EffectApplicationError(`${npc.name} can no longer speak`, { npcId: npc.npcId });
    }

    const memory = NpcMemory.fromSnapshot(state.memories[npc.npcId] ?? NpcMemory.empty(config.memoryCapacity));
    if (draft.utterance && !draft.heard.has(npc.npcId)) {
      memory.push({ speaker: 'player', text: draft.utterance, worldVersion: baseVersion });
      draft.heard.add(npc.npcId);
    }
    memory.push({ speaker: 'npc', text: intent.text, worldVersion: baseVersion });
    state.memories[npc.npcId] = memory.toSnapshot();

    draft.narration.push(`${npc.name}: "${intent.text}"`);
    return this.done(intent.kind, `${npc.name} speaks`);
  }

  private deriveStatus(state: GameState): GameStatus {
    const health = state.player.stats.health;
    if (health !== undefined && health <= 0) return 'GAME_OVER';

    const enemies = Object.values(state.npcs).filter((n) => n.role === 'enemy');
    const unmet = pendingResidents(state).filter((seed) => seed.role === 'enemy');
    const anyQuestActive = Object.values(state.quests).some((q) => q.state === 'Active');
    if (enemies.length > 0 && unmet.length === 0 && enemies.every((n) => !n.active) && !anyQuestActive) {
      return 'VICTORY';
    }
    return 'PLAYING';
  }

  private holderInventory(state: GameState, targetId: string): Inventory {
    if (targetId === PLAYER_REF) return state.player.inventory;
    return this.requireNpc(state, targetId).inventory;
  }

  private requireNpc(state: GameState, npcId: string) {
    const npc = state.npcs[npcId];
    if (!npc) {
      throw new EffectApplicationError(`Unknown NPC "${npcId}"`, { npcId });
    }
    return npc;
  }

  private requireItem(state: GameState, itemId: string): void {
    if (!state.items[itemId]) {
      throw new EffectApplicationError(`Unknown item "${itemId}"`, { itemId });
    }
  }

  private done(kind: AppliedEffect['kind'], summary: string): AppliedEffect {
    return { kind, summary, honored: true };
  }
}
