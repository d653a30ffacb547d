// Prompt Builder: bounded, read-only context for one model call
//
// User message order:
//   [Current location] [Player] [Active quests] [Other quests]
//   [Recent dialogue] [Player command] ([Correction])
// Over budget: oldest dialogue lines go first, then the oldest inactive
// quest summaries. Location, player and command are always kept.

import { Injectable } from '@nestjs/common';
import type { DialogueTurn, GameState, NpcState, Quest } from '../../db/types/index.js';
import { dispositionLabel } from '../../db/types/index.js';
import type { LlmMessage } from '../types/index.js';
import { EngineConfigService } from '../../engine/engine-config.service.js';
import { QuestTrackerService } from '../../engine/quests/quest-tracker.service.js';
import { NpcMemory } from '../../engine/memory/npc-memory.js';
import { normalizeName } from '../../common/text-utils.js';
import { COMMAND_HEADING, NARRATOR_SYSTEM_PROMPT } from './system-prompts.js';

export interface PromptRequest {
  state: GameState;
  command: string;
  /** corrective text for a retry; reserved out of the budget, never dropped */
  addendum?: string;
}

export interface PromptPayload {
  messages: LlmMessage[];
  userMessage: string;
  charCount: number;
  droppedDialogueTurns: number;
  droppedQuestSummaries: number;
  withinBudget: boolean;
  inScopeNpcIds: string[];
}

interface DialogueLine {
  npc: NpcState;
  turn: DialogueTurn;
}

@Injectable()
export class PromptBuilderService {
  constructor(
    private readonly engineConfig: EngineConfigService,
    private readonly quests: QuestTrackerService,
  ) {}

  build(request: PromptRequest): PromptPayload {
    const { state, command, addendum } = request;
    const config = this.engineConfig.get();

    const inScope = this.inScopeNpcs(state, command);
    const dialogue = this.collectDialogue(state, inScope, config.promptDialogueTurns);
    const inactive = this.quests.inactive(state);
    const fixedHead = [this.renderLocation(state), this.renderPlayer(state), this.renderActiveQuests(state)];
    const commandBlock = `${COMMAND_HEADING}\n${command.trim()}`;

    const reserved = addendum ? addendum.length + 2 : 0;
    const budget = Math.max(0, config.promptBudgetChars - reserved);

    let dialogueFrom = 0;
    let questsFrom = 0;
    const render = () =>
      [
        ...fixedHead,
        this.renderInactiveQuests(inactive.slice(questsFrom)),
        this.renderDialogue(inScope, dialogue.slice(dialogueFrom)),
        commandBlock,
      ]
        .filter((block) => block.length > 0)
        .join('\n\n');

    let body = render();
    while (body.length > budget) {
      if (dialogueFrom < dialogue.length) {
        dialogueFrom++;
      } else if (questsFrom < inactive.length) {
        questsFrom++;
      } else {
        break;
      }
      body = render();
    }

    const userMessage = addendum ? `${body}\n\n${addendum}` : body;
    return {
      messages: [
        { role: 'system', content: NARRATOR_SYSTEM_PROMPT },
        { role: 'user', content: userMessage },
      ],
      userMessage,
      charCount: userMessage.length,
      droppedDialogueTurns: dialogueFrom,
      droppedQuestSummaries: questsFrom,
      withinBudget: userMessage.length <= config.promptBudgetChars,
      inScopeNpcIds: inScope.map((n) => n.npcId),
    };
  }

  /** Active NPCs standing here, plus any NPC the command names. */
  inScopeNpcs(state: GameState, command: string): NpcState[] {
    const here = state.world.currentLocationId;
    const spoken = ` ${normalizeName(command)} `;
    return Object.values(state.npcs).filter((npc) => {
      if (npc.active && npc.locationId === here) return true;
      return [npc.name, npc.npcId]
        .map(normalizeName)
        .some((name) => name.length > 0 && spoken.includes(` ${name} `));
    });
  }

  /** The last K turns of each NPC, merged oldest first across NPCs. */
  private collectDialogue(state: GameState, npcs: NpcState[], k: number): DialogueLine[] {
    const lines: DialogueLine[] = [];
    for (const npc of npcs) {
      const snapshot = state.memories[npc.npcId];
      if (!snapshot) continue;
      for (const turn of NpcMemory.fromSnapshot(snapshot).recent(k)) {
        lines.push({ npc, turn });
      }
    }
    // stable: equal versions keep per-NPC order
    return lines.sort((a, b) => a.turn.worldVersion - b.turn.worldVersion);
  }

  private renderLocation(state: GameState): string {
    const location = state.locations[state.world.currentLocationId];
    if (!location) return `[Current location]\n${state.world.currentLocationId}`;

    const exits = location.exits.map((id) => `${id} (${state.locations[id]?.name ?? id})`);
    const present = Object.values(state.npcs)
      .filter((n) => n.active && n.locationId === location.locationId)
      .map(
        (n) =>
          `${n.npcId} "${n.name}", ${n.role}, ${dispositionLabel(n.disposition)} (${n.disposition}), health ${n.health}/${n.maxHealth}`,
      );

    return [
      '[Current location]',
      `${location.name} (${location.locationId}): ${location.description}`,
      `Exits: ${exits.length > 0 ? exits.join(', ') : 'none'}`,
      `Present: ${present.length > 0 ? present.join('; ') : 'nobody'}`,
    ].join('\n');
  }

  private renderPlayer(state: GameState): string {
    const { player, world } = state;
    const stats = Object.entries(player.stats).map(([k, v]) => `${k} ${v}`);
    const inventory = Object.entries(player.inventory).map(([id, n]) => `${id} x${n}`);
    return [
      '[Player]',
      `${player.name}, ${player.characterClass} (player)`,
      `Stats: ${stats.join(', ')}`,
      `Inventory: ${inventory.length > 0 ? inventory.join(', ') : 'empty'}`,
      `World flags: ${world.flags.length > 0 ? world.flags.join(', ') : 'none'}`,
      `Known items: ${Object.keys(state.items).join(', ')}`,
    ].join('\n');
  }

  private renderActiveQuests(state: GameState): string {
    const active = this.quests.active(state);
    if (active.length === 0) return '';
    const lines = active.map(
      (q) => `- ${q.questId}: ${q.summary} (goal: ${this.quests.describeObjective(q.objective)})`,
    );
    return ['[Active quests]', ...lines].join('\n');
  }

  private renderInactiveQuests(quests: Quest[]): string {
    if (quests.length === 0) return '';
    return ['[Other quests]', ...quests.map((q) => `- ${q.questId} [${q.state}]: ${q.summary}`)].join('\n');
  }

  private renderDialogue(npcs: NpcState[], lines: DialogueLine[]): string {
    if (lines.length === 0) return '';
    const blocks: string[] = ['[Recent dialogue]'];
    for (const npc of npcs) {
      const own = lines.filter((l) => l.npc.npcId === npc.npcId);
      if (own.length === 0) continue;
      blocks.push(`${npc.name} (${npc.npcId}):`);
      for (const { turn } of own) {
        blocks.push(`  ${turn.speaker === 'player' ? 'Player' : npc.name}: ${turn.text}`);
      }
    }
    return blocks.join('\n');
  }
}
