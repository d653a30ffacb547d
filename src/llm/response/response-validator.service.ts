// Response Validator/Parser: untrusted model text → ValidatedProposal
//
// Rules run in order; the first hard failure rejects the whole proposal:
//   1. syntax + schema        → ParseError
//   2. entity references      → EntityReferenceError
//   3. numeric deltas         → clamped, noted
//   4. quest transitions      → IllegalTransitionError
//      (accepting and abandoning are the player's own commands, never the model's)

import { Injectable, Logger } from '@nestjs/common';
import type {
  ClampNote,
  EffectIntent,
  EffectProposal,
  GameState,
  ObjectivePredicate,
  QuestState,
  ValidatedProposal,
} from '../../db/types/index.js';
import { PLAYER_REF } from '../../db/types/index.js';
import { EntityReferenceError, IllegalTransitionError, ParseError } from '../../common/errors/game-errors.js';
import { clip } from '../../common/text-utils.js';
import { EngineConfigService, type EngineConfig } from '../../engine/engine-config.service.js';
import { assertTransition } from '../../engine/quests/quest-state-machine.js';
import { EffectProposalSchema } from './effect-proposal.schema.js';

const NOT_JSON = Symbol('NOT_JSON');

/** Quest states only a direct player command may move a quest into. */
const PLAYER_DECIDED: readonly QuestState[] = ['Active', 'Abandoned'];

interface KnownEntities {
  npcs: Set<string>;
  items: Set<string>;
  locations: Set<string>;
  quests: Set<string>;
  stats: Set<string>;
}

@Injectable()
export class ResponseValidatorService {
  private readonly logger = new Logger(ResponseValidatorService.name);

  constructor(private readonly engineConfig: EngineConfigService) {}

  validate(raw: string, state: GameState): ValidatedProposal {
    const proposal = this.parse(raw);
    this.checkReferences(proposal.effects, state);
    const { effects, clamped } = this.clamp(proposal.effects, this.engineConfig.get());
    this.checkTransitions(effects, state);

    if (clamped.length > 0) {
      this.logger.warn(`Clamped ${clamped.length} value(s) in proposal`);
    }
    return { narration: proposal.narration, effects, clamped };
  }

  /** Rule 1. Direct JSON, then a fenced code block, then the outermost braces. */
  parse(raw: string): EffectProposal {
    const candidates = [raw.trim(), this.extractFromCodeBlock(raw), this.extractJsonBraces(raw)];
    let json: unknown = NOT_JSON;
    for (const candidate of candidates) {
      if (!candidate) continue;
      json = this.tryJson(candidate);
      if (json !== NOT_JSON) break;
    }
    if (json === NOT_JSON) {
      throw new ParseError('Model output is not JSON', { excerpt: clip(raw, 200) });
    }

    const result = EffectProposalSchema.safeParse(json);
    if (!result.success) {
      throw new ParseError('Model output does not match the effect schema', {
        issues: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
    }
    return result.data;
  }

  /** Rule 2. Entities created earlier in the same proposal count as known. */
  private checkReferences(effects: EffectIntent[], state: GameState): void {
    const known: KnownEntities = {
      npcs: new Set(Object.keys(state.npcs)),
      items: new Set(Object.keys(state.items)),
      locations: new Set(Object.keys(state.locations)),
      quests: new Set(Object.keys(state.quests)),
      stats: new Set(Object.keys(state.player.stats)),
    };

    effects.forEach((intent, index) => {
      const need = (set: keyof KnownEntities, value: string) => {
        if (!known[set].has(value)) {
          throw new EntityReferenceError(`Effect #${index} (${intent.kind}) refers to unknown ${set.slice(0, -1)} "${value}"`, {
            index,
            kind: intent.kind,
            [set]: value,
          });
        }
      };
      const fresh = (set: keyof KnownEntities, value: string) => {
        if (known[set].has(value)) {
          throw new EntityReferenceError(`Effect #${index} (${intent.kind}) introduces existing id "${value}"`, {
            index,
            kind: intent.kind,
          });
        }
        known[set].add(value);
      };
      const holder = (targetId: string) => {
        if (targetId !== PLAYER_REF) need('npcs', targetId);
      };

      switch (intent.kind) {
        case 'ModifyDisposition':
        case 'DeactivateNpc':
        case 'ModifyNpcHealth':
        case 'NpcSpeech':
          need('npcs', intent.npcId);
          break;
        case 'ModifyStat':
          need('stats', intent.stat);
          break;
        case 'GrantItem':
        case 'RemoveItem':
          holder(intent.targetId);
          need('items', intent.itemId);
          break;
        case 'MovePlayer':
          need('locations', intent.locationId);
          break;
        case 'IntroduceNpc':
          need('locations', intent.locationId);
          fresh('npcs', intent.npcId);
          break;
        case 'IntroduceItem':
          fresh('items', intent.itemId);
          break;
        case 'OfferQuest':
          if (intent.giverNpcId !== null) need('npcs', intent.giverNpcId);
          this.objectiveRefs(intent.objective).forEach(([set, value]) => need(set, value));
          intent.reward.items.forEach((itemId) => need('items', itemId));
          Object.keys(intent.reward.stats).forEach((stat) => need('stats', stat));
          known.quests.add(intent.questId);
          break;
        case 'AdvanceQuest':
          need('quests', intent.questId);
          break;
        case 'SetFlag':
        case 'ClearFlag':
        case 'EmitNarration':
          break;
      }
    });
  }

  private objectiveRefs(objective: ObjectivePredicate): Array<[keyof KnownEntities, string]> {
    switch (objective.type) {
      case 'DELIVER_ITEM':
        return [['items', objective.itemId], ['npcs', objective.npcId]];
      case 'OBTAIN_ITEM':
        return [['items', objective.itemId]];
      case 'DEFEAT_NPC':
      case 'TALK_TO_NPC':
        return [['npcs', objective.npcId]];
      case 'REACH_LOCATION':
        return [['locations', objective.locationId]];
      case 'SET_FLAG':
        return [];
    }
  }

  /** Rule 3. Out-of-range numbers are cut to the configured bounds, never rejected. */
  private clamp(effects: EffectIntent[], config: EngineConfig): { effects: EffectIntent[]; clamped: ClampNote[] } {
    const clamped: ClampNote[] = [];
    const bound = (index: number, field: string, proposed: number, min: number, max: number): number => {
      const value = Math.min(max, Math.max(min, proposed));
      if (value !== proposed) clamped.push({ index, field, proposed, clampedTo: value });
      return value;
    };

    const out = effects.map((intent, index): EffectIntent => {
      switch (intent.kind) {
        case 'ModifyDisposition': {
          const max = config.maxDispositionDelta;
          return { ...intent, delta: bound(index, 'delta', intent.delta, -max, max) };
        }
        case 'ModifyStat':
        case 'ModifyNpcHealth': {
          const max = config.maxStatDelta;
          return { ...intent, delta: bound(index, 'delta', intent.delta, -max, max) };
        }
        case 'IntroduceNpc':
          return {
            ...intent,
            disposition: bound(index, 'disposition', intent.disposition, config.dispositionMin, config.dispositionMax),
            health: bound(index, 'health', intent.health, 1, config.statCap),
            strength: bound(index, 'strength', intent.strength, 0, config.maxStatDelta),
          };
        case 'OfferQuest': {
          const max = config.maxStatDelta;
          const stats: Record<string, number> = {};
          for (const [stat, value] of Object.entries(intent.reward.stats)) {
            stats[stat] = bound(index, `reward.stats.${stat}`, value, -max, max);
          }
          return { ...intent, reward: { ...intent.reward, stats } };
        }
        default:
          return intent;
      }
    });
    return { effects: out, clamped };
  }

  /** Rule 4. Quest states are tracked through the proposal in order. */
  private checkTransitions(effects: EffectIntent[], state: GameState): void {
    const current = new Map<string, QuestState>(
      Object.values(state.quests).map((q) => [q.questId, q.state]),
    );
    effects.forEach((intent, index) => {
      if (intent.kind === 'OfferQuest') {
        assertTransition(intent.questId, current.get(intent.questId) ?? 'Undiscovered', 'Offered');
        current.set(intent.questId, 'Offered');
      } else if (intent.kind === 'AdvanceQuest') {
        if (PLAYER_DECIDED.includes(intent.to)) {
          throw new IllegalTransitionError(
            `Effect #${index} moves quest "${intent.questId}" to ${intent.to}; only the player can accept, decline or abandon a quest`,
            { index, questId: intent.questId, to: intent.to },
          );
        }
        assertTransition(intent.questId, current.get(intent.questId) ?? 'Undiscovered', intent.to);
        current.set(intent.questId, intent.to);
      }
    });
  }

  private tryJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch {
      return NOT_JSON;
    }
  }

  private extractFromCodeBlock(text: string): string | null {
    const match = text.match(/```(?:json)?\s*([\s\S]*?)```/);
    return match?.[1]?.trim() ?? null;
  }

  private extractJsonBraces(text: string): string | null {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end === -1 || end <= start) return null;
    return text.slice(start, end + 1);
  }
}
