import { ResponseValidatorService } from './response-validator.service.js';
import {
  EntityReferenceError,
  IllegalTransitionError,
  ParseError,
} from '../../common/errors/game-errors.js';
import type { GameState } from '../../db/types/index.js';
import { makeEngineConfigService, makeGameState, makeQuest } from '../../testing/game-state.fixture.js';

function reply(effects: unknown[], narration = 'Something happens.'): string {
  return JSON.stringify({ narration, effects });
}

describe('ResponseValidatorService', () => {
  let validator: ResponseValidatorService;
  let state: GameState;

  beforeEach(() => {
    validator = new ResponseValidatorService(makeEngineConfigService());
    state = makeGameState();
  });

  describe('parsing', () => {
    it('rejects a reply missing a required field', () => {
      expect(() => validator.validate('{"effects": []}', state)).toThrow(ParseError);
    });

    it('rejects text that holds no JSON at all', () => {
      expect(() => validator.validate('The smith grunts.', state)).toThrow(ParseError);
    });

    it('rejects an unknown effect kind', () => {
      expect(() => validator.validate(reply([{ kind: 'CastSpell', spell: 'fire' }]), state)).toThrow(ParseError);
    });

    it('reads JSON inside a fenced code block', () => {
      const raw = 'Sure!\n```json\n{"narration":"The fire roars.","effects":[]}\n```';

      expect(validator.validate(raw, state)).toEqual({ narration: 'The fire roars.', effects: [], clamped: [] });
    });

    it('falls back to the outermost braces', () => {
      const raw = 'Here you go: {"narration":"Hi","effects":[{"kind":"SetFlag","flag":"greeted"}]} enjoy';

      expect(validator.validate(raw, state).effects).toEqual([{ kind: 'SetFlag', flag: 'greeted' }]);
    });

    it('passes narration through untouched and fills defaults', () => {
      const result = validator.validate(
        reply([{ kind: 'GrantItem', targetId: 'player', itemId: 'bread' }], '  Warm bread.  '),
        state,
      );

      expect(result.narration).toBe('  Warm bread.  ');
      expect(result.effects).toEqual([{ kind: 'GrantItem', targetId: 'player', itemId: 'bread', quantity: 1 }]);
    });
  });

  describe('references', () => {
    it('rejects an NPC that does not exist', () => {
      expect(() => validator.validate(reply([{ kind: 'ModifyDisposition', npcId: 'ghost', delta: 5 }]), state)).toThrow(
        new EntityReferenceError('Effect #0 (ModifyDisposition) refers to unknown npc "ghost"'),
      );
    });

    it('accepts an NPC introduced earlier in the same reply', () => {
      const result = validator.validate(
        reply([
          { kind: 'IntroduceNpc', npcId: 'stranger', name: 'Hooded Stranger', locationId: 'forge' },
          { kind: 'NpcSpeech', npcId: 'stranger', text: 'Evening.' },
        ]),
        state,
      );

      expect(result.effects[0]).toEqual({
        kind: 'IntroduceNpc',
        npcId: 'stranger',
        name: 'Hooded Stranger',
        role: 'townsfolk',
        description: '',
        locationId: 'forge',
        disposition: 0,
        health: 30,
        strength: 5,
      });
    });

    it('rejects the same NPC used before it is introduced', () => {
      expect(() =>
        validator.validate(
          reply([
            { kind: 'NpcSpeech', npcId: 'stranger', text: 'Evening.' },
            { kind: 'IntroduceNpc', npcId: 'stranger', name: 'Hooded Stranger', locationId: 'forge' },
          ]),
          state,
        ),
      ).toThrow(EntityReferenceError);
    });

    it('rejects re-introducing an existing NPC', () => {
      expect(() =>
        validator.validate(
          reply([{ kind: 'IntroduceNpc', npcId: 'blacksmith', name: 'Brannoc', locationId: 'forge' }]),
          state,
        ),
      ).toThrow(EntityReferenceError);
    });

    it('rejects a stat the player does not have', () => {
      expect(() => validator.validate(reply([{ kind: 'ModifyStat', stat: 'mana', delta: 3 }]), state)).toThrow(
        EntityReferenceError,
      );
    });
  });

  describe('clamping', () => {
    it('clamps deltas and records what it did', () => {
      const result = validator.validate(
        reply([
          { kind: 'ModifyDisposition', npcId: 'blacksmith', delta: 40 },
          { kind: 'ModifyStat', stat: 'gold', delta: -50 },
          { kind: 'ModifyStat', stat: 'strength', delta: 2 },
        ]),
        state,
      );

      expect(result.effects).toEqual([
        { kind: 'ModifyDisposition', npcId: 'blacksmith', delta: 25 },
        { kind: 'ModifyStat', stat: 'gold', delta: -20 },
        { kind: 'ModifyStat', stat: 'strength', delta: 2 },
      ]);
      expect(result.clamped).toEqual([
        { index: 0, field: 'delta', proposed: 40, clampedTo: 25 },
        { index: 1, field: 'delta', proposed: -50, clampedTo: -20 },
      ]);
    });

    it('clamps damage to NPCs and the strength of new ones', () => {
      const result = validator.validate(
        reply([
          { kind: 'ModifyNpcHealth', npcId: 'blacksmith', delta: -50 },
          { kind: 'IntroduceNpc', npcId: 'ogre', name: 'Ogre', role: 'enemy', locationId: 'square', strength: 40 },
        ]),
        state,
      );

      expect(result.effects[0]).toEqual({ kind: 'ModifyNpcHealth', npcId: 'blacksmith', delta: -20 });
      expect(result.effects[1]).toMatchObject({ npcId: 'ogre', health: 30, strength: 20 });
      expect(result.clamped).toEqual([
        { index: 0, field: 'delta', proposed: -50, clampedTo: -20 },
        { index: 1, field: 'strength', proposed: 40, clampedTo: 20 },
      ]);
    });
  });

  describe('quest transitions', () => {
    it('rejects Offered -> Completed', () => {
      state.quests.deliver_sword = makeQuest({ questId: 'deliver_sword', state: 'Offered' });

      expect(() =>
        validator.validate(reply([{ kind: 'AdvanceQuest', questId: 'deliver_sword', to: 'Completed' }]), state),
      ).toThrow(IllegalTransitionError);
    });

    it('tracks quest states through the reply', () => {
      const offer = {
        kind: 'OfferQuest',
        questId: 'find_key',
        summary: 'Find the mill key',
        objective: { type: 'OBTAIN_ITEM', itemId: 'mill_key' },
        giverNpcId: 'blacksmith',
      };
      state.quests.deliver_sword = makeQuest({ questId: 'deliver_sword', state: 'Active' });

      expect(validator.validate(reply([offer]), state).effects).toHaveLength(1);
      expect(() =>
        validator.validate(reply([offer, { kind: 'AdvanceQuest', questId: 'find_key', to: 'Completed' }]), state),
      ).toThrow(IllegalTransitionError);
      expect(() =>
        validator.validate(
          reply([
            { kind: 'AdvanceQuest', questId: 'deliver_sword', to: 'Completed' },
            { kind: 'AdvanceQuest', questId: 'deliver_sword', to: 'Failed' },
          ]),
          state,
        ),
      ).toThrow(IllegalTransitionError);
    });

    it('leaves accepting and abandoning quests to the player', () => {
      state.quests.q1 = makeQuest({ questId: 'q1', state: 'Offered' });
      state.quests.q2 = makeQuest({ questId: 'q2', state: 'Active' });

      expect(() =>
        validator.validate(reply([{ kind: 'AdvanceQuest', questId: 'q1', to: 'Active' }]), state),
      ).toThrow(
        new IllegalTransitionError(
          'Effect #0 moves quest "q1" to Active; only the player can accept, decline or abandon a quest',
        ),
      );
      expect(() =>
        validator.validate(
          reply([
            { kind: 'SetFlag', flag: 'weather_talk' },
            { kind: 'AdvanceQuest', questId: 'q2', to: 'Abandoned' },
          ]),
          state,
        ),
      ).toThrow(
        new IllegalTransitionError(
          'Effect #1 moves quest "q2" to Abandoned; only the player can accept, decline or abandon a quest',
        ),
      );
    });

    it('rejects offering a quest that is already active', () => {
      state.quests.deliver_sword = makeQuest({ questId: 'deliver_sword', state: 'Active' });

      expect(() =>
        validator.validate(
          reply([
            {
              kind: 'OfferQuest',
              questId: 'deliver_sword',
              summary: 'Again',
              objective: { type: 'SET_FLAG', flag: 'x' },
            },
          ]),
          state,
        ),
      ).toThrow(IllegalTransitionError);
    });
  });
});
