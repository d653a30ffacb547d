import { InvalidInputError, PersistenceError } from '../../common/errors/game-errors.js';
import { summarize } from '../../db/types/index.js';
import type { SaveSnapshot, SaveSummary } from '../../db/types/index.js';
import { AiGatewayService } from '../../llm/ai-gateway.service.js';
import { AiTurnLogService } from '../../llm/ai-turn-log.service.js';
import { LlmConfigService } from '../../llm/llm-config.service.js';
import { PromptBuilderService } from '../../llm/prompts/prompt-builder.service.js';
import { LlmProviderRegistryService } from '../../llm/providers/llm-provider-registry.service.js';
import { ResponseValidatorService } from '../../llm/response/response-validator.service.js';
import type { LlmProviderRequest, LlmProviderResponse } from '../../llm/types/index.js';
import { SaveService } from '../../persistence/save.service.js';
import { SaveStore } from '../../persistence/save-store.js';
import { makeContentLoader, makeEngineConfigService, makeGameState } from '../../testing/game-state.fixture.js';
import type { EngineConfig } from '../engine-config.service.js';
import { EffectApplierService } from '../effects/effect-applier.service.js';
import { CommandParserService } from '../input/command-parser.service.js';
import { DirectCommandService } from '../input/direct-command.service.js';
import { QuestTrackerService } from '../quests/quest-tracker.service.js';
import { SessionRegistryService, type GameSession } from '../world/session-registry.service.js';
import { TurnOrchestratorService } from './turn-orchestrator.service.js';

class MemorySaveStore extends SaveStore {
  readonly backend = 'file';
  readonly saved: SaveSnapshot[] = [];
  failWith: Error | null = null;

  async write(snapshot: SaveSnapshot): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.saved.push(snapshot);
  }

  async read(saveId: string): Promise<SaveSnapshot | null> {
    return this.saved.find((s) => s.saveId === saveId) ?? null;
  }

  async list(sessionId: string): Promise<SaveSummary[]> {
    return this.saved.filter((s) => s.sessionId === sessionId).map(summarize);
  }
}

type Reply = (request: LlmProviderRequest) => Promise<string>;

function text(value: string): Reply {
  return async () => value;
}

function failing(err: Error): Reply {
  return async () => {
    throw err;
  };
}

/** Never answers; settles only when the gateway aborts it. */
const hang: Reply = (request) =>
  new Promise<string>((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

const NOD = JSON.stringify({
  narration: 'Brannoc nods.',
  effects: [{ kind: 'ModifyDisposition', npcId: 'blacksmith', delta: 40 }],
});

interface Harness {
  orchestrator: TurnOrchestratorService;
  session: GameSession;
  requests: LlmProviderRequest[];
  saveStore: MemorySaveStore;
}

function setup(
  replies: Reply[],
  options: { maxRetries?: number; engine?: Partial<EngineConfig> } = {},
): Harness {
  const engineConfig = makeEngineConfigService(options.engine);
  const content = makeContentLoader();
  const quests = new QuestTrackerService();

  const llmConfig = new LlmConfigService();
  llmConfig.update({ provider: 'mock', timeoutMs: 20, maxRetries: options.maxRetries ?? 2 });
  const registry = new LlmProviderRegistryService(llmConfig);
  const requests: LlmProviderRequest[] = [];
  registry.register({
    name: 'mock',
    isAvailable: () => true,
    generate: async (request): Promise<LlmProviderResponse> => {
      requests.push(request);
      const reply = replies[Math.min(requests.length, replies.length) - 1];
      if (!reply) throw new Error('no scripted reply');
      const body = await reply(request);
      return { text: body, model: 'scripted', promptTokens: 1, completionTokens: 1, latencyMs: 1 };
    },
  });

  const saveStore = new MemorySaveStore();
  const orchestrator = new TurnOrchestratorService(
    engineConfig,
    llmConfig,
    content,
    new CommandParserService(),
    new DirectCommandService(content, quests, engineConfig),
    new PromptBuilderService(engineConfig, quests),
    new AiGatewayService(registry, llmConfig, new AiTurnLogService(null)),
    new ResponseValidatorService(engineConfig),
    new EffectApplierService(engineConfig, quests, content),
    new SaveService(saveStore),
  );
  const session = new SessionRegistryService().open('player-1', makeGameState(), 'session-1');
  return { orchestrator, session, requests, saveStore };
}

function userMessage(request: LlmProviderRequest | undefined): string | undefined {
  return request?.messages.find((m) => m.role === 'user')?.content;
}

describe('TurnOrchestratorService', () => {
  describe('narrative commands', () => {
    it('applies a valid proposal and reports clamped values', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'compliment the smith');

      expect(result).toEqual({
        sessionId: 'session-1',
        version: 4,
        status: 'PLAYING',
        narration: 'Brannoc nods.',
        appliedEffects: [{ kind: 'ModifyDisposition', summary: 'Brannoc disposition 10 -> 35', honored: true }],
        outcome: 'APPLIED',
        phases: ['Idle', 'Building', 'Calling', 'Validating', 'Applying', 'Idle'],
        attempts: 1,
        notices: ['Effect #0 delta clamped from 40 to 25'],
      });
      expect(session.store.read().npcs.blacksmith?.disposition).toBe(35);
    });

    it('retries a rejected reply with a correction naming the failure', async () => {
      const { orchestrator, session, requests } = setup([text('I refuse to answer in JSON.'), text(NOD)]);

      const result = await orchestrator.submit(session, 'compliment the smith');

      expect(result.outcome).toBe('APPLIED');
      expect(result.attempts).toBe(2);
      expect(result.phases).toEqual([
        'Idle',
        'Building',
        'Calling',
        'Validating',
        'Building',
        'Calling',
        'Validating',
        'Applying',
        'Idle',
      ]);
      expect(userMessage(requests[0])).not.toContain('[Correction]');
      expect(userMessage(requests[1])).toContain(
        '[Correction]\nYour previous reply was rejected (PARSE_ERROR): Model output is not JSON',
      );
    });

    it('resends the same prompt after a gateway failure', async () => {
      const limited = Object.assign(new Error('Too many requests'), { status: 429 });
      const { orchestrator, session, requests } = setup([failing(limited), text(NOD)]);

      const result = await orchestrator.submit(session, 'compliment the smith');

      expect(result.outcome).toBe('APPLIED');
      expect(result.attempts).toBe(2);
      expect(requests[1]?.messages).toEqual(requests[0]?.messages);
    });

    it('falls back with the version unchanged when every call times out', async () => {
      const { orchestrator, session, requests } = setup([hang]);

      const result = await orchestrator.submit(session, 'ask the smith about the war');

      expect(requests).toHaveLength(3);
      expect(result).toMatchObject({
        version: 3,
        narration: 'The path forward is unclear.',
        outcome: 'FALLBACK',
        attempts: 3,
        appliedEffects: [],
        phases: ['Idle', 'Building', 'Calling', 'Building', 'Calling', 'Building', 'Calling', 'Idle'],
      });
      expect(session.store.version).toBe(3);
    });

    it('honours a smaller retry budget', async () => {
      const { orchestrator, session, requests } = setup([hang], { maxRetries: 1 });

      const result = await orchestrator.submit(session, 'ask the smith about the war');

      expect(requests).toHaveLength(2);
      expect(result.outcome).toBe('FALLBACK');
      expect(session.store.version).toBe(3);
    });

    it('falls back when every reply names entities that do not exist', async () => {
      const ghost = JSON.stringify({
        narration: 'The ghost waves.',
        effects: [{ kind: 'NpcSpeech', npcId: 'ghost', text: 'Boo.' }],
      });
      const { orchestrator, session } = setup([text(ghost)]);

      const result = await orchestrator.submit(session, 'call out to the ghost');

      expect(result.outcome).toBe('FALLBACK');
      expect(result.attempts).toBe(3);
      expect(session.store.read().memories.blacksmith?.turns).toEqual([]);
    });

    it('refuses commands once the game is over', async () => {
      const { orchestrator, requests } = setup([text(NOD)]);
      const state = makeGameState();
      state.world.status = 'GAME_OVER';
      const ended = new SessionRegistryService().open('player-1', state, 'session-2');

      const result = await orchestrator.submit(ended, 'stand up');

      expect(result).toMatchObject({ outcome: 'REJECTED', narration: 'You have fallen.', attempts: 0, version: 3 });
      expect(requests).toHaveLength(0);
    });

    it('refuses blank input before queueing', async () => {
      const { orchestrator, session } = setup([text(NOD)]);
      await expect(orchestrator.submit(session, '   ')).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe('direct commands', () => {
    it('answers look without the model or a new version', async () => {
      const { orchestrator, session, requests } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'look');

      expect(result).toMatchObject({
        version: 3,
        outcome: 'DIRECT',
        attempts: 0,
        phases: ['Idle'],
        narration: "Brannoc's Forge. Heat rolls off a roaring hearth.\nHere: Brannoc (neutral).\nExits: Ashford Square.",
      });
      expect(requests).toHaveLength(0);
    });

    it('moves the player through the Event Applier', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'go to square');

      expect(result).toMatchObject({
        version: 4,
        outcome: 'DIRECT',
        phases: ['Idle', 'Applying', 'Idle'],
        narration: 'You make your way to Ashford Square.',
      });
      const state = session.store.read();
      expect(state.world.currentLocationId).toBe('square');
      expect(state.npcs.goblin?.active).toBe(true);
    });

    it('rejects a move to a place that is not adjacent', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'go to the moon');

      expect(result).toMatchObject({ outcome: 'REJECTED', narration: 'No such way.', version: 3 });
    });

    it('trades blows with an NPC', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'attack Brannoc');

      expect(result).toMatchObject({
        version: 4,
        outcome: 'DIRECT',
        narration: 'You strike Brannoc for 10 damage. Brannoc strikes back for 8 damage.',
        appliedEffects: [
          { kind: 'ModifyNpcHealth', summary: 'Brannoc health 45 -> 35', honored: true },
          { kind: 'ModifyStat', summary: 'health 80 -> 72', honored: true },
        ],
      });
    });

    it('wins the game by fighting the last enemy down', async () => {
      const { orchestrator, session, requests } = setup([text(NOD)]);

      await orchestrator.submit(session, 'go to square');
      await orchestrator.submit(session, 'attack goblin');
      await orchestrator.submit(session, 'attack goblin');
      const result = await orchestrator.submit(session, 'attack goblin');

      expect(result).toMatchObject({
        version: 7,
        status: 'VICTORY',
        narration: 'You strike Skulking Goblin for 10 damage. Skulking Goblin falls.\n\nThe valley is safe.',
      });
      expect(session.store.read().player.stats.health).toBe(68);
      expect(requests).toHaveLength(0);
    });

    it('buys healing from a merchant while the gold lasts', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const bought = await orchestrator.submit(session, 'trade with brannoc');
      const refused = await orchestrator.submit(session, 'trade with brannoc');

      expect(bought).toMatchObject({
        version: 4,
        narration: 'You pay Brannoc 5 gold for a healing draught and drink it down.',
      });
      expect(session.store.read().player.stats).toMatchObject({ gold: 0, health: 100 });
      expect(refused).toMatchObject({
        version: 4,
        outcome: 'REJECTED',
        narration: 'Brannoc wants 5 gold for a healing draught. You have 0.',
      });
    });

    it('only trades with merchants who are present', async () => {
      const { orchestrator, session } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'trade with the goblin');

      expect(result).toMatchObject({ outcome: 'REJECTED', narration: 'There is no merchant like that here.' });
    });

    it('saves the session', async () => {
      const { orchestrator, session, saveStore } = setup([text(NOD)]);

      const result = await orchestrator.submit(session, 'save');

      expect(saveStore.saved).toHaveLength(1);
      expect(result.narration).toBe(`Game saved (${saveStore.saved[0]?.saveId}).`);
      expect(result.version).toBe(3);
    });

    it('reports a failed save as a notice', async () => {
      const { orchestrator, session, saveStore } = setup([text(NOD)]);
      saveStore.failWith = new PersistenceError('disk full');

      const result = await orchestrator.submit(session, 'save');

      expect(result).toMatchObject({ outcome: 'DIRECT', narration: 'Saving failed.', notices: ['disk full'] });
    });
  });

  describe('concurrency', () => {
    function deferred(): { reply: Reply; release: () => void } {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const reply: Reply = async () => {
        await gate;
        return '{"narration":"Done.","effects":[]}';
      };
      return { reply, release: () => release() };
    }

    it('turns away a second command under the reject policy', async () => {
      const slow = deferred();
      const { orchestrator, session } = setup([slow.reply], { engine: { turnConcurrency: 'reject' } });
      const first = orchestrator.submit(session, 'wait a moment');

      await expect(orchestrator.submit(session, 'wait again')).rejects.toMatchObject({ code: 'TURN_IN_PROGRESS' });

      slow.release();
      await expect(first).resolves.toMatchObject({ outcome: 'APPLIED', version: 4 });
    });

    it('runs queued commands one after another', async () => {
      const slow = deferred();
      const { orchestrator, session } = setup([slow.reply]);
      const first = orchestrator.submit(session, 'wait a moment');
      const second = orchestrator.submit(session, 'wait again');

      slow.release();
      await expect(first).resolves.toMatchObject({ version: 4 });
      await expect(second).resolves.toMatchObject({ version: 5 });
    });

    it('cancels queued commands and waits for the one in flight', async () => {
      const slow = deferred();
      const { orchestrator, session } = setup([slow.reply]);
      const first = orchestrator.submit(session, 'wait a moment');
      const queued = orchestrator.submit(session, 'wait again');
      const queuedOutcome = expect(queued).rejects.toMatchObject({ code: 'TURN_CANCELLED' });

      const cancelling = orchestrator.cancel(session);
      slow.release();

      await expect(cancelling).resolves.toEqual({ cancelled: 1, version: 4 });
      await queuedOutcome;
      await expect(first).resolves.toMatchObject({ version: 4 });
    });
  });
});
