import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ForbiddenError, NotFoundError } from '../common/errors/game-errors.js';
import { DirectCommandService } from '../engine/input/direct-command.service.js';
import { QuestTrackerService } from '../engine/quests/quest-tracker.service.js';
import { SessionRegistryService } from '../engine/world/session-registry.service.js';
import { WorldFactoryService } from '../engine/world/world-factory.service.js';
import { FileSaveStore } from '../persistence/file-save.store.js';
import { SaveService } from '../persistence/save.service.js';
import { makeContentLoader, makeEngineConfigService, makeQuest } from '../testing/game-state.fixture.js';
import { SessionsService } from './sessions.service.js';

describe('SessionsService', () => {
  let dir: string;
  let registry: SessionRegistryService;
  let service: SessionsService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sessions-'));
    const engineConfig = makeEngineConfigService();
    const content = makeContentLoader();
    const quests = new QuestTrackerService();
    registry = new SessionRegistryService();
    service = new SessionsService(
      registry,
      new WorldFactoryService(content, engineConfig),
      new SaveService(new FileSaveStore(dir)),
      new DirectCommandService(content, quests, engineConfig),
      quests,
      engineConfig,
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts a new game at version 0 in the starting location', async () => {
    const view = await service.create('player-1', { name: 'Wren' });

    expect(view).toEqual({
      sessionId: expect.any(String),
      version: 0,
      status: 'PLAYING',
      location: {
        locationId: 'forge',
        name: "Brannoc's Forge",
        description: 'Heat rolls off a roaring hearth.',
        exits: [{ locationId: 'square', name: 'Ashford Square' }],
      },
      player: {
        name: 'Wren',
        characterClass: 'fighter',
        stats: { health: 100, maxHealth: 100, strength: 10, gold: 5 },
        inventory: { sword: 1, bread: 2 },
      },
      npcsPresent: [{ npcId: 'blacksmith', name: 'Brannoc', role: 'merchant', mood: 'neutral' }],
      narration: "Brannoc's Forge. Heat rolls off a roaring hearth.\nHere: Brannoc (neutral).\nExits: Ashford Square.",
    });
  });

  it('hides sessions from other players', async () => {
    const { sessionId } = await service.create('player-1', {});

    expect(() => service.get(sessionId, 'player-2')).toThrow(ForbiddenError);
    expect(() => service.get('missing', 'player-1')).toThrow(NotFoundError);
  });

  it('lists quests in the journal with readable objectives', async () => {
    const { sessionId } = await service.create('player-1', {});
    const session = registry.get(sessionId, 'player-1');
    const next = session.store.workingCopy();
    next.quests.sword = makeQuest({ questId: 'sword', summary: 'Bring Brannoc the sword' });
    next.world.version = 1;
    session.store.commit(next, 0);

    expect(service.journal(sessionId, 'player-1')).toEqual([
      {
        questId: 'sword',
        state: 'Offered',
        summary: 'Bring Brannoc the sword',
        objective: 'deliver sword to blacksmith',
        giverNpcId: null,
      },
    ]);
  });

  it('resumes a saved game in a new session', async () => {
    const original = await service.create('player-1', { name: 'Wren' });
    const summary = await service.save(original.sessionId, 'player-1');

    const resumed = await service.create('player-1', { fromSaveId: summary.saveId });

    expect(resumed.sessionId).not.toBe(original.sessionId);
    expect(resumed.player.name).toBe('Wren');
    await expect(service.listSaves(original.sessionId, 'player-1')).resolves.toEqual([summary]);
  });

  it('closes a session', async () => {
    const { sessionId } = await service.create('player-1', {});

    expect(service.close(sessionId, 'player-1')).toEqual({ closed: true });
    expect(registry.size).toBe(0);
  });
});
