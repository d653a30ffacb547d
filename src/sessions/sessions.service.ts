import { Injectable, Logger } from '@nestjs/common';
import type { GameState, GameStatus, QuestState, SaveSummary } from '../db/types/index.js';
import { dispositionLabel, type DispositionLabel, type NpcRole } from '../db/types/index.js';
import { EngineConfigService } from '../engine/engine-config.service.js';
import { QuestTrackerService } from '../engine/quests/quest-tracker.service.js';
import { DirectCommandService } from '../engine/input/direct-command.service.js';
import { WorldFactoryService } from '../engine/world/world-factory.service.js';
import { SessionRegistryService, type GameSession } from '../engine/world/session-registry.service.js';
import { SaveService } from '../persistence/save.service.js';
import type { CreateSessionBody } from './dto/create-session.dto.js';

export interface SessionView {
  sessionId: string;
  version: number;
  status: GameStatus;
  location: {
    locationId: string;
    name: string;
    description: string;
    exits: { locationId: string; name: string }[];
  };
  player: {
    name: string;
    characterClass: string;
    stats: Record<string, number>;
    inventory: Record<string, number>;
  };
  npcsPresent: { npcId: string; name: string; role: NpcRole; mood: DispositionLabel }[];
  narration: string;
}

export interface JournalEntry {
  questId: string;
  state: QuestState;
  summary: string;
  objective: string;
  giverNpcId: string | null;
}

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);

  constructor(
    private readonly registry: SessionRegistryService,
    private readonly worldFactory: WorldFactoryService,
    private readonly saves: SaveService,
    private readonly direct: DirectCommandService,
    private readonly quests: QuestTrackerService,
    private readonly engineConfig: EngineConfigService,
  ) {}

  async create(playerId: string, body: CreateSessionBody): Promise<SessionView> {
    let state: GameState;
    if (body.fromSaveId) {
      const snapshot = await this.saves.fetch(body.fromSaveId, playerId);
      state = snapshot.state;
      this.logger.log(`Resuming ${body.fromSaveId} for ${playerId}`);
    } else {
      state = this.worldFactory.create({ playerId, name: body.name, characterClass: body.characterClass });
    }
    return this.view(this.registry.open(playerId, state));
  }

  get(sessionId: string, playerId: string): SessionView {
    return this.view(this.registry.get(sessionId, playerId));
  }

  close(sessionId: string, playerId: string): { closed: boolean } {
    this.registry.get(sessionId, playerId);
    return { closed: this.registry.close(sessionId) };
  }

  journal(sessionId: string, playerId: string): JournalEntry[] {
    const state = this.registry.get(sessionId, playerId).store.read();
    return this.quests.journal(state).map((q) => ({
      questId: q.questId,
      state: q.state,
      summary: q.summary,
      objective: this.quests.describeObjective(q.objective),
      giverNpcId: q.giverNpcId,
    }));
  }

  save(sessionId: string, playerId: string): Promise<SaveSummary> {
    const session = this.registry.get(sessionId, playerId);
    return this.exclusive(session, () => this.saves.save(session));
  }

  listSaves(sessionId: string, playerId: string): Promise<SaveSummary[]> {
    return this.saves.list(this.registry.get(sessionId, playerId));
  }

  async load(sessionId: string, playerId: string, saveId: string, force: boolean): Promise<SessionView> {
    const session = this.registry.get(sessionId, playerId);
    await this.exclusive(session, () => this.saves.load(session, saveId, { force }));
    return this.view(session);
  }

  /** Save and load wait for, or are refused by, the session's turn gate like any command. */
  private exclusive<T>(session: GameSession, task: () => Promise<T>): Promise<T> {
    return session.gate.run(task, this.engineConfig.get().turnConcurrency);
  }

  private view(session: GameSession): SessionView {
    const state = session.store.read();
    const here = state.locations[state.world.currentLocationId];
    return {
      sessionId: session.sessionId,
      version: state.world.version,
      status: state.world.status,
      location: {
        locationId: state.world.currentLocationId,
        name: here?.name ?? state.world.currentLocationId,
        description: here?.description ?? '',
        exits: (here?.exits ?? []).map((id) => ({ locationId: id, name: state.locations[id]?.name ?? id })),
      },
      player: {
        name: state.player.name,
        characterClass: state.player.characterClass,
        stats: { ...state.player.stats },
        inventory: { ...state.player.inventory },
      },
      npcsPresent: Object.values(state.npcs)
        .filter((n) => n.active && n.locationId === state.world.currentLocationId)
        .map((n) => ({ npcId: n.npcId, name: n.name, role: n.role, mood: dispositionLabel(n.disposition) })),
      narration: this.direct.describeLocation(state),
    };
  }
}
