import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { EngineConfigService } from '../engine-config.service.js';
import type {
  GameState,
  ItemDefinition,
  LocationState,
  NpcSeed,
} from '../../db/types/index.js';
import { ConfigurationError } from '../../common/errors/game-errors.js';
import { spawnResidents } from './residents.js';

export interface NewGameOptions {
  playerId: string;
  name?: string;
  characterClass?: string;
}

/** Builds version-0 game states from the loaded world content. */
@Injectable()
export class WorldFactoryService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly engineConfig: EngineConfigService,
  ) {}

  create(options: NewGameOptions, now: Date = new Date()): GameState {
    const defaults = this.content.getPlayerDefaults();

    const locations: Record<string, LocationState> = {};
    for (const def of this.content.getLocations()) {
      locations[def.locationId] = {
        locationId: def.locationId,
        name: def.name,
        description: def.description,
        exits: [...def.exits],
        residents: def.residents.map((npcId) => this.seedFor(npcId)),
        visited: false,
      };
    }

    const items: Record<string, ItemDefinition> = {};
    for (const item of this.content.getItems()) {
      items[item.itemId] = { ...item };
    }

    const state: GameState = {
      world: {
        version: 0,
        currentLocationId: defaults.startingLocationId,
        flags: [...defaults.flags],
        status: 'PLAYING',
        timestamp: now.toISOString(),
      },
      player: {
        id: options.playerId,
        name: options.name ?? defaults.name,
        characterClass: options.characterClass ?? defaults.characterClass,
        stats: { ...defaults.stats },
        inventory: { ...defaults.inventory },
        locationId: defaults.startingLocationId,
      },
      locations,
      items,
      npcs: {},
      quests: {},
      memories: {},
    };

    spawnResidents(state, defaults.startingLocationId, 0, this.engineConfig.get().memoryCapacity);
    return state;
  }

  private seedFor(npcId: string): NpcSeed {
    const template = this.content.getNpcTemplate(npcId);
    if (!template) {
      throw new ConfigurationError(`Unknown NPC template "${npcId}"`);
    }
    return { ...template, inventory: { ...template.inventory } };
  }
}
