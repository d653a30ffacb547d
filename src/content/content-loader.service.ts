// world_v1 JSON load + in-memory cache

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors/game-errors.js';
import {
  ItemTemplateSchema,
  LocationDefinitionSchema,
  NarrationTemplatesSchema,
  NpcTemplateSchema,
  PlayerDefaultsSchema,
  type ContentBundle,
  type ItemTemplate,
  type LocationDefinition,
  type NarrationTemplates,
  type NpcTemplate,
  type PlayerDefaults,
} from './content.types.js';

export const DEFAULT_CONTENT_DIR = join(process.cwd(), 'content', 'world_v1');

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private locations = new Map<string, LocationDefinition>();
  private npcs = new Map<string, NpcTemplate>();
  private items = new Map<string, ItemTemplate>();
  private playerDefaults: PlayerDefaults | null = null;
  private narration: NarrationTemplates | null = null;

  async onModuleInit(): Promise<void> {
    await this.loadFrom(process.env.CONTENT_DIR ?? DEFAULT_CONTENT_DIR);
  }

  async loadFrom(dir: string): Promise<void> {
    const [locationsRaw, npcsRaw, itemsRaw, defaultsRaw, narrationRaw] = await Promise.all([
      this.readJson(dir, 'locations.json'),
      this.readJson(dir, 'npcs.json'),
      this.readJson(dir, 'items.json'),
      this.readJson(dir, 'player_defaults.json'),
      this.readJson(dir, 'narration_templates.json'),
    ]);

    this.use({
      locations: this.parse('locations.json', z.array(LocationDefinitionSchema), locationsRaw),
      npcs: this.parse('npcs.json', z.array(NpcTemplateSchema), npcsRaw),
      items: this.parse('items.json', z.array(ItemTemplateSchema), itemsRaw),
      playerDefaults: this.parse('player_defaults.json', PlayerDefaultsSchema, defaultsRaw),
      narration: this.parse('narration_templates.json', NarrationTemplatesSchema, narrationRaw),
    });
    this.logger.log(
      `Content loaded from ${dir}: ${this.locations.size} locations, ${this.npcs.size} npcs, ${this.items.size} items`,
    );
  }

  /** Replaces the cache with an already-parsed bundle; cross references are checked. */
  use(bundle: ContentBundle): void {
    const locations = new Map(bundle.locations.map((l) => [l.locationId, l]));
    const npcs = new Map(bundle.npcs.map((n) => [n.npcId, n]));
    const items = new Map(bundle.items.map((i) => [i.itemId, i]));

    const problems: string[] = [];
    for (const loc of bundle.locations) {
      for (const exit of loc.exits) {
        if (!locations.has(exit)) problems.push(`${loc.locationId}: unknown exit "${exit}"`);
      }
      for (const resident of loc.residents) {
        if (!npcs.has(resident)) problems.push(`${loc.locationId}: unknown resident "${resident}"`);
      }
    }
    for (const npc of bundle.npcs) {
      for (const itemId of Object.keys(npc.inventory)) {
        if (!items.has(itemId)) problems.push(`${npc.npcId}: unknown item "${itemId}"`);
      }
    }
    if (!locations.has(bundle.playerDefaults.startingLocationId)) {
      problems.push(`player_defaults: unknown starting location "${bundle.playerDefaults.startingLocationId}"`);
    }
    for (const itemId of Object.keys(bundle.playerDefaults.inventory)) {
      if (!items.has(itemId)) problems.push(`player_defaults: unknown item "${itemId}"`);
    }
    if (problems.length > 0) {
      throw new ConfigurationError('World content has dangling references', { problems });
    }

    this.locations = locations;
    this.npcs = npcs;
    this.items = items;
    this.playerDefaults = bundle.playerDefaults;
    this.narration = bundle.narration;
  }

  getLocations(): LocationDefinition[] {
    return [...this.locations.values()];
  }

  getNpcTemplate(npcId: string): NpcTemplate | undefined {
    return this.npcs.get(npcId);
  }

  getItems(): ItemTemplate[] {
    return [...this.items.values()];
  }

  getPlayerDefaults(): PlayerDefaults {
    if (!this.playerDefaults) throw new ConfigurationError('World content not loaded');
    return this.playerDefaults;
  }

  getNarration(): NarrationTemplates {
    if (!this.narration) throw new ConfigurationError('World content not loaded');
    return this.narration;
  }

  private async readJson(dir: string, file: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(join(dir, file), 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Cannot read content file ${file}`, { dir, cause: String(err) });
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`Content file ${file} is not valid JSON`, { cause: String(err) });
    }
  }

  private parse<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(`Content file ${file} does not match its schema`, {
        issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return result.data;
  }
}
