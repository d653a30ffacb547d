import { z } from 'zod';
import { NPC_ROLE } from '../db/types/index.js';

const InventorySchema = z.record(z.string(), z.number().int().positive());

export const LocationDefinitionSchema = z.object({
  locationId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  exits: z.array(z.string()),
  residents: z.array(z.string()),
});
export type LocationDefinition = z.infer<typeof LocationDefinitionSchema>;

export const NpcTemplateSchema = z.object({
  npcId: z.string().min(1),
  name: z.string().min(1),
  role: z.enum(NPC_ROLE),
  description: z.string(),
  disposition: z.number().int(),
  inventory: InventorySchema,
  health: z.number().int().min(1).default(30),
  strength: z.number().int().min(0).default(5),
});
export type NpcTemplate = z.infer<typeof NpcTemplateSchema>;

export const ItemTemplateSchema = z.object({
  itemId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
});
export type ItemTemplate = z.infer<typeof ItemTemplateSchema>;

export const PlayerDefaultsSchema = z.object({
  name: z.string().min(1),
  characterClass: z.string().min(1),
  stats: z.record(z.string(), z.number().int().min(0)),
  inventory: InventorySchema,
  startingLocationId: z.string().min(1),
  flags: z.array(z.string()),
});
export type PlayerDefaults = z.infer<typeof PlayerDefaultsSchema>;

export const NarrationTemplatesSchema = z.object({
  turnFallback: z.string().min(1),
  gameOver: z.string().min(1),
  victory: z.string().min(1),
  unknownExit: z.string().min(1),
  noSuchQuest: z.string().min(1),
  saveFailed: z.string().min(1),
  help: z.string().min(1),
});
export type NarrationTemplates = z.infer<typeof NarrationTemplatesSchema>;

export interface ContentBundle {
  locations: LocationDefinition[];
  npcs: NpcTemplate[];
  items: ItemTemplate[];
  playerDefaults: PlayerDefaults;
  narration: NarrationTemplates;
}
