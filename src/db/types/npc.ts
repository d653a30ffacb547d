import type { NpcRole } from './enums.js';
import type { Inventory } from './inventory.js';

export interface NpcSeed {
  npcId: string;
  name: string;
  role: NpcRole;
  description: string;
  disposition: number;
  inventory: Inventory;
  health: number;
  strength: number;
}

export interface NpcState {
  npcId: string;
  name: string;
  role: NpcRole;
  description: string;
  locationId: string;
  /** bounded by the configured disposition range */
  disposition: number;
  inventory: Inventory;
  health: number;
  maxHealth: number;
  /** damage dealt when the NPC strikes back */
  strength: number;
  /** deactivated NPCs stay in the world for history, they are never deleted */
  active: boolean;
  introducedAtVersion: number;
}

export type DispositionLabel = 'hostile' | 'neutral' | 'friendly';

export function dispositionLabel(disposition: number): DispositionLabel {
  if (disposition < -20) return 'hostile';
  if (disposition > 20) return 'friendly';
  return 'neutral';
}
