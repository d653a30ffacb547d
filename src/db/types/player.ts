import type { Inventory } from './inventory.js';

export interface PlayerCharacter {
  id: string;
  name: string;
  characterClass: string;
  /** stat name → integer, all >= 0 */
  stats: Record<string, number>;
  inventory: Inventory;
  locationId: string;
}
