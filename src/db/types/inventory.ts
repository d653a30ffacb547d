/** itemId → count. Zero counts are removed, never stored. */
export type Inventory = Record<string, number>;

export function countOf(inventory: Inventory, itemId: string): number {
  return inventory[itemId] ?? 0;
}

export function addItem(inventory: Inventory, itemId: string, quantity = 1): void {
  inventory[itemId] = countOf(inventory, itemId) + quantity;
}

/** false when the holder has fewer than `quantity`; inventory is left untouched then */
export function removeItem(inventory: Inventory, itemId: string, quantity = 1): boolean {
  const held = countOf(inventory, itemId);
  if (held < quantity) return false;
  if (held === quantity) {
    delete inventory[itemId];
  } else {
    inventory[itemId] = held - quantity;
  }
  return true;
}
