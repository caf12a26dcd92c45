// worldcore/inventory/InventoryTypes.ts

import type { PlayerId } from "../shared/GameTypes";

export const RARITIES = ["common", "uncommon", "rare", "epic", "legendary"] as const;
export type Rarity = (typeof RARITIES)[number];

export function rarityRank(r: Rarity): number {
  return RARITIES.indexOf(r);
}

export interface ItemAttribute {
  name: string;
  value: number;
}

export interface Item {
  id: number;
  name: string;
  rarity: Rarity;
  level: number;
  stackSize: number;
  attributes: ItemAttribute[];
}

export interface InventorySlot {
  slotIndex: number;
  item: Item;
  // > 0 while the slot exists
  quantity: number;
}

export interface Inventory {
  owner: PlayerId;
  slots: InventorySlot[];
  capacity: number;
  usedSlots: number;
}

export const INVENTORY_CAPACITY = 50;
