// worldcore/inventory/InventoryStore.ts
//
// Per-player slotted inventories plus the trade registry that references
// their slot indexes. Capacity is reported, not enforced.

import { Region } from "../core/Region";
import type { PlayerId, PlayerInfo } from "../shared/GameTypes";
import { Failure, NotFound, Ok, OK, fail, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import { TradeRegistry } from "../trade/TradeRegistry";
import type { JoinTradeResult, StartTradeResult } from "../trade/TradeService";
import {
  INVENTORY_CAPACITY,
  Inventory,
  InventorySlot,
  Item,
  Rarity,
  rarityRank,
} from "./InventoryTypes";

const log = Logger.scope("INVENTORY");

interface PlayerInventory {
  slots: InventorySlot[];
  // Next slotIndex to hand out; never rewinds, so indexes are not reused
  nextSlot: number;
}

interface InventoryState {
  players: Map<PlayerId, PlayerInventory>;
}

export type RemoveItemResult = Ok | NotFound | Failure<"invalidArgument">;

function cloneItem(item: Item): Item {
  return { ...item, attributes: item.attributes.map((a) => ({ ...a })) };
}

function cloneSlot(slot: InventorySlot): InventorySlot {
  return { slotIndex: slot.slotIndex, item: cloneItem(slot.item), quantity: slot.quantity };
}

export class InventoryStore {
  private readonly region = new Region<InventoryState>("inventory", {
    players: new Map(),
  });

  readonly trades: TradeRegistry;

  constructor(trades: TradeRegistry = new TradeRegistry()) {
    this.trades = trades;
  }

  /** An unknown player reads as an empty inventory; nothing is created. */
  getInventory(player: PlayerInfo): Ok<{ inventory: Inventory }> {
    const slots = this.region.run((s) => {
      const inv = s.players.get(player.id);
      return inv ? inv.slots.map(cloneSlot) : [];
    });

    return ok({
      inventory: {
        owner: player.id,
        slots,
        capacity: INVENTORY_CAPACITY,
        usedSlots: slots.length,
      },
    });
  }

  addItem(player: PlayerInfo, item: Item, quantity: number): Ok<{ slot: InventorySlot }> {
    const slot = this.region.run((s) => {
      let inv = s.players.get(player.id);
      if (!inv) {
        inv = { slots: [], nextSlot: 0 };
        s.players.set(player.id, inv);
      }

      const added: InventorySlot = {
        slotIndex: inv.nextSlot,
        item: cloneItem(item),
        quantity,
      };
      inv.nextSlot += 1;
      inv.slots.push(added);
      return cloneSlot(added);
    });

    log.debug("Item added", { playerId: player.id, slotIndex: slot.slotIndex, itemId: item.id });
    return ok({ slot });
  }

  removeItem(player: PlayerInfo, slotIndex: number, quantity: number): RemoveItemResult {
    return this.region.run((s): RemoveItemResult => {
      const inv = s.players.get(player.id);
      if (!inv) return notFound();

      const pos = inv.slots.findIndex((sl) => sl.slotIndex === slotIndex);
      if (pos < 0) return notFound();

      const slot = inv.slots[pos];
      if (quantity > slot.quantity) return fail("invalidArgument");

      slot.quantity -= quantity;
      if (slot.quantity === 0) {
        inv.slots.splice(pos, 1);
      }
      return OK;
    });
  }

  /** Slots at or above `minRarity`, in stored order. */
  filterByRarity(player: PlayerInfo, minRarity: Rarity): { items: InventorySlot[] } {
    const min = rarityRank(minRarity);
    const items = this.region.run((s) => {
      const inv = s.players.get(player.id);
      if (!inv) return [];
      return inv.slots.filter((sl) => rarityRank(sl.item.rarity) >= min).map(cloneSlot);
    });
    return { items };
  }

  startTrade(initiator: PlayerInfo, target: PlayerInfo): StartTradeResult {
    return this.trades.startTrade(initiator, target);
  }

  joinTrade(tradeId: number, player: PlayerInfo): JoinTradeResult {
    return this.trades.joinTrade(tradeId, player);
  }
}
