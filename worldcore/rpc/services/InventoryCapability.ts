// worldcore/rpc/services/InventoryCapability.ts

import type { InventoryStore } from "../../inventory/InventoryStore";
import type { TradeHandle } from "../../trade/TradeHandle";
import { CapabilityServer, method } from "../Capability";
import {
  addItemParams,
  filterByRarityParams,
  joinTradeParams,
  noParams,
  playerParams,
  removeItemParams,
  slotsParams,
  startTradeParams,
} from "../schemas";

export class TradeCapability extends CapabilityServer {
  constructor(readonly trade: TradeHandle) {
    super("trade", {
      offerItems: method(slotsParams, (p) => trade.offerItems(p.slots)),
      removeItems: method(slotsParams, (p) => trade.removeItems(p.slots)),
      accept: method(noParams, () => trade.accept()),
      confirm: method(noParams, () => trade.confirm()),
      cancel: method(noParams, () => trade.cancel()),
      viewOtherOffer: method(noParams, () => trade.viewOtherOffer()),
      getState: method(noParams, () => trade.getState()),
    });
  }
}

export class InventoryCapability extends CapabilityServer {
  constructor(store: InventoryStore) {
    super("inventory", {
      getInventory: method(playerParams, (p) => store.getInventory(p.player)),
      addItem: method(addItemParams, (p) => store.addItem(p.player, p.item, p.quantity)),
      removeItem: method(removeItemParams, (p) =>
        store.removeItem(p.player, p.slotIndex, p.quantity),
      ),
      filterByRarity: method(filterByRarityParams, (p) =>
        store.filterByRarity(p.player, p.minRarity),
      ),
      startTrade: method(startTradeParams, (p, ctx) => {
        const res = store.startTrade(p.initiator, p.target);
        return { ...res, session: ctx.export(new TradeCapability(res.session)) };
      }),
      joinTrade: method(joinTradeParams, (p, ctx) => {
        const res = store.joinTrade(p.tradeId, p.player);
        if (res.status !== "ok") return res;
        return { ...res, session: ctx.export(new TradeCapability(res.session)) };
      }),
    });
  }
}
