// worldcore/trade/TradeTypes.ts

import type { PlayerId } from "../shared/GameTypes";

export type TradeState = "proposing" | "accepted" | "confirmed" | "cancelled";

export type TradeSideName = "initiator" | "target";

export interface TradeSide {
  playerId: PlayerId;
  // Offered inventory slot indexes, in offer order
  offeredSlots: number[];
  accepted: boolean;
}

export interface TradeSession {
  id: number;
  initiator: TradeSide;
  target: TradeSide;
  state: TradeState;
  createdAt: number;
}

export interface TradeOfferItem {
  slotIndex: number;
  quantity: number;
}

/** Wire view of one side's offer. Each offered slot counts as one unit. */
export interface TradeOffer {
  offeredItems: TradeOfferItem[];
  accepted: boolean;
}

export function otherSide(side: TradeSideName): TradeSideName {
  return side === "initiator" ? "target" : "initiator";
}

export function toOffer(side: TradeSide): TradeOffer {
  return {
    offeredItems: side.offeredSlots.map((slotIndex) => ({ slotIndex, quantity: 1 })),
    accepted: side.accepted,
  };
}

/** Offers and acceptance are frozen once a trade is closed. */
export function isClosed(state: TradeState): boolean {
  return state === "confirmed" || state === "cancelled";
}
