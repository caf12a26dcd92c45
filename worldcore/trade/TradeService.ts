// worldcore/trade/TradeService.ts

import type { PlayerInfo } from "../shared/GameTypes";
import type { Failure, NotFound, Ok } from "../shared/Status";
import type { TradeHandle } from "./TradeHandle";

export type StartTradeResult = Ok<{ tradeId: number; session: TradeHandle }>;

export type JoinTradeResult =
  | Ok<{ session: TradeHandle }>
  | NotFound
  | Failure<"invalidArgument">;

export interface TradeService {
  /**
   * Register a trade in state "proposing" and return a facade bound to the
   * initiator's side.
   */
  startTrade(initiator: PlayerInfo, target: PlayerInfo): StartTradeResult;

  /** Facade bound to the target's side of an existing trade. */
  joinTrade(tradeId: number, player: PlayerInfo): JoinTradeResult;
}
