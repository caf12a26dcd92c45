// worldcore/trade/TradeRegistry.ts
//
// Both participants of a trade share one session entry keyed by trade id.
// Each participant reaches it through its own TradeHandle bound to a side,
// so acceptance by one side is visible to the other.

import { IdSequence, Region } from "../core/Region";
import { Clock, PlayerInfo, systemClock } from "../shared/GameTypes";
import { fail, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import { TradeHandle } from "./TradeHandle";
import type { JoinTradeResult, StartTradeResult, TradeService } from "./TradeService";
import type { TradeSession } from "./TradeTypes";

const log = Logger.scope("TRADE");

export interface TradeRegistryState {
  sessions: Map<number, TradeSession>;
  ids: IdSequence;
}

export class TradeRegistry implements TradeService {
  readonly region = new Region<TradeRegistryState>("trade", {
    sessions: new Map(),
    ids: new IdSequence(),
  });

  constructor(private readonly clock: Clock = systemClock) {}

  startTrade(initiator: PlayerInfo, target: PlayerInfo): StartTradeResult {
    const createdAt = this.clock();
    const tradeId = this.region.run((s) => {
      const session: TradeSession = {
        id: s.ids.take(),
        initiator: { playerId: initiator.id, offeredSlots: [], accepted: false },
        target: { playerId: target.id, offeredSlots: [], accepted: false },
        state: "proposing",
        createdAt,
      };
      s.sessions.set(session.id, session);
      return session.id;
    });

    log.info("Trade started", { tradeId, initiator: initiator.id, target: target.id });
    return ok({ tradeId, session: new TradeHandle(this, tradeId, "initiator") });
  }

  joinTrade(tradeId: number, player: PlayerInfo): JoinTradeResult {
    const targetId = this.region.run((s) => s.sessions.get(tradeId)?.target.playerId);

    if (targetId === undefined) return notFound();
    if (targetId !== player.id) {
      log.debug("joinTrade: player is not the target", { tradeId, playerId: player.id });
      return fail("invalidArgument");
    }

    return ok({ session: new TradeHandle(this, tradeId, "target") });
  }

  /** Number of registered trades, closed ones included. */
  count(): number {
    return this.region.run((s) => s.sessions.size);
  }
}
