// worldcore/rpc/services/MatchmakingCapability.ts

import type { MatchHandle } from "../../matchmaking/MatchHandle";
import type { MatchmakingRegistry } from "../../matchmaking/MatchmakingRegistry";
import { CapabilityServer, method } from "../Capability";
import {
  matchIdParams,
  modeParams,
  noParams,
  playerParams,
  queueParams,
  reportResultParams,
  ticketParams,
} from "../schemas";

export class MatchCapability extends CapabilityServer {
  constructor(readonly match: MatchHandle) {
    super("match", {
      getInfo: method(noParams, () => match.getInfo()),
      signalReady: method(playerParams, (p) => match.signalReady(p.player)),
      reportResult: method(reportResultParams, (p) => match.reportResult(p.result)),
      cancelMatch: method(noParams, () => match.cancelMatch()),
    });
  }
}

export class MatchmakingCapability extends CapabilityServer {
  constructor(registry: MatchmakingRegistry) {
    super("matchmaking", {
      enqueue: method(queueParams, (p) => registry.enqueue(p.player, p.mode)),
      dequeue: method(ticketParams, (p) => registry.dequeue(p.ticketId)),
      findMatch: method(queueParams, (p, ctx) => {
        const { matchId, controller } = registry.findMatch(p.player, p.mode);
        return { matchId, controller: ctx.export(new MatchCapability(controller)) };
      }),
      getQueueStats: method(modeParams, (p) => registry.getQueueStats(p.mode)),
      getMatchResult: method(matchIdParams, (p) => registry.getMatchResult(p.matchId)),
    });
  }
}
