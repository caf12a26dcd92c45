// worldcore/matchmaking/MatchmakingRegistry.ts
//
// Ticket queue, match registry and result store behind one region.
// findMatch does not draw from the queue: it pairs the caller with a bot.

import { IdSequence, Region } from "../core/Region";
import { Clock, PlayerInfo, clonePlayer, systemClock } from "../shared/GameTypes";
import { NotFound, Ok, OK, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import { MatchHandle } from "./MatchHandle";
import {
  BOT_ID_OFFSET,
  ESTIMATED_WAIT_SECS,
  GameMode,
  Match,
  MatchId,
  MatchResult,
  QueueTicket,
  cloneResult,
} from "./MatchTypes";

const log = Logger.scope("MATCHMAKING");

export interface MatchmakingState {
  // Unordered; removal is by ticket id
  queue: QueueTicket[];
  matches: Map<MatchId, Match>;
  results: Map<MatchId, MatchResult>;
  ticketIds: IdSequence;
  matchIds: IdSequence;
}

export interface QueueStats {
  playersInQueue: number;
  avgWaitSecs: number;
}

export class MatchmakingRegistry {
  readonly region = new Region<MatchmakingState>("matchmaking", {
    queue: [],
    matches: new Map(),
    results: new Map(),
    ticketIds: new IdSequence(),
    matchIds: new IdSequence(),
  });

  constructor(readonly clock: Clock = systemClock) {}

  enqueue(player: PlayerInfo, mode: GameMode): Ok<{ ticket: QueueTicket }> {
    const enqueuedAt = this.clock();
    const ticket = this.region.run((s) => {
      const t: QueueTicket = {
        ticketId: s.ticketIds.take(),
        player: clonePlayer(player),
        mode,
        enqueuedAt,
        estimatedWaitSecs: ESTIMATED_WAIT_SECS,
      };
      s.queue.push(t);
      return { ...t, player: clonePlayer(t.player) };
    });

    log.debug("Enqueued", { ticketId: ticket.ticketId, playerId: player.id, mode });
    return ok({ ticket });
  }

  dequeue(ticketId: number): Ok | NotFound {
    const removed = this.region.run((s) => {
      const before = s.queue.length;
      s.queue = s.queue.filter((t) => t.ticketId !== ticketId);
      return s.queue.length < before;
    });
    return removed ? OK : notFound();
  }

  findMatch(player: PlayerInfo, mode: GameMode): { matchId: MatchId; controller: MatchHandle } {
    const createdAt = this.clock();
    const matchId = this.region.run((s) => {
      const id = s.matchIds.take();
      const bot: PlayerInfo = {
        id: player.id + BOT_ID_OFFSET,
        name: `Bot_${id}`,
        faction: "horde",
        level: player.level,
      };
      s.matches.set(id, {
        id,
        mode,
        state: "ready",
        teamA: [clonePlayer(player)],
        teamB: [bot],
        readyPlayers: new Set(),
        createdAt,
      });
      return id;
    });

    log.info("Match created", { matchId, mode, playerId: player.id });
    return { matchId, controller: new MatchHandle(this, matchId) };
  }

  getQueueStats(mode: GameMode): QueueStats {
    const playersInQueue = this.region.run(
      (s) => s.queue.filter((t) => t.mode === mode).length,
    );
    return {
      playersInQueue,
      avgWaitSecs: playersInQueue > 0 ? ESTIMATED_WAIT_SECS : 0,
    };
  }

  getMatchResult(matchId: MatchId): Ok<{ result: MatchResult }> | NotFound {
    return this.region.run((s) => {
      const r = s.results.get(matchId);
      return r ? ok({ result: cloneResult(r) }) : notFound();
    });
  }
}
