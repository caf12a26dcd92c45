// worldcore/matchmaking/MatchHandle.ts

import type { PlayerInfo } from "../shared/GameTypes";
import { Failure, NotFound, Ok, OK, fail, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import type { MatchmakingRegistry } from "./MatchmakingRegistry";
import { MatchId, MatchInfo, MatchResult, cloneResult, matchInfo } from "./MatchTypes";

const log = Logger.scope("MATCHMAKING");

export type SignalReadyResult = Ok<{ allReady: boolean }> | NotFound | Failure<"invalidArgument">;
export type ReportResultResult = Ok | NotFound | Failure<"invalidArgument">;

/** Controller for one match; holds only the match id. */
export class MatchHandle {
  constructor(
    private readonly registry: MatchmakingRegistry,
    readonly matchId: MatchId,
  ) {}

  getInfo(): Ok<{ info: MatchInfo }> | NotFound {
    return this.registry.region.run((s) => {
      const m = s.matches.get(this.matchId);
      return m ? ok({ info: matchInfo(m) }) : notFound();
    });
  }

  /**
   * Idempotent per player. allReady is true only on the call that first
   * fills the ready set to the roster size; that call starts the match.
   * Players outside the roster and closed matches are rejected.
   */
  signalReady(player: PlayerInfo): SignalReadyResult {
    const result = this.registry.region.run((s): SignalReadyResult => {
      const m = s.matches.get(this.matchId);
      if (!m) return notFound();
      if (m.state === "completed" || m.state === "cancelled") return fail("invalidArgument");
      const onRoster = [...m.teamA, ...m.teamB].some((p) => p.id === player.id);
      if (!onRoster) return fail("invalidArgument");

      const total = m.teamA.length + m.teamB.length;
      const wasReady = m.readyPlayers.size >= total;
      m.readyPlayers.add(player.id);

      const allReady = !wasReady && m.readyPlayers.size >= total;
      if (allReady) {
        m.state = "inProgress";
      }
      return ok({ allReady });
    });

    if (result.status === "ok" && result.allReady) {
      log.info("Match started", { matchId: this.matchId });
    }
    return result;
  }

  /** The payload must name this controller's match; anything else is rejected. */
  reportResult(result: MatchResult): ReportResultResult {
    if (result.matchId !== this.matchId) {
      log.warn("reportResult: foreign match id", {
        matchId: this.matchId,
        reported: result.matchId,
      });
      return fail("invalidArgument");
    }

    const stored = this.registry.region.run((s) => {
      const m = s.matches.get(this.matchId);
      if (!m) return false;
      m.state = "completed";
      s.results.set(this.matchId, cloneResult(result));
      return true;
    });

    if (!stored) return notFound();
    log.info("Match completed", { matchId: this.matchId, winningTeam: result.winningTeam });
    return OK;
  }

  cancelMatch(): Ok | NotFound {
    const found = this.registry.region.run((s) => {
      const m = s.matches.get(this.matchId);
      if (!m) return false;
      m.state = "cancelled";
      return true;
    });
    return found ? OK : notFound();
  }
}
