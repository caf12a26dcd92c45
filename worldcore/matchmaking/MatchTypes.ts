// worldcore/matchmaking/MatchTypes.ts

import { PlayerId, PlayerInfo, clonePlayer } from "../shared/GameTypes";

export const GAME_MODES = ["duel", "arena3v3", "battleground"] as const;
export type GameMode = (typeof GAME_MODES)[number];

export type MatchState = "waiting" | "ready" | "inProgress" | "completed" | "cancelled";

export type MatchId = number;

export interface QueueTicket {
  ticketId: number;
  player: PlayerInfo;
  mode: GameMode;
  enqueuedAt: number;
  estimatedWaitSecs: number;
}

export interface Match {
  id: MatchId;
  mode: GameMode;
  state: MatchState;
  teamA: PlayerInfo[];
  teamB: PlayerInfo[];
  readyPlayers: Set<PlayerId>;
  createdAt: number;
}

/** Wire view of a match; the ready set stays internal. */
export interface MatchInfo {
  id: MatchId;
  mode: GameMode;
  state: MatchState;
  teamA: PlayerInfo[];
  teamB: PlayerInfo[];
  createdAt: number;
}

export interface PlayerMatchStats {
  player: PlayerInfo;
  kills: number;
  deaths: number;
  assists: number;
  score: number;
}

export interface MatchResult {
  matchId: MatchId;
  winningTeam: number;
  // seconds
  duration: number;
  playerStats: PlayerMatchStats[];
}

export const ESTIMATED_WAIT_SECS = 30;

// Synthesized opponents take the player's id shifted by this offset.
export const BOT_ID_OFFSET = 1000;

export function matchInfo(m: Match): MatchInfo {
  return {
    id: m.id,
    mode: m.mode,
    state: m.state,
    teamA: m.teamA.map(clonePlayer),
    teamB: m.teamB.map(clonePlayer),
    createdAt: m.createdAt,
  };
}

export function cloneResult(r: MatchResult): MatchResult {
  return {
    matchId: r.matchId,
    winningTeam: r.winningTeam,
    duration: r.duration,
    playerStats: r.playerStats.map((ps) => ({ ...ps, player: clonePlayer(ps.player) })),
  };
}
