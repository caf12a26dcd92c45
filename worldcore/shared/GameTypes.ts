// worldcore/shared/GameTypes.ts
//
// Value types shared by every service: players, factions, positions, clocks.

export const FACTIONS = ["neutral", "alliance", "horde", "pirates"] as const;
export type Faction = (typeof FACTIONS)[number];

export type PlayerId = number;

/** Snapshot of a player as supplied by the caller. Never live-linked. */
export interface PlayerInfo {
  id: PlayerId;
  name: string;
  faction: Faction;
  level: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Unix milliseconds. Injected so tests can pin timestamps. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function clonePlayer(p: PlayerInfo): PlayerInfo {
  return { id: p.id, name: p.name, faction: p.faction, level: p.level };
}
