// worldcore/shared/Entity.ts

import type { Faction, Vec3 } from "./GameTypes";

export const ENTITY_KINDS = ["player", "npc", "monster", "projectile"] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export type EntityId = number;

export interface Entity {
  // Positive, assigned in spawn order, never reused
  id: EntityId;

  kind: EntityKind;

  // Cosmetic / label
  name: string;

  position: Vec3;

  // 0 <= health <= maxHealth
  health: number;
  maxHealth: number;

  faction: Faction;

  // Flips to false when damage brings health to 0
  alive: boolean;
}

export interface SpawnRequest {
  kind: EntityKind;
  name: string;
  position: Vec3;
  faction: Faction;
  maxHealth: number;
}

export type AreaFilter =
  | { type: "all" }
  | { type: "byKind"; kind: EntityKind }
  | { type: "byFaction"; faction: Faction };

export interface AreaQuery {
  center: Vec3;
  radius: number;
  filter: AreaFilter;
}
