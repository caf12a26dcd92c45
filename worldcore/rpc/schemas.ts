// worldcore/rpc/schemas.ts
//
// Params schemas for every callable method, grouped by capability.

import { z } from "zod";

import { FACTIONS } from "../shared/GameTypes";
import { ENTITY_KINDS } from "../shared/Entity";
import { RARITIES } from "../inventory/InventoryTypes";
import { BOT_ID_OFFSET, GAME_MODES } from "../matchmaking/MatchTypes";

const id = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
const count = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const factionSchema = z.enum(FACTIONS);

// Leaves room for the bot opponent id derived from a player id.
const playerId = id.max(Number.MAX_SAFE_INTEGER - BOT_ID_OFFSET);

export const playerInfoSchema = z.object({
  id: playerId,
  name: z.string(),
  faction: factionSchema,
  level: count,
});

export const vec3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const noParams = z.object({});

// ---------------------------------------------------------------------------
// world
// ---------------------------------------------------------------------------

export const areaFilterSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("all") }),
  z.object({ type: z.literal("byKind"), kind: z.enum(ENTITY_KINDS) }),
  z.object({ type: z.literal("byFaction"), faction: factionSchema }),
]);

export const spawnParams = z.object({
  kind: z.enum(ENTITY_KINDS),
  name: z.string(),
  position: vec3Schema,
  faction: factionSchema,
  maxHealth: z.number().int().nonnegative(),
});

export const entityIdParams = z.object({ id });

export const moveParams = z.object({ id, position: vec3Schema });

export const damageParams = z.object({ id, amount: z.number().nonnegative() });

export const queryAreaParams = z.object({
  center: vec3Schema,
  radius: z.number().nonnegative(),
  filter: areaFilterSchema.default({ type: "all" }),
});

// ---------------------------------------------------------------------------
// chat
// ---------------------------------------------------------------------------

export const createRoomParams = z.object({ name: z.string().min(1), topic: z.string().default("") });

export const joinRoomParams = z.object({ name: z.string(), player: playerInfoSchema });

export const whisperParams = z.object({
  from: playerInfoSchema,
  to: z.object({ id: playerId }),
  content: z.string(),
});

export const contentParams = z.object({ content: z.string() });

export const historyParams = z.object({ limit: count });

// ---------------------------------------------------------------------------
// inventory / trade
// ---------------------------------------------------------------------------

export const itemSchema = z.object({
  id,
  name: z.string(),
  rarity: z.enum(RARITIES),
  level: count,
  stackSize: count,
  attributes: z.array(z.object({ name: z.string(), value: z.number() })).default([]),
});

export const playerParams = z.object({ player: playerInfoSchema });

export const addItemParams = z.object({
  player: playerInfoSchema,
  item: itemSchema,
  quantity: z.number().int().positive(),
});

export const removeItemParams = z.object({
  player: playerInfoSchema,
  slotIndex: count,
  quantity: z.number().int().positive(),
});

export const filterByRarityParams = z.object({
  player: playerInfoSchema,
  minRarity: z.enum(RARITIES),
});

export const startTradeParams = z.object({
  initiator: playerInfoSchema,
  target: playerInfoSchema,
});

export const joinTradeParams = z.object({ tradeId: id, player: playerInfoSchema });

export const slotsParams = z.object({ slots: z.array(count) });

// ---------------------------------------------------------------------------
// matchmaking
// ---------------------------------------------------------------------------

export const gameModeSchema = z.enum(GAME_MODES);

export const queueParams = z.object({ player: playerInfoSchema, mode: gameModeSchema });

export const ticketParams = z.object({ ticketId: id });

export const modeParams = z.object({ mode: gameModeSchema });

export const matchIdParams = z.object({ matchId: id });

export const matchResultSchema = z.object({
  matchId: id,
  winningTeam: count,
  duration: count,
  playerStats: z.array(
    z.object({
      player: playerInfoSchema,
      kills: count,
      deaths: count,
      assists: count,
      score: z.number().int(),
    }),
  ),
});

export const reportResultParams = z.object({ result: matchResultSchema });
