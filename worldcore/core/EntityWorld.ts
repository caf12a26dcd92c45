// worldcore/core/EntityWorld.ts

import { Region, IdSequence } from "./Region";
import type { AreaFilter, AreaQuery, Entity, EntityId, SpawnRequest } from "../shared/Entity";
import type { Vec3 } from "../shared/GameTypes";
import { NotFound, Ok, OK, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";

const log = Logger.scope("WORLD");

interface EntityWorldState {
  // Invariant: every live entity lives in this Map. Key = entity.id
  entities: Map<EntityId, Entity>;
  ids: IdSequence;
}

export type EntityResult = Ok<{ entity: Entity }> | NotFound;
export type DamageResult = Ok<{ entity: Entity; killed: boolean }> | NotFound;

export interface AreaQueryResult {
  entities: Entity[];
  count: number;
}

/** Results are snapshots; callers never hold the registry's own objects. */
function snapshot(e: Entity): Entity {
  return { ...e, position: { ...e.position } };
}

function distance(a: Vec3, b: Vec3): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

function matchesFilter(e: Entity, filter: AreaFilter): boolean {
  switch (filter.type) {
    case "all":
      return true;
    case "byKind":
      return e.kind === filter.kind;
    case "byFaction":
      return e.faction === filter.faction;
  }
}

export class EntityWorld {
  private readonly region = new Region<EntityWorldState>("world", {
    entities: new Map(),
    ids: new IdSequence(),
  });

  spawn(req: SpawnRequest): Ok<{ entity: Entity }> {
    const entity = this.region.run((s) => {
      const e: Entity = {
        id: s.ids.take(),
        kind: req.kind,
        name: req.name,
        position: { ...req.position },
        health: req.maxHealth,
        maxHealth: req.maxHealth,
        faction: req.faction,
        alive: true,
      };
      s.entities.set(e.id, e);
      return snapshot(e);
    });

    log.debug("Entity spawned", { entityId: entity.id, kind: entity.kind });
    return ok({ entity });
  }

  get(id: EntityId): EntityResult {
    return this.region.run((s) => {
      const e = s.entities.get(id);
      return e ? ok({ entity: snapshot(e) }) : notFound();
    });
  }

  /** Replaces position only. */
  move(id: EntityId, position: Vec3): EntityResult {
    return this.region.run((s) => {
      const e = s.entities.get(id);
      if (!e) return notFound();
      e.position = { ...position };
      return ok({ entity: snapshot(e) });
    });
  }

  damage(id: EntityId, amount: number): DamageResult {
    const result = this.region.run((s): DamageResult => {
      const e = s.entities.get(id);
      if (!e) return notFound();

      e.health = Math.max(0, e.health - amount);
      const killed = e.health === 0;
      if (killed) {
        e.alive = false;
      }
      return ok({ entity: snapshot(e), killed });
    });

    if (result.status === "ok" && result.killed) {
      log.debug("Entity killed", { entityId: id });
    }
    return result;
  }

  /**
   * Remove an entity. A second despawn of the same id is notFound,
   * the same as any id that was never spawned.
   */
  despawn(id: EntityId): Ok | NotFound {
    const removed = this.region.run((s) => s.entities.delete(id));
    if (!removed) return notFound();

    log.debug("Entity despawned", { entityId: id });
    return OK;
  }

  /**
   * Brute-force scan. The radius boundary is inclusive; no ordering
   * guarantee among results.
   */
  queryArea(query: AreaQuery): AreaQueryResult {
    const entities = this.region.run((s) => {
      const out: Entity[] = [];
      for (const e of s.entities.values()) {
        if (distance(e.position, query.center) > query.radius) continue;
        if (!matchesFilter(e, query.filter)) continue;
        out.push(snapshot(e));
      }
      return out;
    });

    return { entities, count: entities.length };
  }

  /** Number of live entities. */
  count(): number {
    return this.region.run((s) => s.entities.size);
  }
}
