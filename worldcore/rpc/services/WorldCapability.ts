// worldcore/rpc/services/WorldCapability.ts

import type { EntityWorld } from "../../core/EntityWorld";
import { CapabilityServer, method } from "../Capability";
import {
  damageParams,
  entityIdParams,
  moveParams,
  queryAreaParams,
  spawnParams,
} from "../schemas";

export class WorldCapability extends CapabilityServer {
  constructor(world: EntityWorld) {
    super("world", {
      spawn: method(spawnParams, (p) => world.spawn(p)),
      get: method(entityIdParams, (p) => world.get(p.id)),
      move: method(moveParams, (p) => world.move(p.id, p.position)),
      damage: method(damageParams, (p) => world.damage(p.id, p.amount)),
      despawn: method(entityIdParams, (p) => world.despawn(p.id)),
      queryArea: method(queryAreaParams, (p) => world.queryArea(p)),
    });
  }
}
