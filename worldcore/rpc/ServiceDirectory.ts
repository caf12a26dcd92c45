// worldcore/rpc/ServiceDirectory.ts
//
// Registries and their bootstrap capabilities, built once per process.
// Every connection that bootstraps a service gets the same object.

import { ChatDirectory } from "../chat/ChatDirectory";
import { EntityWorld } from "../core/EntityWorld";
import { InventoryStore } from "../inventory/InventoryStore";
import { MatchmakingRegistry } from "../matchmaking/MatchmakingRegistry";
import { TradeRegistry } from "../trade/TradeRegistry";
import { Clock, systemClock } from "../shared/GameTypes";
import type { CapabilityServer } from "./Capability";
import { ChatCapability } from "./services/ChatCapability";
import { InventoryCapability } from "./services/InventoryCapability";
import { MatchmakingCapability } from "./services/MatchmakingCapability";
import { WorldCapability } from "./services/WorldCapability";

export const SERVICE_NAMES = ["world", "chat", "inventory", "matchmaking"] as const;
export type ServiceName = (typeof SERVICE_NAMES)[number];

export function toServiceName(name: string): ServiceName | undefined {
  return SERVICE_NAMES.find((n) => n === name);
}

export interface Registries {
  world: EntityWorld;
  chat: ChatDirectory;
  inventory: InventoryStore;
  matchmaking: MatchmakingRegistry;
}

export function createRegistries(clock: Clock = systemClock): Registries {
  return {
    world: new EntityWorld(),
    chat: new ChatDirectory(clock),
    inventory: new InventoryStore(new TradeRegistry(clock)),
    matchmaking: new MatchmakingRegistry(clock),
  };
}

export class ServiceDirectory {
  private readonly services = new Map<ServiceName, CapabilityServer>();

  constructor(
    readonly registries: Registries,
    exposed: readonly ServiceName[] = SERVICE_NAMES,
  ) {
    for (const name of exposed) {
      this.services.set(name, ServiceDirectory.build(name, registries));
    }
  }

  /** Undefined for unknown names and for services this process does not expose. */
  get(name: string): CapabilityServer | undefined {
    const key = toServiceName(name);
    return key ? this.services.get(key) : undefined;
  }

  names(): ServiceName[] {
    return Array.from(this.services.keys());
  }

  private static build(name: ServiceName, r: Registries): CapabilityServer {
    switch (name) {
      case "world":
        return new WorldCapability(r.world);
      case "chat":
        return new ChatCapability(r.chat);
      case "inventory":
        return new InventoryCapability(r.inventory);
      case "matchmaking":
        return new MatchmakingCapability(r.matchmaking);
    }
  }
}
