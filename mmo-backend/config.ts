// mmo-backend/config.ts

import dotenv from "dotenv";

import {
  SERVICE_NAMES,
  ServiceName,
  toServiceName,
} from "../worldcore/rpc/ServiceDirectory";

// Only fills keys that are not already set in the environment.
dotenv.config();

export interface NetworkConfig {
  host: string;
  port: number;
  path: string;
  services: ServiceName[];
  // Names in SK_SERVICES that matched no service; reported at start-up
  unknownServices: string[];
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
}

// Defaults (human readable)
const DEFAULT_PORT                  = 4003;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;       // 5 seconds
const DEFAULT_IDLE_TIMEOUT_MS       = 10 * 60_000; // 10 minutes

function numberOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

/** Comma list, whitespace and case tolerant. Empty or unset means all. */
export function parseServices(raw: string | undefined): {
  services: ServiceName[];
  unknown: string[];
} {
  if (!raw || raw.trim() === "") {
    return { services: [...SERVICE_NAMES], unknown: [] };
  }

  const services: ServiceName[] = [];
  const unknown: string[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    const svc = toServiceName(name);
    if (!svc) {
      unknown.push(name);
    } else if (!services.includes(svc)) {
      services.push(svc);
    }
  }
  return { services, unknown };
}

export function loadNetConfig(env: NodeJS.ProcessEnv = process.env): NetworkConfig {
  const { services, unknown } = parseServices(env.SK_SERVICES);

  return {
    host: env.SK_HOST || "0.0.0.0",
    port: numberOr(env.SK_PORT, DEFAULT_PORT),
    path: env.SK_WS_PATH || "/rpc",
    services,
    unknownServices: unknown,

    // How often the Heartbeat sweeps sessions for idleness
    heartbeatIntervalMs: numberOr(env.SK_HEARTBEAT_INTERVAL, DEFAULT_HEARTBEAT_INTERVAL_MS),

    // How long a connection can send nothing before it is dropped
    idleTimeoutMs: numberOr(env.SK_IDLE_TIMEOUT, DEFAULT_IDLE_TIMEOUT_MS),
  };
}

export const netConfig: NetworkConfig = loadNetConfig();
