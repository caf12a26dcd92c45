// worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "debug",
  RPC: "info",
  CAPS: "info",
  SESSIONS: "info",
  HEARTBEAT: "info",

  WORLD: "info",
  CHAT: "info",
  INVENTORY: "info",
  TRADE: "info",
  MATCHMAKING: "info",
};

// Allow env overrides like LOG_SCOPE_CHAT=debug, LOG_SCOPE_RPC=warn, etc.
export function getScopeLevel(
  scope: string,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Default table
  const fromTable = PER_SCOPE_DEFAULTS[key];
  if (fromTable) return fromTable;

  // 3) Global fallback
  return parseLevel(env.LOG_LEVEL) ?? "info";
}

export function logEnabled(
  scope: string,
  level: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const effective = getScopeLevel(scope, env);
  return ORDER.indexOf(level) >= ORDER.indexOf(effective);
}
