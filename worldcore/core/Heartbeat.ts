// worldcore/core/Heartbeat.ts

import { SessionManager } from "./SessionManager";
import { Logger } from "../utils/logger";

export interface HeartbeatConfig {
  intervalMs: number;    // how often to sweep sessions
  idleTimeoutMs: number; // how long before we drop an idle session
}

const log = Logger.scope("HEARTBEAT");

/**
 * One pass over all sessions. Anything silent for longer than idleTimeoutMs
 * is removed, which also releases its capabilities.
 *
 * Returns the ids that were dropped.
 */
export function sweepIdleSessions(
  sessions: SessionManager,
  idleTimeoutMs: number,
  now: number = sessions.now(),
): string[] {
  const idle: string[] = [];

  for (const session of sessions.getAllSessions()) {
    const delta = now - session.lastSeen;
    if (delta > idleTimeoutMs) {
      idle.push(session.id);
      log.info("Removing idle session", {
        sessionId: session.id,
        idleMs: delta,
      });
    }
  }

  // Removal mutates the session map, so it happens after the scan.
  for (const id of idle) {
    sessions.removeSession(id, "idle_timeout");
  }

  return idle;
}

/**
 * Periodic idle sweep. Does not hold the process open.
 */
export function startHeartbeat(
  sessions: SessionManager,
  cfg: HeartbeatConfig
): NodeJS.Timeout {
  // Don’t allow silly sub-second sweeps; this is a coarse-grained cleanup loop.
  const intervalMs = Math.max(cfg.intervalMs, 1000);
  const idleTimeoutMs = Math.max(cfg.idleTimeoutMs, intervalMs * 2);

  log.info("Starting heartbeat", {
    intervalMs,
    idleTimeoutMs,
  });

  let sweepCount = 0;

  const handle = setInterval(() => {
    sweepCount++;
    const total = sessions.count();
    const timedOut = sweepIdleSessions(sessions, idleTimeoutMs).length;

    // Only log summaries occasionally or when we actually did work
    if (timedOut > 0 || sweepCount % 30 === 0) {
      log.debug("Heartbeat sweep complete", {
        sweep: sweepCount,
        activeSessions: total - timedOut,
        timedOut,
      });
    }
  }, intervalMs);

  handle.unref();

  return handle;
}
