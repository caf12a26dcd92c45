//worldcore/core/SessionManager.ts

import { CapabilityTable } from "../rpc/CapabilityTable";
import { Clock, systemClock } from "../shared/GameTypes";
import { Session, SessionSocket } from "../shared/Session";
import { ServerFrame } from "../shared/messages";
import { Logger } from "../utils/logger";

const log = Logger.scope("SESSIONS");

export class SessionManager {
  private sessions = new Map<string, Session>();
  private counter = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  // ---------------------------------------------------------------------------
  // Creation / lookup
  // ---------------------------------------------------------------------------

  /** Register a new connection with an empty capability table. */
  createSession(socket: SessionSocket, remote?: string): Session {
    const id = this.nextId();

    const session: Session = {
      id,
      socket,
      caps: new CapabilityTable(),
      lastSeen: this.clock(),
      remote,
    };

    this.sessions.set(id, session);

    log.info("Session created", { sessionId: id, remote });

    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  getAllSessions(): Iterable<Session> {
    return this.sessions.values();
  }

  count(): number {
    return this.sessions.size;
  }

  // ---------------------------------------------------------------------------
  // Activity / idle tracking
  // ---------------------------------------------------------------------------

  /** Called by RpcRouter for every well-formed frame. */
  touch(sessionId: string): void {
    const s = this.sessions.get(sessionId);
    if (!s) return;
    s.lastSeen = this.clock();
  }

  now(): number {
    return this.clock();
  }

  // ---------------------------------------------------------------------------
  // Sending frames
  // ---------------------------------------------------------------------------

  send(session: Session, frame: ServerFrame): void {
    const json = JSON.stringify(frame);

    try {
      session.socket.send(json);
    } catch (err) {
      log.warn("Failed to send frame to session", {
        sessionId: session.id,
        op: frame.op,
        err,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Removal / cleanup
  // ---------------------------------------------------------------------------

  /**
   * Drop the session, release every capability it held and close its socket.
   * Registry entries reached through those capabilities are left in place.
   */
  removeSession(id: string, reason = "session_removed"): void {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }

    this.sessions.delete(id);
    const released = session.caps.clear();

    try {
      session.socket.close(1000, reason);
    } catch (err) {
      log.warn("Error closing socket for session", {
        sessionId: id,
        err,
      });
    }

    log.info("Session removed", { sessionId: id, released, reason });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private nextId(): string {
    this.counter++;
    return `S${this.counter.toString(36)}`;
  }
}
