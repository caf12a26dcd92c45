//worldcore/shared/Session.ts

import type { CapabilityTable } from "../rpc/CapabilityTable";

/** The part of a ws WebSocket a session uses. */
export interface SessionSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Session {
  id: string;
  socket: SessionSocket;
  // Capabilities exported to this connection
  caps: CapabilityTable;
  lastSeen: number;
  remote?: string;
}
