// mmo-backend/server.ts

import http, { IncomingMessage } from "http";
import { WebSocketServer, WebSocket } from "ws";

import { netConfig } from "./config";
import { installFileLogTap } from "./FileLogTap";
import { Logger } from "../worldcore/utils/logger";
import { SessionManager } from "../worldcore/core/SessionManager";
import { RpcRouter } from "../worldcore/core/RpcRouter";
import { startHeartbeat } from "../worldcore/core/Heartbeat";
import { ServiceDirectory, createRegistries } from "../worldcore/rpc/ServiceDirectory";

const log = Logger.scope("SERVER");

function describeSocket(req: IncomingMessage): string {
  const r = req.socket;
  return `${r.remoteAddress || "?"}:${r.remotePort || "?"}`;
}

function main(): void {
  if (installFileLogTap()) {
    log.info("File log tap enabled", { file: process.env.SK_FILELOG });
  }

  log.info("Starting service shard...", {
    host: netConfig.host,
    port: netConfig.port,
    path: netConfig.path,
  });

  if (netConfig.unknownServices.length > 0) {
    log.warn("Ignoring unknown services in SK_SERVICES", {
      unknown: netConfig.unknownServices,
    });
  }

  // Registries + bootstrap capabilities live for the whole process
  const registries = createRegistries();
  const services = new ServiceDirectory(registries, netConfig.services);

  const sessions = new SessionManager();
  const router = new RpcRouter(sessions, services);

  // Heartbeat / idle session cleanup
  startHeartbeat(sessions, {
    intervalMs: netConfig.heartbeatIntervalMs,
    idleTimeoutMs: netConfig.idleTimeoutMs,
  });

  // HTTP + WebSocket server
  const server = http.createServer();

  const wss = new WebSocketServer({
    server,
    path: netConfig.path,
  });

  wss.on("connection", (socket: WebSocket, req) => {
    const session = sessions.createSession(socket, describeSocket(req));

    socket.on("message", (data) => {
      router.handleRawMessage(session, data);
    });

    socket.on("error", (err) => {
      log.warn("Socket error", { sessionId: session.id, err });
    });

    socket.on("close", () => {
      sessions.removeSession(session.id, "socket_closed");
    });
  });

  server.on("error", (err) => {
    log.error("Fatal error in service shard", { err });
    process.exit(1);
  });

  server.listen(netConfig.port, netConfig.host, () => {
    const addr = server.address();
    const bound =
      addr && typeof addr === "object" ? `${addr.address}:${addr.port}` : String(addr);

    log.success("READY", {
      address: bound,
      path: netConfig.path,
      services: services.names(),
    });
  });
}

// Entry point
try {
  main();
} catch (err: unknown) {
  log.error("Fatal error in service shard", { err });
  process.exit(1);
}
