//worldcore/core/RpcRouter.ts

import type { RawData } from "ws";

import { SessionManager } from "./SessionManager";
import { Session } from "../shared/Session";
import { ClientFrame, clientFrameSchema } from "../shared/messages";
import { CallContext } from "../rpc/Capability";
import { RpcError, RpcErrorCode, summarizeZodError } from "../rpc/RpcErrors";
import { ServiceDirectory } from "../rpc/ServiceDirectory";
import { Logger } from "../utils/logger";

const log = Logger.scope("RPC");

function decodeRaw(data: RawData | string): string {
  if (typeof data === "string") return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export class RpcRouter {
  constructor(
    private readonly sessions: SessionManager,
    private readonly services: ServiceDirectory,
  ) {}

  handleRawMessage(session: Session, data: RawData | string): void {
    const text = decodeRaw(data);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      log.warn("Failed to parse client frame", {
        sessionId: session.id,
        err,
        preview: text.slice(0, 256),
      });
      this.fault(session, null, "bad_json", "frame is not valid JSON");
      return;
    }

    const parsed = clientFrameSchema.safeParse(json);
    if (!parsed.success) {
      log.warn("Bad frame shape", { sessionId: session.id });
      this.fault(session, null, "bad_frame", summarizeZodError(parsed.error));
      return;
    }

    // Mark activity for heartbeat
    this.sessions.touch(session.id);

    this.route(session, parsed.data);
  }

  private route(session: Session, frame: ClientFrame): void {
    switch (frame.op) {
      case "bootstrap": {
        const service = this.services.get(frame.service);
        if (!service) {
          this.fault(
            session,
            frame.id,
            "service_unavailable",
            `service "${frame.service}" is not exposed`,
          );
          return;
        }

        log.debug("bootstrap", { sessionId: session.id, service: frame.service });
        this.sessions.send(session, {
          op: "return",
          id: frame.id,
          result: session.caps.export(service),
        });
        return;
      }

      case "call": {
        const cap = session.caps.get(frame.target);
        if (!cap) {
          this.fault(
            session,
            frame.id,
            "unknown_capability",
            `no capability ${frame.target} on this connection`,
          );
          return;
        }

        const ctx: CallContext = { export: (c) => session.caps.export(c) };

        let result: unknown;
        try {
          result = cap.dispatch(frame.method, frame.params, ctx);
        } catch (err) {
          if (err instanceof RpcError) {
            log.debug("call fault", {
              sessionId: session.id,
              kind: cap.kind,
              method: frame.method,
              code: err.code,
            });
            this.fault(session, frame.id, err.code, err.message);
            return;
          }

          log.error("Unhandled error in call", {
            sessionId: session.id,
            kind: cap.kind,
            method: frame.method,
            err,
          });
          this.fault(session, frame.id, "internal", "internal error");
          return;
        }

        this.sessions.send(session, { op: "return", id: frame.id, result });
        return;
      }

      case "release": {
        if (!session.caps.release(frame.target, frame.count)) {
          log.debug("release of unknown capability", {
            sessionId: session.id,
            target: frame.target,
          });
        }
        return;
      }
    }
  }

  private fault(
    session: Session,
    id: number | null,
    code: RpcErrorCode,
    message: string,
  ): void {
    this.sessions.send(session, { op: "exception", id, error: { code, message } });
  }
}
