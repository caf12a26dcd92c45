// worldcore/shared/messages.ts
//
// Wire frames. One JSON object per WebSocket text frame.

import { z } from "zod";
import type { RpcErrorCode } from "../rpc/RpcErrors";

const frameId = z.number().int().nonnegative();

export const clientFrameSchema = z.discriminatedUnion("op", [
  z.object({
    op: z.literal("bootstrap"),
    id: frameId,
    service: z.string(),
  }),
  z.object({
    op: z.literal("call"),
    id: frameId,
    target: frameId,
    method: z.string(),
    params: z.unknown().optional(),
  }),
  z.object({
    op: z.literal("release"),
    target: frameId,
    count: z.number().int().positive().optional(),
  }),
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;

export type ClientOpcode = ClientFrame["op"];

export interface ReturnFrame {
  op: "return";
  id: number;
  result: unknown;
}

export interface ExceptionFrame {
  op: "exception";
  // null when the offending frame could not be read far enough to find its id
  id: number | null;
  error: { code: RpcErrorCode; message: string };
}

export type ServerFrame = ReturnFrame | ExceptionFrame;

export type ServerOpcode = ServerFrame["op"];
