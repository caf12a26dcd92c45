// worldcore/rpc/RpcErrors.ts
//
// Transport faults. Domain outcomes (notFound, alreadyExists, ...) are never
// raised as RpcError; they travel in the result payload.

import type { ZodError } from "zod";

export type RpcErrorCode =
  | "bad_json"
  | "bad_frame"
  | "invalid_params"
  | "unknown_capability"
  | "unknown_method"
  | "service_unavailable"
  | "internal";

export class RpcError extends Error {
  constructor(
    readonly code: RpcErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RpcError";
  }
}

/** "path: message" per issue, joined with "; ". */
export function summarizeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
