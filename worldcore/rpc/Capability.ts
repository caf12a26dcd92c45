// worldcore/rpc/Capability.ts

import type { z } from "zod";
import { RpcError, summarizeZodError } from "./RpcErrors";

/** Wire form of a capability reference embedded in a result. */
export interface CapRef {
  $cap: number;
}

export interface CallContext {
  /** Register a capability with the calling connection and get its reference. */
  export(cap: CapabilityServer): CapRef;
}

export type MethodHandler = (params: unknown, ctx: CallContext) => unknown;

export type MethodTable = Record<string, MethodHandler>;

/**
 * Bind a params schema to a method body. Missing params read as {}.
 * A params value the schema rejects is an invalid_params fault.
 */
export function method<S extends z.ZodTypeAny>(
  schema: S,
  run: (params: z.output<S>, ctx: CallContext) => unknown,
): MethodHandler {
  return (raw, ctx) => {
    const parsed = schema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new RpcError("invalid_params", summarizeZodError(parsed.error));
    }
    return run(parsed.data, ctx);
  };
}

/**
 * Base for every remotely callable object: bootstrap services and the
 * handles they mint. The method table is fixed at construction.
 */
export abstract class CapabilityServer {
  private readonly methods: ReadonlyMap<string, MethodHandler>;

  protected constructor(
    readonly kind: string,
    table: MethodTable,
  ) {
    this.methods = new Map(Object.entries(table));
  }

  methodNames(): string[] {
    return Array.from(this.methods.keys());
  }

  dispatch(name: string, params: unknown, ctx: CallContext): unknown {
    const handler = this.methods.get(name);
    if (!handler) {
      throw new RpcError("unknown_method", `${this.kind} has no method "${name}"`);
    }
    return handler(params, ctx);
  }
}
