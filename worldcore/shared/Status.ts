// worldcore/shared/Status.ts
//
// Domain outcomes travel in the normal result payload, never as faults.
// Transport faults live in rpc/RpcErrors.ts.

export type StatusCode = "ok" | "notFound" | "alreadyExists" | "invalidArgument";

export type FailureCode = Exclude<StatusCode, "ok">;

export type Ok<T extends object = {}> = { status: "ok" } & T;

export interface Failure<C extends FailureCode = FailureCode> {
  status: C;
}

export type NotFound = Failure<"notFound">;

export const OK: Ok = { status: "ok" };

export function ok<T extends object>(body: T): Ok<T> {
  return { status: "ok", ...body };
}

export function fail<C extends FailureCode>(status: C): Failure<C> {
  return { status };
}

export function notFound(): NotFound {
  return fail("notFound");
}
