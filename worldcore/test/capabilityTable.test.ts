// worldcore/test/capabilityTable.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { z } from "zod";

import { CapabilityServer, CallContext, method } from "../rpc/Capability";
import { CapabilityTable } from "../rpc/CapabilityTable";
import { RpcError } from "../rpc/RpcErrors";

class EchoCapability extends CapabilityServer {
  constructor() {
    super("echo", {
      echo: method(z.object({ text: z.string() }), (p) => ({ text: p.text })),
      ping: method(z.object({}), () => "pong"),
    });
  }
}

function contextFor(table: CapabilityTable): CallContext {
  return { export: (cap) => table.export(cap) };
}

test("exporting the same object twice reuses its id and bumps the refcount", () => {
  const table = new CapabilityTable();
  const cap = new EchoCapability();

  assert.deepEqual(table.export(cap), { $cap: 1 });
  assert.deepEqual(table.export(cap), { $cap: 1 });
  assert.equal(table.refCount(1), 2);
  assert.equal(table.size, 1);

  assert.deepEqual(table.export(new EchoCapability()), { $cap: 2 });
});

test("release drops the entry when the refcount reaches zero", () => {
  const table = new CapabilityTable();
  const cap = new EchoCapability();
  table.export(cap);
  table.export(cap);

  assert.equal(table.release(1), true);
  assert.equal(table.get(1), cap);
  assert.equal(table.release(1), true);
  assert.equal(table.get(1), undefined);
  assert.equal(table.release(1), false);

  // a fresh export after a full release gets a new id
  assert.deepEqual(table.export(cap), { $cap: 2 });
});

test("release with a count drops several references at once", () => {
  const table = new CapabilityTable();
  const cap = new EchoCapability();
  table.export(cap);
  table.export(cap);
  table.export(cap);

  table.release(1, 3);
  assert.equal(table.size, 0);
});

test("clear reports how many entries it dropped", () => {
  const table = new CapabilityTable();
  table.export(new EchoCapability());
  table.export(new EchoCapability());

  assert.equal(table.clear(), 2);
  assert.equal(table.size, 0);
});

test("dispatch validates params and rejects unknown methods", () => {
  const table = new CapabilityTable();
  const cap = new EchoCapability();
  const ctx = contextFor(table);

  assert.deepEqual(cap.dispatch("echo", { text: "hi" }, ctx), { text: "hi" });
  assert.equal(cap.dispatch("ping", undefined, ctx), "pong");
  assert.deepEqual(cap.methodNames(), ["echo", "ping"]);

  assert.throws(
    () => cap.dispatch("echo", { text: 5 }, ctx),
    (err: unknown) => err instanceof RpcError && err.code === "invalid_params",
  );
  assert.throws(
    () => cap.dispatch("shout", {}, ctx),
    (err: unknown) =>
      err instanceof RpcError &&
      err.code === "unknown_method" &&
      err.message === 'echo has no method "shout"',
  );
});
