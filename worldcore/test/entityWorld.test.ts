// worldcore/test/entityWorld.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { EntityWorld } from "../core/EntityWorld";
import type { SpawnRequest } from "../shared/Entity";

function orc(name: string, x: number, y = 0, z = 0): SpawnRequest {
  return {
    kind: "monster",
    name,
    position: { x, y, z },
    faction: "horde",
    maxHealth: 100,
  };
}

test("spawn assigns ids from 1 and starts at full health", () => {
  const world = new EntityWorld();

  const a = world.spawn(orc("a", 0));
  const b = world.spawn({ ...orc("b", 1), kind: "npc", faction: "alliance", maxHealth: 40 });

  assert.equal(a.status, "ok");
  assert.equal(a.entity.id, 1);
  assert.equal(b.entity.id, 2);
  assert.deepEqual(b.entity, {
    id: 2,
    kind: "npc",
    name: "b",
    position: { x: 1, y: 0, z: 0 },
    health: 40,
    maxHealth: 40,
    faction: "alliance",
    alive: true,
  });
  assert.equal(world.count(), 2);
});

test("ids are not reused after despawn", () => {
  const world = new EntityWorld();
  const first = world.spawn(orc("a", 0)).entity.id;

  assert.deepEqual(world.despawn(first), { status: "ok" });
  assert.equal(world.spawn(orc("b", 0)).entity.id, 2);
});

test("despawn twice is notFound the second time", () => {
  const world = new EntityWorld();
  const id = world.spawn(orc("a", 0)).entity.id;

  assert.equal(world.despawn(id).status, "ok");
  assert.equal(world.despawn(id).status, "notFound");
  assert.equal(world.get(id).status, "notFound");
});

test("move replaces position only", () => {
  const world = new EntityWorld();
  const id = world.spawn(orc("a", 0)).entity.id;
  world.damage(id, 10);

  const res = world.move(id, { x: 5, y: 6, z: 7 });
  assert.equal(res.status, "ok");
  if (res.status !== "ok") return;
  assert.deepEqual(res.entity.position, { x: 5, y: 6, z: 7 });
  assert.equal(res.entity.health, 90);

  assert.equal(world.move(99, { x: 0, y: 0, z: 0 }).status, "notFound");
});

test("damage clamps at zero and kills exactly once health hits zero", () => {
  const world = new EntityWorld();
  const id = world.spawn(orc("a", 0)).entity.id;

  const hit = world.damage(id, 60);
  assert.equal(hit.status, "ok");
  if (hit.status !== "ok") return;
  assert.equal(hit.entity.health, 40);
  assert.equal(hit.killed, false);
  assert.equal(hit.entity.alive, true);

  const lethal = world.damage(id, 500);
  assert.equal(lethal.status, "ok");
  if (lethal.status !== "ok") return;
  assert.equal(lethal.entity.health, 0);
  assert.equal(lethal.killed, true);
  assert.equal(lethal.entity.alive, false);

  assert.equal(world.damage(42, 1).status, "notFound");
});

test("returned entities are snapshots", () => {
  const world = new EntityWorld();
  const spawned = world.spawn(orc("a", 0)).entity;
  spawned.position.x = 1000;
  spawned.health = 1;

  const again = world.get(spawned.id);
  assert.equal(again.status, "ok");
  if (again.status !== "ok") return;
  assert.equal(again.entity.position.x, 0);
  assert.equal(again.entity.health, 100);
});

test("queryArea uses an inclusive radius and applies the filter", () => {
  const world = new EntityWorld();
  world.spawn(orc("edge", 3, 4, 0)); // distance 5
  world.spawn(orc("outside", 6, 0, 0));
  world.spawn({ ...orc("guard", 1), kind: "npc", faction: "alliance" });

  const all = world.queryArea({ center: { x: 0, y: 0, z: 0 }, radius: 5, filter: { type: "all" } });
  assert.equal(all.count, 2);
  assert.deepEqual(all.entities.map((e) => e.name).sort(), ["edge", "guard"]);

  const monsters = world.queryArea({
    center: { x: 0, y: 0, z: 0 },
    radius: 5,
    filter: { type: "byKind", kind: "monster" },
  });
  assert.deepEqual(monsters.entities.map((e) => e.name), ["edge"]);

  const alliance = world.queryArea({
    center: { x: 0, y: 0, z: 0 },
    radius: 10,
    filter: { type: "byFaction", faction: "alliance" },
  });
  assert.deepEqual(alliance.entities.map((e) => e.name), ["guard"]);
  assert.equal(alliance.count, 1);
});
