// worldcore/test/chatDirectory.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { ChatDirectory } from "../chat/ChatDirectory";
import type { RoomHandle } from "../chat/RoomHandle";
import type { PlayerInfo } from "../shared/GameTypes";

const alice: PlayerInfo = { id: 1, name: "Alice", faction: "alliance", level: 10 };
const bob: PlayerInfo = { id: 2, name: "Bob", faction: "horde", level: 12 };

function steppingClock(start = 1000): () => number {
  let t = start;
  return () => t++;
}

function join(chat: ChatDirectory, name: string, player: PlayerInfo): RoomHandle {
  const res = chat.joinRoom(name, player);
  assert.equal(res.status, "ok");
  if (res.status !== "ok") throw new Error("join failed");
  return res.room;
}

test("createRoom rejects a duplicate name and leaves the room unchanged", () => {
  const chat = new ChatDirectory(steppingClock());

  const first = chat.createRoom("general", "anything goes");
  assert.equal(first.status, "ok");
  if (first.status !== "ok") return;
  assert.deepEqual(first.info, { id: 1, name: "general", topic: "anything goes", memberCount: 0 });

  join(chat, "general", alice);

  assert.deepEqual(chat.createRoom("general", "other"), { status: "alreadyExists" });
  assert.deepEqual(chat.listRooms().rooms, [
    { id: 1, name: "general", topic: "anything goes", memberCount: 1 },
  ]);
});

test("joinRoom on a missing room is notFound", () => {
  const chat = new ChatDirectory();
  assert.deepEqual(chat.joinRoom("nowhere", alice), { status: "notFound" });
});

test("handles from separate joins share one log and stamp their own sender", () => {
  const chat = new ChatDirectory(steppingClock(5000));
  chat.createRoom("general", "");

  const a = join(chat, "general", alice);
  const b = join(chat, "general", bob);

  const sent = a.sendMessage("hello");
  assert.equal(sent.status, "ok");
  b.sendEmote("waves");

  const history = a.getHistory(10).messages;
  assert.deepEqual(history, [
    { sender: alice, content: "hello", timestamp: 5000, kind: { type: "normal" } },
    { sender: bob, content: "waves", timestamp: 5001, kind: { type: "emote" } },
  ]);
  assert.deepEqual(b.getHistory(10).messages, history);
});

test("getHistory returns the most recent messages in order", () => {
  const chat = new ChatDirectory(steppingClock());
  chat.createRoom("general", "");
  const a = join(chat, "general", alice);

  for (const word of ["one", "two", "three", "four"]) {
    a.sendMessage(word);
  }

  assert.deepEqual(a.getHistory(2).messages.map((m) => m.content), ["three", "four"]);
  assert.deepEqual(a.getHistory(10).messages.map((m) => m.content), ["one", "two", "three", "four"]);
  assert.deepEqual(a.getHistory(0).messages, []);
});

test("sent and listed messages are copies of the stored log", () => {
  const chat = new ChatDirectory(steppingClock(300));
  chat.createRoom("general", "");
  const a = join(chat, "general", alice);

  const sent = a.sendMessage("original");
  assert.equal(sent.status, "ok");
  if (sent.status !== "ok") return;
  sent.message.content = "edited";
  sent.message.sender.name = "Mallory";

  const listed = a.getHistory(10).messages;
  listed[0].content = "rewritten";
  listed[0].sender.name = "Eve";
  listed[0].kind = { type: "emote" };

  assert.deepEqual(a.getHistory(10).messages, [
    { sender: alice, content: "original", timestamp: 300, kind: { type: "normal" } },
  ]);
});

test("member count follows joins and leaves and never goes below zero", () => {
  const chat = new ChatDirectory();
  chat.createRoom("general", "");
  const a = join(chat, "general", alice);
  join(chat, "general", bob);

  const info = a.getInfo();
  assert.equal(info.status, "ok");
  if (info.status !== "ok") return;
  assert.equal(info.info.memberCount, 2);

  assert.deepEqual(a.leave(), { status: "ok" });
  assert.deepEqual(a.leave(), { status: "ok" });
  assert.deepEqual(a.leave(), { status: "ok" });
  assert.deepEqual(chat.listRooms().rooms[0].memberCount, 0);
});

test("a left handle can still send", () => {
  const chat = new ChatDirectory(steppingClock());
  chat.createRoom("general", "");
  const a = join(chat, "general", alice);

  a.leave();
  assert.equal(a.sendMessage("still here").status, "ok");
  assert.equal(a.getHistory(10).messages.length, 1);
});

test("the creator handle speaks as the system sender without joining", () => {
  const chat = new ChatDirectory(steppingClock(42));
  const created = chat.createRoom("news", "announcements");
  assert.equal(created.status, "ok");
  if (created.status !== "ok") return;

  const sent = created.room.sendMessage("server restart at noon");
  assert.equal(sent.status, "ok");
  if (sent.status !== "ok") return;
  assert.deepEqual(sent.message.sender, { id: 0, name: "system", faction: "neutral", level: 0 });
  assert.equal(chat.listRooms().rooms[0].memberCount, 0);
});

test("the message sender is a snapshot of the player at join time", () => {
  const chat = new ChatDirectory();
  chat.createRoom("general", "");
  const player: PlayerInfo = { ...alice };
  const a = join(chat, "general", player);

  player.level = 99;
  const sent = a.sendMessage("hi");
  assert.equal(sent.status, "ok");
  if (sent.status !== "ok") return;
  assert.equal(sent.message.sender.level, 10);
});

test("whisper is tagged with the target and not stored in any room", () => {
  const chat = new ChatDirectory(() => 777);
  chat.createRoom("general", "");
  const a = join(chat, "general", alice);

  assert.deepEqual(chat.whisper(alice, { id: bob.id }, "psst"), {
    status: "ok",
    message: {
      sender: alice,
      content: "psst",
      timestamp: 777,
      kind: { type: "whisper", target: 2 },
    },
  });
  assert.deepEqual(a.getHistory(10).messages, []);
});

test("room ids are assigned in creation order", () => {
  const chat = new ChatDirectory();
  chat.createRoom("a", "");
  chat.createRoom("b", "");
  assert.deepEqual(
    chat.listRooms().rooms.map((r) => [r.id, r.name]),
    [
      [1, "a"],
      [2, "b"],
    ],
  );
});
