// worldcore/test/tradeHandle.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { InventoryStore } from "../inventory/InventoryStore";
import { TradeRegistry } from "../trade/TradeRegistry";
import type { TradeHandle } from "../trade/TradeHandle";
import type { PlayerInfo } from "../shared/GameTypes";

const alice: PlayerInfo = { id: 1, name: "Alice", faction: "alliance", level: 10 };
const bob: PlayerInfo = { id: 2, name: "Bob", faction: "horde", level: 12 };
const eve: PlayerInfo = { id: 3, name: "Eve", faction: "pirates", level: 3 };

function openTrade(store: InventoryStore): { mine: TradeHandle; theirs: TradeHandle; tradeId: number } {
  const started = store.startTrade(alice, bob);
  const joined = store.joinTrade(started.tradeId, bob);
  if (joined.status !== "ok") throw new Error(`join failed: ${joined.status}`);
  return { mine: started.session, theirs: joined.session, tradeId: started.tradeId };
}

test("startTrade registers a proposing trade with monotonic ids", () => {
  const store = new InventoryStore(new TradeRegistry(() => 100));

  const first = store.startTrade(alice, bob);
  const second = store.startTrade(alice, eve);

  assert.equal(first.status, "ok");
  assert.equal(first.tradeId, 1);
  assert.equal(second.tradeId, 2);
  assert.deepEqual(first.session.getState(), { state: "proposing" });
  assert.equal(store.trades.count(), 2);
});

test("joinTrade checks the trade id and the target", () => {
  const store = new InventoryStore();
  const started = store.startTrade(alice, bob);

  assert.deepEqual(store.joinTrade(99, bob), { status: "notFound" });
  assert.deepEqual(store.joinTrade(started.tradeId, eve), { status: "invalidArgument" });
  assert.deepEqual(store.joinTrade(started.tradeId, alice), { status: "invalidArgument" });
  assert.equal(store.joinTrade(started.tradeId, bob).status, "ok");
});

test("offerItems replaces the offer and removeItems filters it", () => {
  const { mine } = openTrade(new InventoryStore());

  assert.deepEqual(mine.offerItems([3, 1, 4]), {
    status: "ok",
    offer: {
      offeredItems: [
        { slotIndex: 3, quantity: 1 },
        { slotIndex: 1, quantity: 1 },
        { slotIndex: 4, quantity: 1 },
      ],
      accepted: false,
    },
  });

  const replaced = mine.offerItems([7, 8]);
  assert.equal(replaced.status, "ok");
  if (replaced.status !== "ok") return;
  assert.deepEqual(replaced.offer.offeredItems.map((i) => i.slotIndex), [7, 8]);

  const filtered = mine.removeItems([7, 42]);
  assert.equal(filtered.status, "ok");
  if (filtered.status !== "ok") return;
  assert.deepEqual(filtered.offer.offeredItems.map((i) => i.slotIndex), [8]);
});

test("each side sees the other's offer", () => {
  const { mine, theirs } = openTrade(new InventoryStore());

  mine.offerItems([0]);
  theirs.offerItems([5, 6]);

  assert.deepEqual(mine.viewOtherOffer().offer.offeredItems.map((i) => i.slotIndex), [5, 6]);
  assert.deepEqual(theirs.viewOtherOffer().offer.offeredItems.map((i) => i.slotIndex), [0]);
});

test("mutual accept moves the trade to accepted", () => {
  const { mine, theirs } = openTrade(new InventoryStore());

  assert.deepEqual(mine.accept(), { status: "ok", state: "proposing" });
  assert.equal(theirs.viewOtherOffer().offer.accepted, true);
  assert.deepEqual(theirs.accept(), { status: "ok", state: "accepted" });
  assert.deepEqual(mine.getState(), { state: "accepted" });
});

test("changing an offer clears both acceptances", () => {
  const { mine, theirs } = openTrade(new InventoryStore());
  mine.accept();
  theirs.accept();

  theirs.offerItems([9]);

  assert.deepEqual(mine.getState(), { state: "proposing" });
  assert.equal(mine.viewOtherOffer().offer.accepted, false);
  assert.equal(theirs.viewOtherOffer().offer.accepted, false);
  assert.deepEqual(mine.accept(), { status: "ok", state: "proposing" });
});

test("confirm is unconditional and freezes offers", () => {
  const { mine, theirs } = openTrade(new InventoryStore());

  assert.deepEqual(mine.confirm(), { status: "ok", state: "confirmed" });
  assert.deepEqual(theirs.getState(), { state: "confirmed" });

  assert.deepEqual(theirs.offerItems([1]), { status: "invalidArgument" });
  assert.deepEqual(theirs.removeItems([1]), { status: "invalidArgument" });
  assert.deepEqual(theirs.accept(), { status: "invalidArgument" });
  assert.deepEqual(theirs.getState(), { state: "confirmed" });
});

test("cancel is unconditional", () => {
  const { mine, theirs } = openTrade(new InventoryStore());
  mine.offerItems([1]);

  assert.deepEqual(theirs.cancel(), { status: "ok", state: "cancelled" });
  assert.deepEqual(mine.getState(), { state: "cancelled" });
  assert.deepEqual(mine.offerItems([2]), { status: "invalidArgument" });
  assert.deepEqual(mine.viewOtherOffer().offer, { offeredItems: [], accepted: false });
});

test("trades are independent of each other", () => {
  const store = new InventoryStore();
  const one = openTrade(store);
  const two = openTrade(store);

  one.mine.cancel();
  assert.deepEqual(two.mine.getState(), { state: "proposing" });
  assert.notEqual(one.tradeId, two.tradeId);
});
