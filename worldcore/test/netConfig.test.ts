// worldcore/test/netConfig.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { loadNetConfig, parseServices } from "../../mmo-backend/config";
import { formatLine } from "../../mmo-backend/FileLogTap";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(loadNetConfig({}), {
    host: "0.0.0.0",
    port: 4003,
    path: "/rpc",
    services: ["world", "chat", "inventory", "matchmaking"],
    unknownServices: [],
    heartbeatIntervalMs: 5000,
    idleTimeoutMs: 600000,
  });
});

test("SK_* variables override the defaults", () => {
  const cfg = loadNetConfig({
    SK_HOST: "127.0.0.1",
    SK_PORT: "9100",
    SK_WS_PATH: "/game",
    SK_SERVICES: "chat",
    SK_HEARTBEAT_INTERVAL: "2000",
    SK_IDLE_TIMEOUT: "not-a-number",
  });

  assert.equal(cfg.host, "127.0.0.1");
  assert.equal(cfg.port, 9100);
  assert.equal(cfg.path, "/game");
  assert.deepEqual(cfg.services, ["chat"]);
  assert.equal(cfg.heartbeatIntervalMs, 2000);
  assert.equal(cfg.idleTimeoutMs, 600000);
});

test("parseServices trims, lowercases, dedupes and reports unknown names", () => {
  assert.deepEqual(parseServices(" Chat, matchmaking ,chat,,arena "), {
    services: ["chat", "matchmaking"],
    unknown: ["arena"],
  });
  assert.equal(parseServices("   ").services.length, 4);
});

test("file log lines are ANSI-free", () => {
  assert.equal(
    formatLine(["\u001b[32m[CHAT:INFO]\u001b[0m Room created", { roomId: 1 }]),
    '[CHAT:INFO] Room created {"roomId":1}',
  );
});
