// worldcore/test/mudRuntime.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { InMemoryCharacterStore } from "../characters/CharacterStore";
import { DeferredWriteQueue } from "../characters/DeferredWriteQueue";
import { makeRuntimeConfig } from "../config/RuntimeConfig";
import { MudRuntime, normalizeDirection } from "../mud/MudRuntime";
import type { PlayerInstance } from "../shared/Entity";
import { ContentError } from "../utils/errors";
import { createCombatant } from "../world/SpawnLootEngine";
import { RecordingSink, TestRuntime, makeTestRuntime, scriptedRng, testContent, testSheet } from "./testUtils";

const TIME_LINES = "It is Morning, early morning. (Day 0)\nThe town stirs to life.";

function playerOf(t: TestRuntime, sessionId = "sess-1"): PlayerInstance {
  const p = t.runtime.playerForSession(sessionId);
  assert.ok(p, `no player for ${sessionId}`);
  return p;
}

test("entering the world describes the room", async () => {
  const t = makeTestRuntime();
  const res = await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "chapel"));

  assert.equal(res.ok, true);
  assert.equal(res.message, `Quiet Chapel\nCandles gutter in a draft from the broken window.\n${TIME_LINES}\nExits: south.`);
  assert.equal(t.runtime.onlineCount(), 1);
  assert.deepEqual(t.sink.roomTexts("chapel"), ["Tester arrives."]);
});

test("looking at a room rolls its region's weather once it is due", async () => {
  const t = makeTestRuntime();
  await t.runtime.renderRoom("marsh");
  const start = 8 * 3600;
  assert.equal(t.runtime.weather.get("testvale", start).nextChangeAt, start + 900);

  t.time.set(899_000);
  await t.runtime.renderRoom("marsh");
  assert.equal(t.runtime.weather.get("testvale", start + 899).changeCount, 0);

  t.time.set(900_000);
  await t.runtime.renderRoom("marsh");
  assert.equal(t.runtime.weather.get("testvale", start + 900).changeCount, 1);
});

test("moving announces both ends and saves the new room", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "chapel"));
  const player = playerOf(t);

  const res = await t.runtime.move(player.id, "s");
  assert.equal(res.message, `Muddy Yard\nPuddles ring a cart with a broken wheel.\n${TIME_LINES}\nExits: east, north, west.`);
  assert.deepEqual(t.sink.roomTexts("chapel"), ["Tester arrives.", "Tester leaves south."]);
  assert.deepEqual(t.sink.roomTexts("yard"), ["Tester arrives."]);
  assert.equal(t.runtime.sheetOf("char-1")?.roomId, "yard");
  assert.equal(t.writes.pending(), 1);

  assert.deepEqual(await t.runtime.move(player.id, "south"), {
    ok: false,
    code: "invalid_action",
    message: "You can't go that way.",
  });
});

test("scheduled npcs and shop hours show up in the room", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "yard"));
  const res = await t.runtime.move(playerOf(t).id, "west");

  assert.equal(
    res.message,
    `Warm Bakery\nFlour hangs in the air.\n${TIME_LINES}\nThe shop here is Open.\nAlso here: Baker Tam.\nExits: east.`,
  );
});

test("a busy npc keeps its post past the end of its block", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "bakery"));
  const player = playerOf(t);
  t.runtime.markNpcBusy("baker", "transaction");

  // 18:10
  t.time.set(36_600_000);
  const busy = await t.runtime.look(player.id);
  assert.ok(busy.message.includes("\nAlso here: Baker Tam.\n"));
  assert.ok(busy.message.includes("\nThe shop here is Closed (opens at 06:00).\n"));
  assert.equal(t.runtime.npcSchedule.isDeferred("baker"), true);

  t.runtime.markNpcBusy("baker", null);
  t.time.set(37_200_000);
  const free = await t.runtime.look(player.id);
  assert.equal(free.message.includes("Also here:"), false);
  assert.deepEqual(t.sink.roomTexts("bakery"), ["Tester arrives.", "Baker Tam heads off."]);
});

test("[contract] room rules fire on entry and loot goes into the sheet", async () => {
  const t = makeTestRuntime();
  const res = await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "lane"));
  assert.equal(
    res.message,
    `Narrow Lane\nRubbish drifts against the walls.\n${TIME_LINES}\nAlso here: a rat, a rat.\nOn the ground: a smooth pebble.\nExits: east, west.`,
  );

  const player = playerOf(t);
  assert.equal((await t.runtime.pickUp(player.id, "pebble")).message, "You pick up a smooth pebble.");
  assert.deepEqual(t.runtime.sheetOf("char-1")?.inventory, [
    { templateId: "pebble", name: "a smooth pebble", quantity: 1 },
  ]);
  assert.equal((await t.runtime.pickUp(player.id, "pebble")).message, "You don't see 'pebble' here.");
});

test("two players walking in together get one set of spawns", async () => {
  const t = makeTestRuntime();
  await Promise.all([
    t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "lane")),
    t.runtime.enterWorld({ id: "sess-2", displayName: "Helper" }, testSheet("char-2", "Helper", "lane")),
  ]);

  const creatures = t.runtime.entities.listCombatantsInRoom("lane").filter((c) => c.kind === "creature");
  assert.equal(creatures.length, 2);
  assert.equal(t.runtime.entities.listItemsInRoom("lane").length, 1);
});

test("you cannot walk out of a fight", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "lane"));
  const player = playerOf(t);

  assert.equal((await t.runtime.attack(player.id, "rat")).message, "You attack a rat!");
  assert.deepEqual(await t.runtime.move(player.id, "west"), {
    ok: false,
    code: "blocked",
    message: "You are in combat! Disengage first.",
  });
  assert.equal(t.runtime.entities.roomOf(player.id), "lane");
  assert.equal((await t.runtime.attack(player.id, "wolf")).message, "You don't see 'wolf' here.");
});

test("a player killed in combat respawns at full health", async () => {
  // brute hits (11 vs 91), Tester's reply never lands
  const t = makeTestRuntime({ rng: scriptedRng([0.5, 0.5, 0.1, 0.9, 0.5]) });
  const brute = t.runtime.content.getCreature("brute");
  assert.ok(brute);
  t.runtime.entities.add(createCombatant(brute, "yard", 0), "yard");

  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "yard", { hp: 1 }));
  const player = playerOf(t);
  assert.equal(t.runtime.engine.stateOf(player.id), "Engaged");

  t.time.set(3000);
  await t.runtime.scheduler.runDue();

  assert.ok(t.sink.roomTexts("yard").includes("[combat] a brute's club hits Tester for 5 damage. (0/30 HP)"));
  assert.ok(t.sink.roomTexts("yard").includes("[combat] Tester is slain by a brute."));
  assert.deepEqual(t.sink.texts("session", "sess-1"), ["You have died."]);
  assert.equal(t.runtime.entities.roomOf(player.id), "chapel");
  assert.equal(player.hp, 30);
  assert.equal(t.runtime.sheetOf("char-1")?.roomId, "chapel");
  assert.ok(t.sink.roomTexts("chapel").includes("Tester staggers in, pale and shaken."));
});

test("linkdead characters can be reclaimed", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "chapel"));
  const player = playerOf(t);

  await t.runtime.disconnect("sess-1");
  assert.equal(t.runtime.isLinkdead("char-1"), true);
  assert.equal(t.runtime.entities.roomOf(player.id), "chapel");

  const back = await t.runtime.reconnect({ id: "sess-2", displayName: "Tester" }, "char-1");
  assert.equal(back.ok, true);
  assert.equal(t.runtime.isLinkdead("char-1"), false);
  assert.equal(playerOf(t, "sess-2"), player);
  assert.deepEqual(t.sink.roomTexts("chapel"), ["Tester arrives.", "Tester's eyes glaze over.", "Tester shakes off a daze."]);

  assert.deepEqual(await t.runtime.reconnect(t.session, "char-9"), {
    ok: false,
    code: "invalid_action",
    message: "There is no one here to reclaim.",
  });
});

test("linkdead characters fade after the grace window", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "chapel"));
  await t.runtime.disconnect("sess-1");

  t.time.set(180_000);
  await t.runtime.scheduler.runDue();

  assert.equal(t.runtime.onlineCount(), 0);
  assert.ok(t.sink.roomTexts("chapel").includes("Tester fades from view."));
  await t.writes.flush();
  assert.equal(t.store.peek("char-1")?.roomId, "chapel");
});

test("logging in again takes over the lingering character", async () => {
  const t = makeTestRuntime();
  const sheet = testSheet("char-1", "Tester", "chapel");
  await t.runtime.enterWorld(t.session, sheet);

  const again = await t.runtime.enterWorld({ id: "sess-2", displayName: "Tester" }, sheet);
  assert.equal(again.ok, true);
  assert.equal(t.runtime.onlineCount(), 1);
  assert.equal(playerOf(t, "sess-2").characterId, "char-1");
  assert.equal(t.runtime.playerForSession("sess-1"), undefined);

  assert.deepEqual(await t.runtime.enterWorld({ id: "sess-2", displayName: "Tester" }, testSheet("char-2", "Other", "chapel")), {
    ok: false,
    code: "invalid_action",
    message: "This connection already has a character in the world.",
  });
});

test("the sweep clears expired room loot", async () => {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", "lane"));
  assert.equal(t.runtime.entities.listItemsInRoom("lane").length, 1);

  t.time.set(59_999);
  await t.runtime.sweep();
  assert.equal(t.runtime.entities.listItemsInRoom("lane").length, 1);

  t.time.set(60_000);
  await t.runtime.sweep();
  assert.equal(t.runtime.entities.listItemsInRoom("lane").length, 0);
});

test("direction aliases", () => {
  assert.equal(normalizeDirection(" N "), "north");
  assert.equal(normalizeDirection("sw"), "southwest");
  assert.equal(normalizeDirection("up"), "up");
});

test("respawn room must exist", () => {
  assert.throws(
    () =>
      new MudRuntime({
        content: testContent(),
        config: makeRuntimeConfig({ respawnRoomId: "nowhere" }),
        events: new RecordingSink(),
        writes: new DeferredWriteQueue(new InMemoryCharacterStore()),
      }),
    (err: unknown) => err instanceof ContentError && err.message === "Respawn room nowhere is not in the loaded content",
  );
});
