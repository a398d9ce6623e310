// worldcore/test/mudCommands.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { handleMudCommand } from "../mud/MudCommandHandler";
import { HELP_ENTRIES } from "../mud/MudHelpMenu";
import type { MudContext } from "../mud/MudContext";
import { maneuverIdFromWords } from "../mud/commands/combat/combatCommands";
import type { CharacterSheet } from "../characters/CharacterTypes";
import { makeTestRuntime, testSheet } from "./testUtils";

async function inWorld(roomId = "yard", overrides: Partial<CharacterSheet> = {}) {
  const t = makeTestRuntime();
  await t.runtime.enterWorld(t.session, testSheet("char-1", "Tester", roomId, overrides));
  const ctx: MudContext = { runtime: t.runtime, session: t.session };
  const run = async (line: string) => {
    const res = await handleMudCommand(ctx, line);
    assert.ok(res, `no answer for '${line}'`);
    return res;
  };
  return { t, ctx, run };
}

test("blank and unknown input", async () => {
  const { ctx, run } = await inWorld();
  assert.equal(await handleMudCommand(ctx, "   "), null);
  assert.deepEqual(await run("dance"), {
    ok: false,
    code: "invalid_action",
    message: "Unknown command: dance. Type 'help' for a list.",
  });
});

test("commands need a character in the world", async () => {
  const t = makeTestRuntime();
  const res = await handleMudCommand({ runtime: t.runtime, session: t.session }, "look");
  assert.equal(res?.message, "You are not in the world yet.");
});

test("help lists every entry", async () => {
  const { run } = await inWorld();
  const lines = (await run("?")).message.split("\n");
  assert.equal(lines.length, HELP_ENTRIES.length + 1);
  assert.equal(lines[0], "Available commands:");
  assert.equal(lines[1], `  ${"help / ?".padEnd(24)} - Show this help.`);
});

test("time shows the exact clock", async () => {
  const { run } = await inWorld();
  assert.equal((await run("time")).message, "It is Morning, early morning. (Day 0) (08:00)\nThe town stirs to life.");
});

test("inventory", async () => {
  const empty = await inWorld();
  assert.equal((await empty.run("inv")).message, "You are carrying nothing.");

  const full = await inWorld("yard", {
    inventory: [
      { templateId: "pebble", name: "a smooth pebble", quantity: 3 },
      { templateId: "rat_tail", name: "a rat tail", quantity: 1 },
    ],
  });
  assert.equal((await full.run("inventory")).message, "You are carrying:\n  a smooth pebble (x3)\n  a rat tail");
});

test("missing arguments get a prompt", async () => {
  const { run } = await inWorld();
  assert.equal((await run("attack")).message, "Attack what?");
  assert.equal((await run("go")).message, "Go where?");
  assert.equal((await run("take")).message, "Take what?");
  assert.equal((await run("use")).message, "Use which maneuver?");
  assert.equal((await run("use power strike on")).message, "Use it on whom?");
});

test("multi-word maneuver names", async () => {
  const { run } = await inWorld();
  assert.equal(maneuverIdFromWords(["Power", "Strike"]), "power_strike");
  assert.deepEqual(await run("use power strike"), {
    ok: false,
    code: "invalid_target",
    message: "Use Power Strike on whom?",
  });
  assert.equal((await run("use riposte")).message, "You are not in a fight.");
});

test("[contract] bare directions walk", async () => {
  const { t, run } = await inWorld();
  const res = await run("N");
  assert.equal(res.ok, true);
  assert.equal(res.message.split("\n")[0], "Quiet Chapel");
  assert.equal(t.runtime.entities.roomOf(t.runtime.playerForSession("sess-1")?.id ?? ""), "chapel");
});

test("the dead can only ask for help", async () => {
  const { t, run } = await inWorld();
  const player = t.runtime.playerForSession("sess-1");
  assert.ok(player);
  t.runtime.entities.remove(player.id);

  assert.deepEqual(await run("look"), {
    ok: false,
    code: "blocked",
    message: "You are dead and cannot do that. The tide will carry you back shortly.",
  });
  assert.equal((await run("n")).code, "blocked");
  assert.equal((await run("time")).ok, true);
});
