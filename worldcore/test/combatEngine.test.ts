// worldcore/test/combatEngine.test.ts
//
// Rolls are scripted in draw order: d20 initiative per session member, then
// for each swing attack d100, defense d100 and (on a hit) the crit roll.
// Every damage range in the fixture world is a single value, so damage never
// draws.

import test from "node:test";
import assert from "node:assert/strict";

import { fail, succeed } from "../shared/IntentResult";
import { makeCombatWorld, scriptedRng } from "./testUtils";

// Player 11 + 6 and a brute 11 + 5 / rat 11 + 4: the player always goes first.
const INIT = [0.5, 0.5];

test("[contract] attacking starts a session with frozen initiative and both tickers", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const rat = w.addCreature("rat", "yard");

  const res = w.engine.attack(player.id, rat.id);
  assert.equal(res.ok, true);
  assert.equal(res.message, "You attack a rat!");

  const session = w.engine.session("yard");
  assert.ok(session);
  assert.deepEqual(session.initiative, [player.id, rat.id]);
  assert.equal(w.engine.stateOf(player.id), "Engaged");
  assert.equal(w.engine.stateOf(rat.id), "Engaged");
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 3000);
  assert.equal(w.engine.ticker.get(rat.id)?.nextFireAt, 2100);
  assert.equal(w.engine.targetOf(rat.id), player.id);
  assert.equal(w.sink.entityTexts(player.id)[0], "You are fighting a rat.");

  const again = w.engine.attack(player.id, rat.id);
  assert.deepEqual(again, { ok: false, code: "noop", message: "You are already attacking a rat." });
});

test("a killing blow resolves at round end, drops loot and ends the fight", async () => {
  // rat misses (100 vs 40); player hits (51 vs 60, rat defense 91 fails)
  const w = makeCombatWorld({ rng: scriptedRng([...INIT, 0.99, 0.5, 0.5, 0.9, 0.5]) });
  const player = w.addPlayer("Tester", "yard");
  const rat = w.addCreature("rat", "yard");
  w.engine.attack(player.id, rat.id);

  w.time.set(3000);
  await w.scheduler.runDue();

  assert.equal(rat.hp, 0);
  assert.equal(w.entities.get(rat.id), undefined);
  assert.deepEqual(w.sink.roomTexts("yard"), [
    "[combat] a rat's bite misses Tester.",
    "[combat] Tester's slash hits a rat for 6 damage. (0/6 HP)",
    "[combat] a rat is slain by Tester.",
    "a rat drops: a rat tail.",
    "[round 1] No hostiles remain. a rat falls.",
  ]);
  assert.deepEqual(
    w.entities.listItemsInRoom("yard").map((i) => i.name),
    ["a rat tail"],
  );
  assert.equal(w.engine.session("yard"), undefined);
  assert.equal(w.engine.stateOf(player.id), "Observing");
  assert.equal(w.engine.ticker.count(), 0);
  assert.ok(w.sink.entityTexts(player.id).includes("You have no one left to fight."));
  assert.equal(w.deaths.handle(rat, 3000, "Tester"), null);
});

test("switching targets keeps the swing timer", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const first = w.addCreature("rat", "yard");
  const second = w.addCreature("rat", "yard");

  w.engine.attack(player.id, first.id);
  const res = w.engine.attack(player.id, second.id);

  assert.equal(res.message, "You turn your attacks on a rat.");
  assert.equal(w.engine.ticker.get(player.id)?.targetId, second.id);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 3000);
  assert.equal(w.engine.stateOf(second.id), "Engaged");
  assert.deepEqual(w.engine.session("yard")?.actionQueue(), [player.id, first.id, second.id]);
});

test("successful disengage opens a flee window and leaves the attacker idle", async () => {
  // brute misses; disengage roll 11 under avoidance 40 and under their 91
  const w = makeCombatWorld({ rng: scriptedRng([...INIT, 0.99, 0.5, 0.1, 0.9]) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  const res = w.engine.disengage(player.id);
  assert.equal(res.message, "You try to break away.");
  assert.equal(w.engine.stateOf(player.id), "Disengaging");
  assert.deepEqual(w.engine.disengage(player.id), {
    ok: false,
    code: "noop",
    message: "You are already trying to break away.",
  });

  w.time.set(3000);
  await w.scheduler.runDue();

  assert.equal(w.engine.isFleeing(player.id), true);
  assert.deepEqual(w.engine.fleeOpponents(player.id), [brute.id]);
  assert.equal(w.engine.stateOf(player.id), "Observing");
  assert.equal(w.engine.stateOf(brute.id), "Observing");
  assert.equal(w.engine.session("yard"), undefined);
  assert.ok(w.sink.entityTexts(player.id).includes("You break away! Now is your chance to leave."));
  assert.ok(w.sink.roomTexts("yard").includes("[combat] a brute's club misses Tester."));
  assert.ok(w.sink.roomTexts("yard").includes("[round 1] 1 hostile remains. Tester breaks away."));
});

test("failed disengage puts you back on your old target", async () => {
  const w = makeCombatWorld({ rng: scriptedRng([...INIT, 0.99, 0.5, 0.9, 0.5]) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);
  w.engine.disengage(player.id);

  w.time.set(3000);
  await w.scheduler.runDue();

  assert.equal(w.engine.stateOf(player.id), "Engaged");
  assert.equal(w.engine.ticker.get(player.id)?.targetId, brute.id);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 6000);
  assert.equal(w.engine.session("yard")?.round, 2);
  assert.ok(w.sink.entityTexts(player.id).includes("You fail to break away!"));
  assert.ok(w.sink.roomTexts("yard").includes("[round 1] 1 hostile remains."));
});

test("a readied riposte answers the attack that triggered it", async () => {
  const w = makeCombatWorld({
    rng: scriptedRng([...INIT, 0.5, 0.9, 0.5, 0.99, 0.5, 0.5, 0.9, 0.5]),
  });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  assert.equal(w.engine.useManeuver(player.id, "riposte").message, "You ready Riposte.");
  assert.equal(
    w.engine.useManeuver(player.id, "riposte").message,
    "You have already used your minor action this round.",
  );

  w.time.set(3000);
  await w.scheduler.runDue();

  assert.equal(brute.hp, 28);
  assert.equal(player.stamina, 11);
  const lines = w.sink.roomTexts("yard");
  assert.ok(lines.includes("[combat] Tester's slash hits a brute for 6 damage. (34/40 HP)"));
  assert.ok(lines.includes("Tester reacts with Riposte!"));
  assert.ok(lines.includes("[combat] Tester's Riposte hits a brute for 6 damage. (28/40 HP)"));
  assert.equal(w.engine.session("yard")?.get(player.id)?.readiedReaction, null);
  assert.equal(w.engine.session("yard")?.round, 2);
});

test("late joiners queue behind initiative and start at range", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const helper = w.addPlayer("Helper", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  const res = w.engine.joinCombat(helper.id);
  assert.equal(res.message, "You join the fight at a distance. Advance to close in on a brute.");
  assert.equal(w.engine.bandOf(helper.id), "far");
  assert.deepEqual(w.engine.session("yard")?.actionQueue(), [player.id, brute.id, helper.id]);
  assert.deepEqual(w.engine.session("yard")?.initiative, [player.id, brute.id]);

  assert.equal(w.engine.advance(helper.id).message, "You advance to near range.");
  assert.equal(w.engine.bandOf(helper.id), "near");
  assert.equal(w.engine.advance(helper.id).message, "You have already moved this round.");
  assert.ok(w.sink.roomTexts("yard").includes("Helper advances to near range."));
});

test("round left open past the timeout is closed by the sweep", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  w.time.set(8999);
  w.engine.sweepRoom("yard");
  assert.equal(w.engine.session("yard")?.round, 1);

  w.time.set(9000);
  w.engine.sweepRoom("yard");
  assert.equal(w.engine.session("yard")?.round, 2);
  assert.equal(w.engine.session("yard")?.roundStartedAt, 9000);
  assert.deepEqual(w.sink.roomTexts("yard"), ["[round 1] 1 hostile remains."]);
});

test("maneuvers check stamina before anything happens", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard", { stamina: 1 });
  const brute = w.addCreature("brute", "yard");

  assert.deepEqual(w.engine.useManeuver(player.id, "power_strike", brute.id), {
    ok: false,
    code: "resource",
    message: "You are too winded for Power Strike (4 stamina, you have 1).",
  });
  assert.equal(w.engine.session("yard"), undefined);

  assert.deepEqual(w.engine.useManeuver(player.id, "moonwalk"), {
    ok: false,
    code: "invalid_action",
    message: "You don't know a maneuver called 'moonwalk'.",
  });
});

test("gameplay failures come back as values", () => {
  const w = makeCombatWorld();
  const player = w.addPlayer("Tester", "chapel");
  const brute = w.addCreature("brute", "chapel");
  const loner = w.addPlayer("Loner", "yard");

  assert.deepEqual(w.engine.attack(player.id, brute.id), {
    ok: false,
    code: "blocked",
    message: "This is a place of peace. Nobody fights here.",
  });
  assert.deepEqual(w.engine.disengage(loner.id), {
    ok: false,
    code: "invalid_action",
    message: "You are not fighting anyone.",
  });
  assert.equal(w.engine.joinCombat(loner.id).message, "There is no fight here to join.");
  assert.equal(w.engine.attack(loner.id, brute.id).message, "a brute is not here.");
});

test("picking something up mid-fight spends the minor action", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const bystander = w.addPlayer("Helper", "lane");
  const rat = w.addCreature("rat", "yard");
  w.engine.attack(player.id, rat.id);

  assert.deepEqual(w.engine.interact(player.id, () => fail("invalid_target", "Nothing there.")), {
    ok: false,
    code: "invalid_target",
    message: "Nothing there.",
  });
  assert.equal(w.engine.interact(player.id, () => succeed("Got it.")).ok, true);
  assert.deepEqual(w.engine.interact(player.id, () => succeed("Again.")), {
    ok: false,
    code: "invalid_action",
    message: "You have already used your minor action this round.",
  });
  assert.equal(w.engine.advance(player.id).message, "You have already moved this round.");

  assert.equal(w.engine.interact(bystander.id, () => succeed("Free.")).ok, true);
  assert.equal(w.engine.interact(bystander.id, () => succeed("Free.")).ok, true);
});

test("[contract] a support maneuver mid-fight only pushes the next swing back", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard", { hp: 20 });
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  assert.equal(w.engine.useManeuver(player.id, "bandage").message, "You use Bandage on yourself.");
  assert.equal(w.engine.stateOf(player.id), "Engaged");
  assert.equal(w.engine.ticker.get(player.id)?.targetId, brute.id);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 3500);
  assert.equal(player.hp, 26);
  assert.equal(player.stamina, 9);
  assert.ok(w.sink.roomTexts("yard").includes("[combat] Tester's Bandage restores 6 health to Tester. (26/30 HP)"));
});

test("[contract] a second primary in the same round is refused and costs nothing", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT, 0.99) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");

  assert.equal(w.engine.useManeuver(player.id, "power_strike", brute.id).message, "You use Power Strike on a brute.");
  assert.equal(player.stamina, 8);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 4000);

  assert.deepEqual(w.engine.useManeuver(player.id, "power_strike", brute.id), {
    ok: false,
    code: "invalid_action",
    message: "You have already acted this round.",
  });
  assert.equal(player.stamina, 8);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 4000);
});

test("a rejected target leaves the primary action unspent", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);

  assert.deepEqual(w.engine.useManeuver(player.id, "bandage", brute.id), {
    ok: false,
    code: "invalid_target",
    message: "a brute is not an ally.",
  });
  assert.deepEqual(w.engine.useManeuver(player.id, "power_strike", "nobody"), {
    ok: false,
    code: "invalid_target",
    message: "That target is no longer here.",
  });
  assert.equal(w.engine.session("yard")?.get(player.id)?.primaryUsed, false);
  assert.equal(player.stamina, 12);

  assert.equal(w.engine.useManeuver(player.id, "power_strike", brute.id).ok, true);
  assert.equal(w.engine.session("yard")?.get(player.id)?.primaryUsed, true);
});

test("[contract] every ticker fire swings, even when it lands early in a round", async () => {
  // rat every 2100 ms, player every 3000 ms, every roll a miss
  const w = makeCombatWorld({ rng: scriptedRng(INIT, 0.99) });
  const player = w.addPlayer("Tester", "yard");
  const rat = w.addCreature("rat", "yard");
  w.engine.attack(player.id, rat.id);

  for (const t of [2100, 3000, 4200, 6000, 6300, 8400, 9000, 10500, 12000, 12600]) {
    w.time.set(t);
    await w.scheduler.runDue();
  }

  const lines = w.sink.roomTexts("yard");
  assert.equal(lines.filter((l) => l === "[combat] a rat's bite misses Tester.").length, 6);
  assert.equal(lines.filter((l) => l === "[combat] Tester's slash misses a rat.").length, 4);
  assert.equal(w.engine.session("yard")?.round, 6);
});

test("[contract] a supporter goes back to watching when the round closes", async () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT, 0.99) });
  const alpha = w.addPlayer("Alpha", "yard", { hp: 20 });
  const beta = w.addPlayer("Beta", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(alpha.id, brute.id);

  assert.equal(w.engine.useManeuver(beta.id, "bandage", alpha.id).message, "You use Bandage on Alpha.");
  assert.equal(alpha.hp, 26);
  assert.equal(w.engine.stateOf(beta.id), "Supporting");
  assert.equal(w.engine.ticker.isActive(beta.id), false);
  assert.equal(w.pursuit.canLeave(beta.id).message, "You are in combat! Disengage first.");

  w.time.set(3000);
  await w.scheduler.runDue();

  assert.equal(w.engine.session("yard")?.round, 2);
  assert.equal(w.engine.stateOf(beta.id), "Observing");
  assert.equal(w.engine.stateOf(alpha.id), "Engaged");
  assert.equal(w.pursuit.canLeave(beta.id).ok, true);
});

test("a fight with only supporters left is over", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const alpha = w.addPlayer("Alpha", "yard", { hp: 20 });
  const beta = w.addPlayer("Beta", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(alpha.id, brute.id);
  w.engine.useManeuver(beta.id, "bandage", alpha.id);

  w.engine.leaveCombat(brute.id);

  assert.equal(w.engine.session("yard"), undefined);
  assert.equal(w.engine.stateOf(alpha.id), "Observing");
  assert.equal(w.engine.stateOf(beta.id), "Observing");
  assert.equal(w.engine.ticker.count(), 0);
  assert.equal(w.pursuit.canLeave(beta.id).ok, true);
});

test("an attacker whose target leaves turns on the next one and keeps its timer", () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT) });
  const player = w.addPlayer("Tester", "yard");
  const first = w.addCreature("rat", "yard");
  const second = w.addCreature("rat", "yard");
  w.engine.attack(player.id, first.id);
  w.engine.attack(player.id, second.id);

  w.engine.leaveCombat(second.id);
  assert.equal(w.engine.ticker.isActive(second.id), false);
  assert.equal(w.engine.targetOf(player.id), first.id);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 3000);
  assert.equal(w.engine.stateOf(player.id), "Engaged");

  w.engine.leaveCombat(first.id);
  assert.equal(w.engine.ticker.isActive(player.id), false);
  assert.equal(w.engine.stateOf(player.id), "Observing");
  assert.equal(w.engine.session("yard"), undefined);
  assert.ok(w.sink.entityTexts(player.id).includes("You have no one left to fight."));
});

test("an unresolved disengage lapses after the timeout", async () => {
  const w = makeCombatWorld({ rng: scriptedRng(INIT), config: { disengageTimeoutSec: 2 } });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);
  w.engine.disengage(player.id);

  w.time.set(1999);
  await w.scheduler.runDue();
  assert.equal(w.engine.stateOf(player.id), "Disengaging");

  w.time.set(2000);
  await w.scheduler.runDue();

  assert.equal(w.engine.stateOf(player.id), "Engaged");
  assert.equal(w.engine.session("yard")?.get(player.id)?.pendingDisengage, null);
  assert.equal(w.engine.session("yard")?.round, 1);
  assert.equal(w.engine.ticker.get(player.id)?.targetId, brute.id);
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 5000);
  assert.ok(w.sink.entityTexts(player.id).includes("Your chance to break away passes."));
});

test("lingering past the flee window brings the old foe back", async () => {
  const w = makeCombatWorld({ rng: scriptedRng([...INIT, 0.99, 0.5, 0.1, 0.9]) });
  const player = w.addPlayer("Tester", "yard");
  const brute = w.addCreature("brute", "yard");
  w.engine.attack(player.id, brute.id);
  w.engine.disengage(player.id);

  w.time.set(3000);
  await w.scheduler.runDue();
  assert.equal(w.engine.isFleeing(player.id), true);

  w.time.set(11999);
  await w.scheduler.runDue();
  assert.equal(w.engine.isFleeing(player.id), true);
  assert.equal(w.engine.session("yard"), undefined);

  w.time.set(12000);
  await w.scheduler.runDue();

  assert.equal(w.engine.isFleeing(player.id), false);
  assert.equal(w.engine.stateOf(player.id), "Engaged");
  assert.equal(w.engine.stateOf(brute.id), "Engaged");
  assert.equal(w.engine.ticker.get(player.id)?.nextFireAt, 15000);
  assert.ok(w.sink.entityTexts(player.id).includes("You linger too long. a brute is upon you again."));
});

test("[contract] reactions stop at the per-round cap", async () => {
  const w = makeCombatWorld({ rng: scriptedRng([], 0.99), config: { maxReactionsPerRound: 1 } });
  const alpha = w.addPlayer("Alpha", "yard");
  const beta = w.addPlayer("Beta", "yard");
  const first = w.addCreature("rat", "yard");
  const second = w.addCreature("rat", "yard");
  w.engine.attack(alpha.id, first.id);
  w.engine.engageFromPursuit(second.id, beta.id, "yard");
  w.entities.setEngagement(second.id, { rangeBand: "engaged" });

  assert.equal(w.engine.useManeuver(alpha.id, "riposte").message, "You ready Riposte.");
  assert.equal(w.engine.useManeuver(beta.id, "riposte").message, "You ready Riposte.");

  w.time.set(3000);
  await w.scheduler.runDue();

  const lines = w.sink.roomTexts("yard");
  assert.ok(lines.includes("[combat] a rat's bite misses Beta."));
  assert.ok(lines.includes("Alpha reacts with Riposte!"));
  assert.equal(lines.includes("Beta reacts with Riposte!"), false);
  assert.equal(w.engine.session("yard")?.round, 2);
  assert.equal(w.engine.session("yard")?.get(beta.id)?.readiedReaction?.id, "riposte");
  assert.equal(alpha.stamina, 11);
  assert.equal(beta.stamina, 12);
});
