// worldcore/test/combatant.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { asCombatant, healthLabel, inReach, stepBand } from "../combat/Combatant";
import type { AttackProfile } from "../shared/ContentTypes";
import { makeCombatWorld } from "./testUtils";

test("[contract] who may attack whom", () => {
  const w = makeCombatWorld();
  const a = w.addPlayer("Tester", "yard");
  const b = w.addPlayer("Helper", "yard");
  const rat = w.addCreature("rat", "yard");
  const brute = w.addCreature("brute", "yard");
  const baker = w.addCreature("baker", "yard");

  assert.equal(asCombatant(a).canAttack(b), false);
  assert.equal(asCombatant(a).canAttack(rat), true);
  assert.equal(asCombatant(rat).canAttack(a), true);
  assert.equal(asCombatant(rat).canAttack(brute), false);

  assert.equal(asCombatant(baker).canAttack(a), false);
  baker.lastAttackerId = a.id;
  assert.equal(asCombatant(baker).canAttack(a), true);
  assert.equal(asCombatant(baker).canAttack(b), false);

  rat.hp = 0;
  assert.equal(asCombatant(a).canAttack(rat), false);
});

test("health labels", () => {
  assert.equal(healthLabel(30, 30), "healthy");
  assert.equal(healthLabel(22, 30), "injured");
  assert.equal(healthLabel(14, 30), "wounded");
  assert.equal(healthLabel(7, 30), "critical");
  assert.equal(healthLabel(5, 0), "critical");
});

test("reach by band", () => {
  const melee: AttackProfile = {
    speedMultiplier: 1,
    damageMin: 1,
    damageMax: 1,
    damageType: "slashing",
    critChance: 0,
    accuracyBonus: 0,
    reach: "melee",
  };
  assert.equal(inReach(melee, "engaged", "near"), true);
  assert.equal(inReach(melee, "near", "engaged"), false);
  assert.equal(inReach(melee, "engaged", "far"), false);
  assert.equal(inReach({ ...melee, reach: "ranged" }, "far", "far"), true);

  assert.equal(stepBand("far", "in"), "near");
  assert.equal(stepBand("engaged", "in"), "engaged");
  assert.equal(stepBand("near", "out"), "far");
});

test("damage and healing stay within bounds", () => {
  const w = makeCombatWorld();
  const rat = asCombatant(w.addCreature("rat", "yard"));
  assert.equal(rat.takeDamage(4), 2);
  assert.equal(rat.heal(10), 6);
  assert.equal(rat.takeDamage(-3), 6);
  assert.equal(rat.spendStamina(5), false);
  assert.equal(rat.spendStamina(4), true);
  assert.equal(rat.instance.stamina, 0);
});
