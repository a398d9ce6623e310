// worldcore/test/roomState.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { RoomStateManager } from "../core/RoomStateManager";
import { Rng } from "../utils/Rng";

const rule = { id: "r1", maxAlive: 2, cooldownSec: 60 };

function manager(): RoomStateManager {
  return new RoomStateManager({ resetSec: 3600, idleHorizonSec: 1800 });
}

test("[contract] spawn gate respects the ceiling and the cooldown", () => {
  const m = manager();

  const first = m.tryConsumeSpawn("r", rule, 0, () => 5);
  assert.ok(first);
  assert.equal(first.count, 2);
  assert.equal(first.fireCount, 1);

  assert.equal(m.tryConsumeSpawn("r", rule, 0, () => 5), null);

  m.releaseSpawn("r", "r1");
  assert.equal(m.tryConsumeSpawn("r", rule, 1000, () => 5), null, "still cooling down");

  const second = m.tryConsumeSpawn("r", rule, 60_000, () => 5);
  assert.ok(second);
  assert.equal(second.count, 1);
  assert.equal(second.fireCount, 2);
  assert.equal(m.timer("spawn", "r", "r1")?.aliveCount, 2);
});

test("a firing always grants at least one", () => {
  const m = manager();
  const grant = m.tryConsumeLoot("r", { id: "l1", maxAlive: 3, cooldownSec: 0 }, 0, () => 0);
  assert.equal(grant?.count, 1);
});

test("release never goes below zero", () => {
  const m = manager();
  m.tryConsumeSpawn("r", rule, 0, () => 1);
  m.releaseSpawn("r", "r1", 5);
  assert.equal(m.timer("spawn", "r", "r1")?.aliveCount, 0);
});

test("grant rng is seeded from room seed, rule and fire count", () => {
  const a = manager().tryConsumeSpawn("r", rule, 0, () => 1);
  const b = manager().tryConsumeSpawn("r", rule, 0, () => 1);
  assert.ok(a && b);

  const expected = new Rng("r:0:r1:1").next();
  assert.equal(a.rng.next(), expected);
  assert.equal(b.rng.next(), expected);
});

test("state reseeds once the reset horizon passes", () => {
  const m = manager();
  assert.equal(m.access("r", 0).seed, "r:0");

  const later = m.access("r", 3_600_000);
  assert.equal(later.seed, "r:3600000");
  assert.equal(later.version, 2);
  assert.equal(later.lastResetAt, 3_600_000);
});

test("cleanup drops idle, empty rooms only", () => {
  const m = manager();
  m.access("a", 0);
  m.access("b", 1_000_000);

  assert.deepEqual(
    m.cleanup(1_800_000, () => true),
    [],
  );
  assert.deepEqual(
    m.cleanup(1_800_000, () => false),
    ["a"],
  );
  assert.deepEqual(m.listRoomIds(), ["b"]);
});

test("encounter rolls are gated by cooldown", () => {
  const m = manager();
  assert.equal(m.tryConsumeEncounterRoll("r", 0, 120), true);
  assert.equal(m.tryConsumeEncounterRoll("r", 119_999, 120), false);
  assert.equal(m.tryConsumeEncounterRoll("r", 120_000, 120), true);
});
