// worldcore/test/tickEngine.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { TaskScheduler } from "../core/TaskScheduler";
import { TickEngine, TickTarget } from "../core/TickEngine";

function target(sweep: () => Promise<void>): TickTarget & { ran: number } {
  const scheduler = new TaskScheduler({ worldMs: () => 0 });
  const t = { scheduler, sweep, ran: 0 };
  scheduler.schedule(0, "once", () => {
    t.ran++;
  });
  return t;
}

test("each tick runs due tasks; the sweep runs every N ticks", async () => {
  let sweeps = 0;
  const t = target(async () => {
    sweeps++;
  });
  const ticks: number[] = [];
  const engine = new TickEngine(t, { intervalMs: 100, sweepEveryTicks: 2, onTick: (_now, tick) => ticks.push(tick) });

  await engine.tick();
  await engine.tick();
  await engine.tick();

  assert.equal(t.ran, 1);
  assert.equal(sweeps, 1);
  assert.deepEqual(ticks, [1, 2, 3]);
  assert.equal(engine.ticks(), 3);
});

test("a failing sweep does not break the tick", async () => {
  const t = target(async () => {
    throw new Error("sweep failed");
  });
  const engine = new TickEngine(t, { intervalMs: 100, sweepEveryTicks: 1 });

  await engine.tick();
  assert.equal(engine.ticks(), 1);
});

test("stop without start is a no-op", async () => {
  const engine = new TickEngine(target(async () => undefined), { intervalMs: 100 });
  await engine.stop();
  assert.equal(engine.ticks(), 0);
});
