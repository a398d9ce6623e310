// worldcore/test/taskScheduler.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { TaskScheduler } from "../core/TaskScheduler";

function clock(start = 0) {
  let now = start;
  return {
    reader: { worldMs: () => now },
    set(ms: number) {
      now = ms;
    },
  };
}

test("runs due tasks in (dueAt, id) order and leaves the rest", async () => {
  const c = clock();
  const s = new TaskScheduler(c.reader);
  const order: string[] = [];

  s.schedule(200, "late", () => {
    order.push("late");
  });
  s.schedule(100, "first", () => {
    order.push("first");
  });
  s.schedule(100, "second", () => {
    order.push("second");
  });
  s.schedule(500, "future", () => {
    order.push("future");
  });

  assert.equal(await s.runDue(200), 3);
  assert.deepEqual(order, ["first", "second", "late"]);
  assert.equal(s.pending(), 1);
});

test("cancelled tasks never run", async () => {
  const s = new TaskScheduler(clock().reader);
  let ran = false;
  const task = s.schedule(0, "x", () => {
    ran = true;
  });
  s.cancel(task);

  assert.equal(await s.runDue(100), 0);
  assert.equal(ran, false);
  assert.equal(task.token.cancelled, true);
});

test("a task scheduled during the pass runs in it when already due", async () => {
  const s = new TaskScheduler(clock().reader);
  const order: string[] = [];

  s.schedule(0, "outer", () => {
    order.push("outer");
    s.schedule(50, "inner", () => {
      order.push("inner");
    });
  });

  assert.equal(await s.runDue(100), 2);
  assert.deepEqual(order, ["outer", "inner"]);
});

test("[contract] overlapping runDue calls share one pass", async () => {
  const s = new TaskScheduler(clock().reader);
  let runs = 0;
  s.schedule(0, "slow", async () => {
    runs++;
    await new Promise<void>((resolve) => setImmediate(resolve));
  });

  const first = s.runDue(0);
  const second = s.runDue(0);

  assert.equal(first, second);
  assert.equal(await first, 1);
  assert.equal(runs, 1);
});

test("a failing task is logged and does not stop the pass", async () => {
  const s = new TaskScheduler(clock().reader);
  let after = false;
  s.schedule(0, "boom", () => {
    throw new Error("boom");
  });
  s.schedule(1, "after", () => {
    after = true;
  });

  assert.equal(await s.runDue(10), 1);
  assert.equal(after, true);
});

test("after() schedules relative to the clock", () => {
  const c = clock(1000);
  const s = new TaskScheduler(c.reader);
  assert.equal(s.after(250, "x", () => undefined).dueAt, 1250);
  assert.equal(s.after(-5, "y", () => undefined).dueAt, 1000);
});
