// worldcore/test/logger.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { Logger } from "../utils/logger";
import { logFormat, parseLevel, scopeLevel } from "../config/logconfig";
import { formatLogLine } from "../../mmo-backend/FileLogTap";

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(vars)) {
    saved[k] = process.env[k];
    if (v === undefined) delete process.env[k];
    else process.env[k] = v;
  }
  try {
    fn();
  } finally {
    for (const [k, v] of Object.entries(saved)) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  }
}

test("[contract] scope level resolution", () => {
  assert.equal(parseLevel(" Warn"), "warn");
  assert.equal(parseLevel("loud"), null);
  assert.equal(scopeLevel("combat", { LOG_SCOPE_COMBAT: "debug" }), "debug");
  assert.equal(scopeLevel("combat", { LOG_LEVEL: "WARN" }), "warn");
  assert.equal(scopeLevel("server", { LOG_LEVEL: "warn" }), "debug");
  assert.equal(scopeLevel("combat", {}), "error");
  assert.equal(logFormat({ LOG_FORMAT: "JSON" }), "json");
  assert.equal(logFormat({}), "text");
});

test("child fields fold into the meta object", (t) => {
  const lines: unknown[][] = [];
  t.mock.method(console, "log", (...args: unknown[]) => {
    lines.push(args);
  });

  withEnv({ LOG_SCOPE_TESTLOG: "debug", LOG_FORMAT: undefined, NO_COLOR: "1" }, () => {
    Logger.scope("testlog").child({ roomId: "yard" }).info("Round", { round: 2 });
    Logger.scope("testlog").child({ roomId: "yard" }).debug("Bare");
  });

  assert.equal(lines.length, 2);
  assert.match(String(lines[0][0]), /^\d\d:\d\d:\d\d\.\d{3} \[TESTLOG:INFO\] Round$/);
  assert.deepEqual(lines[0][1], { roomId: "yard", round: 2 });
  assert.deepEqual(lines[1].slice(1), [{ roomId: "yard" }]);
});

test("json lines carry scope, level and rendered errors", (t) => {
  const lines: unknown[][] = [];
  t.mock.method(console, "log", (...args: unknown[]) => {
    lines.push(args);
  });

  withEnv({ LOG_SCOPE_TESTLOG: "debug", LOG_FORMAT: "json" }, () => {
    Logger.scope("testlog").child({ roomId: "yard" }).warn("Failed", new Error("boom"), 7);
  });

  assert.equal(lines.length, 1);
  const parsed: unknown = JSON.parse(String(lines[0][0]));
  assert.ok(typeof parsed === "object" && parsed !== null);
  assert.deepEqual(
    { ...parsed, t: undefined, stack: undefined },
    { t: undefined, scope: "TESTLOG", level: "warn", msg: "Failed", roomId: "yard", error: "boom", name: "Error", stack: undefined, extra: [7] },
  );
});

test("levels below the scope's are dropped", (t) => {
  const lines: unknown[][] = [];
  t.mock.method(console, "log", (...args: unknown[]) => {
    lines.push(args);
  });

  withEnv({ LOG_SCOPE_TESTLOG: "warn" }, () => {
    const log = Logger.scope("testlog");
    log.debug("quiet");
    log.info("quiet");
    log.success("quiet");
  });

  assert.equal(lines.length, 0);
});

test("file log lines are stamped and stripped of color", () => {
  assert.equal(
    formatLogLine("warn", ["\x1b[33m[X:WARN]\x1b[0m hi", { a: 1 }], new Date(0)),
    "[1970-01-01T00:00:00.000Z] [warn] [X:WARN] hi { a: 1 }\n",
  );
});
