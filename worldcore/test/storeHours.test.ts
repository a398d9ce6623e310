// worldcore/test/storeHours.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { StoreHours } from "../time/StoreHours";
import { calendarAt } from "../time/WorldClock";

const at = (day: number, h: number, m = 0) => calendarAt(day * 86_400 + h * 3600 + m * 60);

function hours(): StoreHours {
  const s = new StoreHours();
  s.set({ storeId: "tavern", open: "10:00", close: "02:00" });
  s.set({ storeId: "fishmonger", open: "05:00", close: "13:00", closedDays: [6] });
  return s;
}

test("late hours wrap past midnight", () => {
  const s = hours();
  assert.equal(s.status("tavern", at(0, 1)), "Open");
  assert.equal(s.status("tavern", at(0, 3)), "Closed (opens at 10:00)");
  assert.equal(s.isOpen("tavern", at(0, 23, 30)), true);
});

test("closing minute is already closed", () => {
  assert.equal(hours().isOpen("tavern", at(0, 2)), false);
  assert.equal(hours().isOpen("fishmonger", at(0, 13)), false);
});

test("closed days stay shut all day", () => {
  const s = hours();
  assert.equal(s.status("fishmonger", at(6, 6)), "Closed (opens at 05:00)");
  assert.equal(s.status("fishmonger", at(5, 6)), "Open");
});

test("stores without hours never close", () => {
  const s = hours();
  assert.equal(s.has("smithy"), false);
  assert.equal(s.isOpen("smithy", at(0, 3)), true);
  assert.equal(s.status("smithy", at(0, 3)), "Open");
});
