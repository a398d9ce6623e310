// worldcore/test/roomRenderer.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { OccupantView, RoomView, formatItemName, renderRoom } from "../mud/RoomRenderer";
import type { RoomTemplate } from "../shared/ContentTypes";

const dock: RoomTemplate = {
  id: "dock",
  name: "Old Dock",
  description: "Tarred planks creak underfoot.",
  regionId: "coast",
  exposure: "outdoor",
  exits: { west: "street", north: "pier" },
  flags: {},
  spawnRules: [],
  lootRules: [],
};

function view(overrides: Partial<RoomView> = {}): RoomView {
  return {
    room: dock,
    viewerId: "me",
    weather: null,
    timeLine: "It is Noon.",
    storeStatus: null,
    occupants: [],
    items: [],
    ...overrides,
  };
}

function occupant(o: Partial<OccupantView> & Pick<OccupantView, "id" | "name" | "kind">): OccupantView {
  return { state: "Observing", health: "healthy", ...o };
}

test("bare room", () => {
  assert.equal(
    renderRoom(view()),
    "Old Dock\nTarred planks creak underfoot.\nIt is Noon.\nExits: north, west.",
  );
});

test("[contract] occupants carry health and what they are doing", () => {
  const text = renderRoom(
    view({
      weather: "A thin drizzle falls.",
      occupants: [
        occupant({ id: "me", name: "Tester", kind: "player" }),
        occupant({
          id: "p2",
          name: "Mira",
          kind: "player",
          state: "Engaged",
          health: "wounded",
          targetId: "c1",
          targetName: "a gull",
        }),
        occupant({ id: "c1", name: "a gull", kind: "creature", state: "Engaged", targetId: "me", targetName: "Tester" }),
        occupant({
          id: "c2",
          name: "a crab",
          kind: "creature",
          state: "Disengaging",
          health: "critical",
          targetId: "p2",
          targetName: "Mira",
        }),
        occupant({ id: "p3", name: "Oren", kind: "player", state: "Supporting" }),
      ],
      items: [
        { name: "a fish", quantity: 3 },
        { name: "a rope", quantity: 1 },
      ],
    }),
  );

  assert.deepEqual(text.split("\n"), [
    "Old Dock",
    "Tarred planks creak underfoot.",
    "A thin drizzle falls.",
    "It is Noon.",
    "Also here: Mira (adventurer, wounded, fighting a gull), a gull (fighting you), a crab (critical, backing away), Oren (adventurer, lending a hand).",
    "On the ground: a fish (x3), a rope.",
    "Exits: north, west.",
  ]);
});

test("shop status and dead ends", () => {
  const text = renderRoom(view({ room: { ...dock, exits: {} }, storeStatus: "Closed (opens at 10:00)" }));
  assert.deepEqual(text.split("\n").slice(3), [
    "The shop here is Closed (opens at 10:00).",
    "There are no obvious exits.",
  ]);
});

test("item quantities", () => {
  assert.equal(formatItemName({ name: "a fish", quantity: 3 }), "a fish (x3)");
  assert.equal(formatItemName({ name: "a fish", quantity: 1 }), "a fish");
});
