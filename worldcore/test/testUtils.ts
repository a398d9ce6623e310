// worldcore/test/testUtils.ts

import { InMemoryCharacterStore } from "../characters/CharacterStore";
import { CharacterSheet, defaultSheet } from "../characters/CharacterTypes";
import { playerFromSheet } from "../characters/characterSheet";
import { DeferredWriteQueue } from "../characters/DeferredWriteQueue";
import { CombatEngine } from "../combat/CombatEngine";
import { DeathPipeline } from "../combat/DeathPipeline";
import { PursuitResolver } from "../combat/PursuitResolver";
import { RuntimeConfig, makeRuntimeConfig } from "../config/RuntimeConfig";
import { EntityManager } from "../core/EntityManager";
import { RoomLocks } from "../core/RoomLocks";
import { RoomStateManager } from "../core/RoomStateManager";
import { TaskScheduler } from "../core/TaskScheduler";
import { MudRuntime, SessionRef } from "../mud/MudRuntime";
import type { CombatantInstance, PlayerInstance } from "../shared/Entity";
import type { EventSink, MudEvent } from "../shared/events";
import type { SessionSocket } from "../shared/Session";
import { ManualTimeSource } from "../time/TimeSource";
import { WorldClock } from "../time/WorldClock";
import type { RandomFn } from "../utils/Rng";
import { SpawnLootEngine, createCombatant } from "../world/SpawnLootEngine";
import { StaticContentCatalog } from "../world/StaticContentCatalog";
import { WeatherService, loadDefaultWeatherTables } from "../world/WeatherService";
import testWorld from "./fixtures/test-world.json";

/**
 * A RandomFn that hands out `seq` in order, then `fallback` forever.
 * Combat code draws in a fixed order, so a test can script every roll.
 */
export function scriptedRng(seq: number[], fallback = 0.5): RandomFn {
  let i = 0;
  return () => {
    const v = i < seq.length ? seq[i] : fallback;
    i++;
    return v;
  };
}

export interface RecordedEvent {
  to: "entity" | "room" | "session";
  target: string;
  event: MudEvent;
  except: readonly string[];
}

/** EventSink that keeps everything, for asserting on exact lines. */
export class RecordingSink implements EventSink {
  readonly log: RecordedEvent[] = [];

  toEntity(entityId: string, event: MudEvent): void {
    this.log.push({ to: "entity", target: entityId, event, except: [] });
  }

  toRoom(roomId: string, event: MudEvent, exceptEntityIds: readonly string[] = []): void {
    this.log.push({ to: "room", target: roomId, event, except: exceptEntityIds });
  }

  toSession(sessionId: string, event: MudEvent): void {
    this.log.push({ to: "session", target: sessionId, event, except: [] });
  }

  texts(to: RecordedEvent["to"], target: string): string[] {
    return this.log.filter((e) => e.to === to && e.target === target).map((e) => e.event.text);
  }

  roomTexts(roomId: string): string[] {
    return this.texts("room", roomId);
  }

  entityTexts(entityId: string): string[] {
    return this.texts("entity", entityId);
  }

  clear(): void {
    this.log.length = 0;
  }
}

/** Socket stand-in: keeps what was sent and how it was closed. */
export class FakeSocket implements SessionSocket {
  readonly sent: string[] = [];
  readonly closed: Array<{ code?: number; reason?: string }> = [];

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closed.push({ code, reason });
  }

  messages(): unknown[] {
    return this.sent.map((s): unknown => JSON.parse(s));
  }

  ops(): string[] {
    return this.messages().map((m) => (typeof m === "object" && m !== null && "op" in m ? String(m.op) : "?"));
  }
}

export function testContent(): StaticContentCatalog {
  return StaticContentCatalog.fromJson(testWorld);
}

/** A fighter with a 6-damage sword and no armor. */
export function testSheet(
  id: string,
  name: string,
  roomId: string,
  overrides: Partial<CharacterSheet> = {},
): CharacterSheet {
  return {
    ...defaultSheet(id, name, roomId),
    weaponTemplateId: "short_sword",
    armorTemplateIds: [],
    accuracy: 60,
    avoidance: 40,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Engine-level world: no runtime, no locks taken by the test itself.

export interface CombatWorld {
  content: StaticContentCatalog;
  config: RuntimeConfig;
  time: ManualTimeSource;
  clock: WorldClock;
  scheduler: TaskScheduler;
  locks: RoomLocks;
  entities: EntityManager;
  rooms: RoomStateManager;
  sink: RecordingSink;
  spawner: SpawnLootEngine;
  deaths: DeathPipeline;
  engine: CombatEngine;
  pursuit: PursuitResolver;
  addPlayer(name: string, roomId: string, overrides?: Partial<CharacterSheet>): PlayerInstance;
  addCreature(templateId: string, roomId: string): CombatantInstance;
}

export function makeCombatWorld(opts: { rng?: RandomFn; config?: Partial<RuntimeConfig> } = {}): CombatWorld {
  const content = testContent();
  const config = makeRuntimeConfig({ timeRatio: 1, worldStartSeconds: 0, respawnRoomId: "chapel", ...opts.config });
  const time = new ManualTimeSource(0);
  const clock = new WorldClock(time, { ratio: 1, startWorldSeconds: 0 });
  const scheduler = new TaskScheduler(clock);
  const locks = new RoomLocks();
  const entities = new EntityManager();
  const rooms = new RoomStateManager({
    resetSec: config.roomResetSec,
    idleHorizonSec: config.roomIdleHorizonSec,
    seedFor: (roomId) => `${roomId}:test`,
  });
  const sink = new RecordingSink();
  const spawner = new SpawnLootEngine({ entities, rooms, content });
  const deaths = new DeathPipeline({ entities, rooms, loot: spawner, events: sink });
  const engine = new CombatEngine({
    entities,
    content,
    config,
    events: sink,
    scheduler,
    locks,
    deaths,
    rng: opts.rng ?? scriptedRng([]),
  });
  const pursuit = new PursuitResolver({ entities, content, config, engine, events: sink });

  let players = 0;
  return {
    content,
    config,
    time,
    clock,
    scheduler,
    locks,
    entities,
    rooms,
    sink,
    spawner,
    deaths,
    engine,
    pursuit,
    addPlayer(name, roomId, overrides = {}) {
      players++;
      const sheet = testSheet(`char-${players}`, name, roomId, overrides);
      const player = playerFromSheet(sheet, content, `sess-${players}`, roomId, clock.worldMs());
      entities.add(player, roomId);
      return player;
    },
    addCreature(templateId, roomId) {
      const template = content.getCreature(templateId);
      if (!template) throw new Error(`no creature template ${templateId}`);
      const inst = createCombatant(template, roomId, clock.worldMs());
      entities.add(inst, roomId);
      return inst;
    },
  };
}

// ---------------------------------------------------------------------------
// Full runtime on the fixture world.

export interface TestRuntime {
  runtime: MudRuntime;
  time: ManualTimeSource;
  sink: RecordingSink;
  store: InMemoryCharacterStore;
  writes: DeferredWriteQueue;
  session: SessionRef;
}

/** Clock starts at 08:00 on day 0 and runs one world second per real second. */
export function makeTestRuntime(opts: { rng?: RandomFn; config?: Partial<RuntimeConfig> } = {}): TestRuntime {
  const time = new ManualTimeSource(0);
  const sink = new RecordingSink();
  const store = new InMemoryCharacterStore();
  const writes = new DeferredWriteQueue(store, { clock: time });
  const runtime = new MudRuntime({
    content: testContent(),
    config: makeRuntimeConfig({ timeRatio: 1, worldStartSeconds: 8 * 3600, respawnRoomId: "chapel", ...opts.config }),
    events: sink,
    writes,
    time,
    rng: opts.rng ?? scriptedRng([]),
    weather: new WeatherService(loadDefaultWeatherTables(), { seedFor: () => 7 }),
    roomSeedFor: (roomId) => `${roomId}:test`,
  });
  return { runtime, time, sink, store, writes, session: { id: "sess-1", displayName: "Tester" } };
}
