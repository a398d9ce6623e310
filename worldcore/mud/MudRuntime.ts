// worldcore/mud/MudRuntime.ts
//
// The room-state runtime behind the command layer.
//
// Owns every service and is the only place that takes room locks for player
// intents. The engines below it are synchronous and assume the lock is held;
// everything here that touches a room goes through RoomLocks first.
//
// Wiring that lives here and nowhere else:
//  - player death -> "You have died." -> respawn at config.respawnRoomId
//  - a player entering a room -> NPC schedule sync, spawn/loot rules,
//    zone encounter roll, aggressive creatures, regional weather
//  - the tick sweep -> stale rounds, leash returns, expiry, room cleanup
//  - disconnect -> linkdead grace window -> removal (or reclaim on reconnect)

import type { RuntimeConfig } from "../config/RuntimeConfig";
import { addToInventory, CharacterSheet } from "../characters/CharacterTypes";
import { playerFromSheet, sheetFromPlayer } from "../characters/characterSheet";
import type { DeferredWriteQueue } from "../characters/DeferredWriteQueue";
import { healthLabel } from "../combat/Combatant";
import { CombatEngine } from "../combat/CombatEngine";
import { DeathPipeline } from "../combat/DeathPipeline";
import { PursuitResolver } from "../combat/PursuitResolver";
import { EntityManager } from "../core/EntityManager";
import { RoomLocks } from "../core/RoomLocks";
import { RoomStateManager, RoomStateOptions } from "../core/RoomStateManager";
import { ScheduledTask, TaskScheduler } from "../core/TaskScheduler";
import type { ContentCatalog } from "../shared/ContentTypes";
import type { CombatantInstance, PlayerInstance } from "../shared/Entity";
import type { EventSink } from "../shared/events";
import { IntentResult, fail, succeed } from "../shared/IntentResult";
import type { Session } from "../shared/Session";
import { DeferralReason, NpcBusyCheck, NpcScheduler } from "../time/NpcScheduler";
import { StoreHours } from "../time/StoreHours";
import { TimeSource, systemTimeSource } from "../time/TimeSource";
import { WorldClock } from "../time/WorldClock";
import { ContentError } from "../utils/errors";
import { Logger } from "../utils/logger";
import type { RandomFn } from "../utils/Rng";
import { EncounterService } from "../world/EncounterService";
import { SpawnLootEngine, createCombatant } from "../world/SpawnLootEngine";
import { WeatherService, loadDefaultWeatherTables } from "../world/WeatherService";
import { resolveHandle } from "./handles/NearbyHandles";
import { OccupantView, formatItemName, renderRoom } from "./RoomRenderer";

const log = Logger.scope("RUNTIME");

export type SessionRef = Pick<Session, "id" | "displayName">;

export interface MudRuntimeDeps {
  content: ContentCatalog;
  config: RuntimeConfig;
  events: EventSink;
  writes: DeferredWriteQueue;
  /** Shared with the session layer, which resolves player ids to sockets. */
  entities?: EntityManager;
  /** Real-time source behind the world clock. */
  time?: TimeSource;
  rng?: RandomFn;
  weather?: WeatherService;
  roomSeedFor?: RoomStateOptions["seedFor"];
}

interface OnlineCharacter {
  player: PlayerInstance;
  sheet: CharacterSheet;
  linkdead: boolean;
  graceTask?: ScheduledTask;
}

const DIRECTION_ALIASES: Record<string, string> = {
  n: "north",
  s: "south",
  e: "east",
  w: "west",
  u: "up",
  d: "down",
  ne: "northeast",
  nw: "northwest",
  se: "southeast",
  sw: "southwest",
};

export function normalizeDirection(raw: string): string {
  const d = raw.trim().toLowerCase();
  return DIRECTION_ALIASES[d] ?? d;
}

const SELF_REFS = new Set(["me", "self", "myself"]);

export class MudRuntime {
  readonly content: ContentCatalog;
  readonly config: RuntimeConfig;
  readonly clock: WorldClock;
  readonly scheduler: TaskScheduler;
  readonly locks = new RoomLocks();
  readonly entities: EntityManager;
  readonly rooms: RoomStateManager;
  readonly weather: WeatherService;
  readonly npcSchedule = new NpcScheduler();
  readonly storeHours = new StoreHours();
  readonly spawner: SpawnLootEngine;
  readonly encounters: EncounterService;
  readonly deaths: DeathPipeline;
  readonly engine: CombatEngine;
  readonly pursuit: PursuitResolver;

  private readonly events: EventSink;
  private readonly writes: DeferredWriteQueue;
  private readonly time: TimeSource;
  private readonly online = new Map<string, OnlineCharacter>();
  private readonly npcInstances = new Map<string, string>();
  private readonly npcBusy = new Map<string, Exclude<DeferralReason, "combat">>();

  constructor(deps: MudRuntimeDeps) {
    const { content, config, events } = deps;
    if (!content.getRoom(config.respawnRoomId)) {
      throw new ContentError(`Respawn room ${config.respawnRoomId} is not in the loaded content`);
    }

    this.content = content;
    this.config = config;
    this.events = events;
    this.writes = deps.writes;
    this.time = deps.time ?? systemTimeSource;
    const rng = deps.rng ?? Math.random;

    this.clock = new WorldClock(this.time, { ratio: config.timeRatio, startWorldSeconds: config.worldStartSeconds });
    this.scheduler = new TaskScheduler(this.clock);
    this.entities = deps.entities ?? new EntityManager();
    this.rooms = new RoomStateManager({
      resetSec: config.roomResetSec,
      idleHorizonSec: config.roomIdleHorizonSec,
      seedFor: deps.roomSeedFor,
    });
    this.weather = deps.weather ?? new WeatherService(loadDefaultWeatherTables());

    for (const s of content.listSchedules()) this.npcSchedule.addSchedule(s.npcTemplateId, s.blocks);
    for (const h of content.listStoreHours()) this.storeHours.set(h);

    this.spawner = new SpawnLootEngine({ entities: this.entities, rooms: this.rooms, content });
    this.encounters = new EncounterService({
      content,
      rooms: this.rooms,
      spawner: this.spawner,
      config,
      events,
      rng,
    });
    this.deaths = new DeathPipeline({
      entities: this.entities,
      rooms: this.rooms,
      loot: this.spawner,
      events,
      onPlayerDeath: (player, roomId) => this.onPlayerDeath(player, roomId),
    });
    this.engine = new CombatEngine({
      entities: this.entities,
      content,
      config,
      events,
      scheduler: this.scheduler,
      locks: this.locks,
      deaths: this.deaths,
      rng,
      weather: (roomId, effect) => {
        const room = content.getRoom(roomId);
        if (!room) return 0;
        return this.weather.modifier(room.regionId, room.exposure, effect, this.clock.worldSeconds());
      },
    });
    this.pursuit = new PursuitResolver({ entities: this.entities, content, config, engine: this.engine, events });
  }

  // ---------------------------------------------------------------------------
  // Lookups

  /** The character behind a session, including one that is dead and waiting to respawn. */
  playerForSession(sessionId: string): PlayerInstance | undefined {
    return this.entryForSession(sessionId)?.player;
  }

  isLinkdead(characterId: string): boolean {
    return this.online.get(characterId)?.linkdead === true;
  }

  sheetOf(characterId: string): CharacterSheet | undefined {
    return this.online.get(characterId)?.sheet;
  }

  onlineCount(): number {
    return this.online.size;
  }

  // ---------------------------------------------------------------------------
  // Sessions

  /** Places a character in the world, or hands a lingering one to the new session. */
  async enterWorld(session: SessionRef, sheet: CharacterSheet): Promise<IntentResult> {
    if (this.online.has(sheet.id)) return this.reconnect(session, sheet.id);
    if (this.playerForSession(session.id)) {
      return fail("invalid_action", "This connection already has a character in the world.");
    }

    const roomId = this.content.getRoom(sheet.roomId) ? sheet.roomId : this.config.respawnRoomId;
    return this.locks.withRoom(roomId, () => {
      if (this.online.has(sheet.id)) return fail("blocked", `${sheet.name} is already in the world.`);

      const now = this.clock.worldMs();
      const player = playerFromSheet(sheet, this.content, session.id, roomId, now);
      this.entities.add(player, roomId);
      this.online.set(sheet.id, { player, sheet, linkdead: false });

      this.events.toRoom(roomId, { kind: "presence", text: `${player.name} arrives.`, roomId }, [player.id]);
      this.onPlayerEntered(roomId, player, now);
      log.info("Character entered the world", { characterId: sheet.id, sessionId: session.id, roomId });
      return succeed(this.describe(roomId, player.id));
    });
  }

  /** The connection dropped. The body stays for disconnectGraceSec, passive. */
  async disconnect(sessionId: string): Promise<void> {
    const entry = this.entryForSession(sessionId);
    if (!entry || entry.linkdead) return;
    const { player } = entry;
    entry.linkdead = true;

    const roomId = this.entities.roomOf(player.id);
    if (roomId) {
      await this.locks.withRoom(roomId, () => {
        if (this.entities.roomOf(player.id) !== roomId) return;
        this.engine.disconnect(player.id);
        this.events.toRoom(roomId, { kind: "presence", text: `${player.name}'s eyes glaze over.`, roomId }, [player.id]);
        this.snapshot(entry, roomId);
      });
    }

    this.scheduler.cancel(entry.graceTask);
    entry.graceTask = this.scheduler.after(this.config.disconnectGraceSec * 1000, `linkdead:${player.characterId}`, () =>
      this.removeLinkdead(player.characterId),
    );
    log.info("Character linkdead", { characterId: player.characterId, sessionId, graceSec: this.config.disconnectGraceSec });
  }

  async reconnect(session: SessionRef, characterId: string): Promise<IntentResult> {
    const entry = this.online.get(characterId);
    if (!entry) return fail("invalid_action", "There is no one here to reclaim.");

    this.scheduler.cancel(entry.graceTask);
    entry.graceTask = undefined;
    entry.linkdead = false;
    const { player } = entry;

    const roomId = this.entities.roomOf(player.id);
    if (!roomId) {
      // Dead and waiting on the respawn task; it will index the new session.
      player.sessionId = session.id;
      return succeed("You drift back toward the living.");
    }

    return this.locks.withRoom(roomId, () => {
      this.entities.rebindSession(player.id, session.id);
      this.engine.reconnect(player.id);
      const here = this.entities.roomOf(player.id) ?? roomId;
      this.events.toRoom(here, { kind: "presence", text: `${player.name} shakes off a daze.`, roomId: here }, [player.id]);
      log.info("Character reclaimed", { characterId, sessionId: session.id, roomId: here });
      return succeed(this.describe(here, player.id));
    });
  }

  // ---------------------------------------------------------------------------
  // Intents

  attack(actorId: string, targetRef: string): Promise<IntentResult> {
    return this.withActor(actorId, (roomId) => {
      const target = this.findCombatant(roomId, actorId, targetRef);
      if (!target) return fail("invalid_target", `You don't see '${targetRef}' here.`);
      return this.engine.attack(actorId, target.id);
    });
  }

  useManeuver(actorId: string, maneuverId: string, targetRef?: string): Promise<IntentResult> {
    return this.withActor(actorId, (roomId) => {
      if (targetRef === undefined || !targetRef.trim()) return this.engine.useManeuver(actorId, maneuverId);
      const target = SELF_REFS.has(targetRef.trim().toLowerCase())
        ? this.entities.getCombatant(actorId)
        : this.findCombatant(roomId, actorId, targetRef);
      if (!target) return fail("invalid_target", `You don't see '${targetRef}' here.`);
      return this.engine.useManeuver(actorId, maneuverId, target.id);
    });
  }

  disengage(actorId: string): Promise<IntentResult> {
    return this.withActor(actorId, () => this.engine.disengage(actorId));
  }

  joinCombat(actorId: string): Promise<IntentResult> {
    return this.withActor(actorId, () => this.engine.joinCombat(actorId));
  }

  advance(actorId: string): Promise<IntentResult> {
    return this.withActor(actorId, () => this.engine.advance(actorId));
  }

  retreat(actorId: string): Promise<IntentResult> {
    return this.withActor(actorId, () => this.engine.retreat(actorId));
  }

  async move(actorId: string, direction: string): Promise<IntentResult> {
    const fromRoomId = this.entities.roomOf(actorId);
    if (!fromRoomId) return fail("invalid_target", "You are not in the world.");
    const dir = normalizeDirection(direction);
    const toRoomId = this.content.getRoom(fromRoomId)?.exits[dir];
    if (!toRoomId) return fail("invalid_action", "You can't go that way.");

    return this.locks.withRooms([fromRoomId, toRoomId], () => {
      const mover = this.entities.getCombatant(actorId);
      if (!mover || this.entities.roomOf(actorId) !== fromRoomId) return fail("invalid_action", "You are already on the move.");

      const { result, pursuers } = this.pursuit.leave(actorId, toRoomId);
      if (!result.ok) return result;

      this.events.toRoom(fromRoomId, { kind: "presence", text: `${mover.name} leaves ${dir}.`, roomId: fromRoomId });
      this.events.toRoom(toRoomId, { kind: "presence", text: `${mover.name} arrives.`, roomId: toRoomId }, [
        actorId,
        ...pursuers,
      ]);

      if (mover.kind !== "player") return succeed(`You go ${dir}.`);
      const entry = this.online.get(mover.characterId);
      this.onPlayerEntered(toRoomId, mover, this.clock.worldMs());
      if (entry) this.snapshot(entry, toRoomId);
      return succeed(this.describe(toRoomId, actorId));
    });
  }

  pickUp(actorId: string, itemRef: string): Promise<IntentResult> {
    return this.withActor(actorId, (roomId, actor) => {
      if (actor.kind !== "player") return fail("invalid_action", "Only adventurers carry things.");
      const player = actor;
      const item = resolveHandle(this.entities.listItemsInRoom(roomId), itemRef);
      if (!item) return fail("invalid_target", `You don't see '${itemRef}' here.`);

      return this.engine.interact(player.id, () => {
        const taken = this.spawner.takeItem(roomId, item.id, player.sessionId);
        if (!taken.ok) return taken.result;

        const label = formatItemName(taken.item);
        const entry = this.online.get(player.characterId);
        if (entry) {
          addToInventory(entry.sheet, { templateId: taken.item.templateId, name: taken.item.name, quantity: taken.item.quantity });
          this.snapshot(entry, roomId);
        }
        this.events.toRoom(roomId, { kind: "presence", text: `${player.name} picks up ${label}.`, roomId }, [player.id]);
        return succeed(`You pick up ${label}.`);
      });
    });
  }

  async look(actorId: string): Promise<IntentResult> {
    const roomId = this.entities.roomOf(actorId);
    if (!roomId) return fail("invalid_target", "You are not in the world.");
    return succeed(await this.renderRoom(roomId, actorId));
  }

  renderRoom(roomId: string, viewerId?: string): Promise<string> {
    return this.locks.withRoom(roomId, () => this.describe(roomId, viewerId));
  }

  /** Stops an NPC's schedule from moving it while it trades or talks. */
  markNpcBusy(npcTemplateId: string, reason: Exclude<DeferralReason, "combat"> | null): void {
    if (reason) this.npcBusy.set(npcTemplateId, reason);
    else this.npcBusy.delete(npcTemplateId);
  }

  // ---------------------------------------------------------------------------
  // Tick

  /** One maintenance pass; the TickEngine calls this after scheduler.runDue(). */
  async sweep(): Promise<void> {
    const now = this.clock.worldMs();

    for (const roomId of this.engine.listSessionRoomIds()) {
      await this.locks.withRoom(roomId, () => this.engine.sweepRoom(roomId));
    }

    for (const due of this.pursuit.dueReturns(now)) {
      await this.locks.withRooms([due.fromRoomId, due.toRoomId], () => {
        const still = this.pursuit.returnFor(due.id, now);
        if (still && still.fromRoomId === due.fromRoomId) this.pursuit.returnToAnchor(due.id);
      });
    }

    const engaged = (id: string): boolean => this.engine.isInCombat(id);
    const regions = new Set<string>();
    for (const roomId of this.entities.roomsWithEntities()) {
      await this.locks.withRoom(roomId, () => {
        this.spawner.sweepExpired(roomId, now, engaged);
        if (!this.entities.listPlayersInRoom(roomId).length) return;
        this.syncNpcs(roomId);
        const regionId = this.content.getRoom(roomId)?.regionId;
        if (regionId) regions.add(regionId);
      });
    }
    for (const regionId of regions) this.advanceWeather(regionId);

    const dropped = this.rooms.cleanup(
      now,
      (roomId) => this.entities.listInRoom(roomId).length > 0 || this.engine.session(roomId) !== undefined,
    );
    if (dropped.length) log.debug("Idle room state dropped", { rooms: dropped });
  }

  /** Snapshot every character in the world; used on shutdown before the write queue flushes. */
  saveAll(): void {
    for (const entry of this.online.values()) {
      this.snapshot(entry, this.entities.roomOf(entry.player.id) ?? entry.sheet.roomId);
    }
  }

  // ---------------------------------------------------------------------------
  // Internals (lock held unless noted)

  private async withActor(
    actorId: string,
    fn: (roomId: string, actor: CombatantInstance) => IntentResult,
  ): Promise<IntentResult> {
    const roomId = this.entities.roomOf(actorId);
    if (!roomId) return fail("invalid_target", "You are not in the world.");
    return this.locks.withRoom(roomId, () => {
      const actor = this.entities.getCombatant(actorId);
      if (!actor || this.entities.roomOf(actorId) !== roomId) return fail("invalid_action", "You are already on the move.");
      return fn(roomId, actor);
    });
  }

  private entryForSession(sessionId: string): OnlineCharacter | undefined {
    for (const entry of this.online.values()) {
      if (entry.player.sessionId === sessionId) return entry;
    }
    return undefined;
  }

  private findCombatant(roomId: string, actorId: string, ref: string): CombatantInstance | undefined {
    const candidates = this.entities.listCombatantsInRoom(roomId).filter((c) => c.id !== actorId);
    return resolveHandle(candidates, ref);
  }

  private onPlayerEntered(roomId: string, player: PlayerInstance, now: number): void {
    this.rooms.access(roomId, now);
    this.syncNpcs(roomId);
    this.spawner.onRoomEntered(roomId, now, (id) => this.engine.isInCombat(id));
    this.encounters.onRoomEntered(roomId, now);
    this.engine.aggroOnEntry(roomId, player.id);
    const regionId = this.content.getRoom(roomId)?.regionId;
    if (regionId) this.advanceWeather(regionId);
  }

  private describe(roomId: string, viewerId?: string): string {
    const room = this.content.getRoom(roomId);
    if (!room) return "You are nowhere.";
    this.syncNpcs(roomId);
    this.advanceWeather(room.regionId);

    const nowSec = this.clock.worldSeconds();
    const cal = this.clock.calendar();
    const occupants: OccupantView[] = this.entities.listCombatantsInRoom(roomId).map((c) => {
      const targetId = this.engine.targetOf(c.id);
      return {
        id: c.id,
        name: c.name,
        kind: c.kind,
        state: this.engine.stateOf(c.id),
        health: healthLabel(c.hp, c.maxHp),
        targetId,
        targetName: targetId ? this.entities.get(targetId)?.name : undefined,
      };
    });

    return renderRoom({
      room,
      viewerId,
      weather: this.weather.overlay(room.regionId, room.exposure, nowSec),
      timeLine: this.clock.describe(),
      storeStatus: room.storeId ? this.storeHours.status(room.storeId, cal) : null,
      occupants,
      items: this.entities.listItemsInRoom(roomId).map((i) => ({ name: i.name, quantity: i.quantity })),
    });
  }

  private npcBusyCheck: NpcBusyCheck = (npcId) => {
    const instanceId = this.npcInstances.get(npcId);
    if (instanceId && this.engine.isInCombat(instanceId)) return "combat";
    return this.npcBusy.get(npcId) ?? null;
  };

  /** Brings scheduled NPCs in or out of `roomId` for the current hour. */
  private syncNpcs(roomId: string): void {
    const minute = this.clock.calendar().minuteOfDay;
    const relevant = new Set(this.npcSchedule.presentNpcs(roomId, minute, this.npcBusyCheck));
    for (const [templateId, instanceId] of this.npcInstances) {
      if (this.entities.roomOf(instanceId) === roomId) relevant.add(templateId);
    }
    for (const templateId of relevant) {
      this.placeNpc(templateId, this.npcSchedule.resolve(templateId, minute, this.npcBusyCheck), roomId);
    }
  }

  private placeNpc(templateId: string, targetRoomId: string | null, heldRoomId: string): void {
    const instanceId = this.npcInstances.get(templateId);
    const inst = instanceId ? this.entities.getCombatant(instanceId) : undefined;
    if (instanceId && !inst) this.npcInstances.delete(templateId);

    if (inst) {
      const current = this.entities.roomOf(inst.id);
      if (current === targetRoomId || !current) return;
      // The far end of the walk may be mid-intent; the next sweep or look tries again.
      const far = current === heldRoomId ? targetRoomId : current;
      if (far && far !== heldRoomId && this.locks.isLocked(far)) return;

      if (!targetRoomId) {
        this.entities.remove(inst.id);
        this.npcInstances.delete(templateId);
        this.events.toRoom(current, { kind: "presence", text: `${inst.name} heads off.`, roomId: current });
        return;
      }
      this.entities.moveEntity(inst.id, targetRoomId);
      this.events.toRoom(current, { kind: "presence", text: `${inst.name} heads off.`, roomId: current });
      this.events.toRoom(targetRoomId, { kind: "presence", text: `${inst.name} arrives.`, roomId: targetRoomId });
      return;
    }

    if (!targetRoomId) return;
    const template = this.content.getCreature(templateId);
    if (!template) {
      log.warn("Scheduled NPC has no template", { templateId });
      return;
    }
    const npc = createCombatant(template, targetRoomId, this.clock.worldMs());
    this.entities.add(npc, targetRoomId);
    this.npcInstances.set(templateId, npc.id);
  }

  private advanceWeather(regionId: string): void {
    const change = this.weather.maybeAdvance(regionId, this.clock.worldSeconds());
    if (!change) return;
    log.debug("Weather changed", { regionId, from: change.from, to: change.to });
    for (const room of this.content.listRooms()) {
      if (room.regionId !== regionId || room.exposure === "indoor") continue;
      this.events.toRoom(room.id, { kind: "weather", text: change.message, roomId: room.id });
    }
  }

  /** Folds the live player into its sheet and queues the write. Never waits on the store. */
  private snapshot(entry: OnlineCharacter, roomId: string): void {
    entry.sheet = sheetFromPlayer(entry.sheet, entry.player, roomId, new Date(this.time.nowMs()));
    this.writes.enqueue(entry.sheet);
  }

  private onPlayerDeath(player: PlayerInstance, deathRoomId: string): void {
    this.events.toSession(player.sessionId, { kind: "death", text: "You have died.", roomId: deathRoomId });
    this.scheduler.after(0, `respawn:${player.characterId}`, () => this.respawn(player));
  }

  // Scheduled; takes its own lock.
  private async respawn(player: PlayerInstance): Promise<void> {
    const roomId = this.config.respawnRoomId;
    await this.locks.withRoom(roomId, () => {
      const entry = this.online.get(player.characterId);
      if (!entry || entry.player !== player || this.entities.get(player.id)) return;
      if (this.entities.getPlayerBySession(player.sessionId)) return;

      player.hp = player.maxHp;
      player.stamina = player.maxStamina;
      player.lastAttackerId = undefined;
      this.entities.add(player, roomId);
      this.snapshot(entry, roomId);

      this.events.toRoom(roomId, { kind: "presence", text: `${player.name} staggers in, pale and shaken.`, roomId }, [
        player.id,
      ]);
      this.events.toEntity(player.id, { kind: "room", text: this.describe(roomId, player.id), roomId });
      log.info("Character respawned", { characterId: player.characterId, roomId });
    });
  }

  // Scheduled; takes its own lock.
  private async removeLinkdead(characterId: string): Promise<void> {
    const entry = this.online.get(characterId);
    if (!entry || !entry.linkdead) return;
    const { player } = entry;

    const roomId = this.entities.roomOf(player.id);
    if (!roomId) {
      this.online.delete(characterId);
      this.writes.enqueue(entry.sheet);
      return;
    }

    await this.locks.withRoom(roomId, () => {
      if (this.entities.roomOf(player.id) === roomId) {
        this.engine.leaveCombat(player.id);
        this.snapshot(entry, roomId);
        this.entities.remove(player.id);
        this.events.toRoom(roomId, { kind: "presence", text: `${player.name} fades from view.`, roomId });
      }
      this.online.delete(characterId);
    });
    log.info("Linkdead character removed", { characterId });
  }
}
