// worldcore/combat/PursuitResolver.ts
//
// Decides whether an engaged combatant may walk out of a room, who follows,
// and when a pursuer gives up and goes home. Moves go through
// EntityManager.moveEntity only; the caller holds the locks for both rooms.

import type { RuntimeConfig } from "../config/RuntimeConfig";
import type { EntityManager } from "../core/EntityManager";
import type { BehaviorProfile, ContentCatalog } from "../shared/ContentTypes";
import type { CombatantInstance, CreatureInstance } from "../shared/Entity";
import type { EventSink } from "../shared/events";
import { IntentResult, fail, succeed } from "../shared/IntentResult";
import { Logger } from "../utils/logger";
import type { CombatEngine } from "./CombatEngine";

const log = Logger.scope("PURSUIT");

export interface PursuitResolverDeps {
  entities: EntityManager;
  content: ContentCatalog;
  config: RuntimeConfig;
  engine: CombatEngine;
  events: EventSink;
}

export interface LeaveOutcome {
  result: IntentResult;
  /** Pursuers that followed the mover into the destination. */
  pursuers: string[];
}

export interface LeashReturn {
  id: string;
  fromRoomId: string;
  toRoomId: string;
}

/** How many rooms a behavior lets a creature chase. "short" never goes past one. */
export function maxPursuitRooms(b: BehaviorProfile): number {
  switch (b.pursuit) {
    case "none":
      return 0;
    case "short":
      return Math.min(1, Math.max(0, b.leashRooms));
    case "long":
      return Math.max(0, b.leashRooms);
  }
}

export class PursuitResolver {
  constructor(private readonly deps: PursuitResolverDeps) {}

  /**
   * Whether `id` may leave its room right now.
   * - with leaveEndsCombat, always
   * - idle (Observing) or inside a flee window, yes
   * - anything else has to disengage first
   */
  canLeave(id: string): IntentResult {
    if (this.deps.config.leaveEndsCombat) return succeed("ok");
    const { engine } = this.deps;
    if (engine.isFleeing(id)) return succeed("ok");
    switch (engine.stateOf(id)) {
      case "Observing":
        return succeed("ok");
      case "Disengaging":
        return fail("blocked", "You are still looking for an opening.");
      case "Engaged":
      case "Supporting":
        return fail("blocked", "You are in combat! Disengage first.");
    }
  }

  /**
   * Walks `moverId` from its room to `toRoomId`, bringing any pursuers along.
   * Both room locks must be held.
   */
  leave(moverId: string, toRoomId: string): LeaveOutcome {
    const { entities, engine, events } = this.deps;
    const mover = entities.getCombatant(moverId);
    const fromRoomId = entities.roomOf(moverId);
    if (!mover || !fromRoomId) return { result: fail("invalid_target", "You are not in the world."), pursuers: [] };

    const gate = this.canLeave(moverId);
    if (!gate.ok) return { result: gate, pursuers: [] };

    const pursuers = this.deps.config.leaveEndsCombat ? [] : this.selectPursuers(mover, fromRoomId, toRoomId);

    for (const p of pursuers) engine.leaveCombat(p.id);
    engine.leaveCombat(moverId);
    entities.moveEntity(moverId, toRoomId);

    const now = engine.now();
    for (const p of pursuers) {
      if (!p.pursuit) {
        p.pursuit = { anchorRoomId: fromRoomId, targetId: moverId, startedAt: now, roomsAway: 0 };
      }
      p.pursuit.targetId = moverId;
      p.pursuit.roomsAway++;
      entities.moveEntity(p.id, toRoomId, "near");
      events.toRoom(fromRoomId, { kind: "presence", text: `${p.name} gives chase!`, roomId: fromRoomId });
      log.debug("Pursuit", { pursuer: p.id, target: moverId, from: fromRoomId, to: toRoomId, roomsAway: p.pursuit.roomsAway });
    }
    for (const p of pursuers) engine.engageFromPursuit(p.id, moverId, toRoomId);

    return { result: succeed("ok"), pursuers: pursuers.map((p) => p.id) };
  }

  /** Creatures in the mover's room that would follow it through this exit. */
  selectPursuers(mover: CombatantInstance, fromRoomId: string, toRoomId: string): CreatureInstance[] {
    const { entities, engine } = this.deps;
    if (this.blocksPursuit(fromRoomId) || this.blocksPursuit(toRoomId)) return [];

    const fleeOpponents = new Set(engine.fleeOpponents(mover.id));
    const now = engine.now();
    const out: CreatureInstance[] = [];

    for (const c of entities.listCombatantsInRoom(fromRoomId)) {
      if (c.kind !== "creature" || c.hp <= 0) continue;
      if (engine.targetOf(c.id) !== mover.id && !fleeOpponents.has(c.id)) continue;

      const maxRooms = maxPursuitRooms(c.behavior);
      const roomsAway = c.pursuit?.roomsAway ?? 0;
      if (roomsAway + 1 > maxRooms) continue;
      if (c.pursuit && now - c.pursuit.startedAt > c.behavior.leashSec * 1000) continue;
      out.push(c);
    }
    return out;
  }

  /** Pursuers whose chase is over: target gone, fight over, or leash time spent. */
  dueReturns(nowMs: number): LeashReturn[] {
    const out: LeashReturn[] = [];
    for (const e of this.deps.entities.getAll()) {
      if (e.kind !== "creature" || !e.pursuit) continue;
      const due = this.returnFor(e.id, nowMs);
      if (due) out.push(due);
    }
    return out;
  }

  /** The return trip `id` owes right now, or null while the chase is still on. */
  returnFor(id: string, nowMs: number): LeashReturn | null {
    const { entities, engine } = this.deps;
    const c = entities.getCombatant(id);
    if (!c || c.kind !== "creature" || !c.pursuit) return null;
    const roomId = entities.roomOf(id);
    if (!roomId) return null;

    const timedOut = nowMs - c.pursuit.startedAt > c.behavior.leashSec * 1000;
    const targetHere = entities.roomOf(c.pursuit.targetId) === roomId;
    const fighting = engine.stateOf(id) !== "Observing";
    if (timedOut || !targetHere || !fighting) {
      return { id, fromRoomId: roomId, toRoomId: c.pursuit.anchorRoomId };
    }
    return null;
  }

  /** Walks a pursuer back to where the chase began. Both room locks held. */
  returnToAnchor(id: string): boolean {
    const { entities, engine, events } = this.deps;
    const c = entities.getCombatant(id);
    if (!c || c.kind !== "creature" || !c.pursuit) return false;
    const fromRoomId = entities.roomOf(id);
    if (!fromRoomId) return false;

    const anchor = c.pursuit.anchorRoomId;
    engine.leaveCombat(id);
    c.pursuit = undefined;
    if (fromRoomId !== anchor) {
      entities.moveEntity(id, anchor);
      events.toRoom(fromRoomId, { kind: "presence", text: `${c.name} loses interest and slinks away.`, roomId: fromRoomId });
      events.toRoom(anchor, { kind: "presence", text: `${c.name} returns.`, roomId: anchor });
    }
    log.debug("Pursuer returned", { id, from: fromRoomId, to: anchor });
    return true;
  }

  private blocksPursuit(roomId: string): boolean {
    const flags = this.deps.content.getRoom(roomId)?.flags;
    return flags?.noPursuit === true || flags?.safe === true;
  }
}
