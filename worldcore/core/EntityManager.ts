// worldcore/core/EntityManager.ts

import {
  CombatantInstance,
  EntityInstance,
  EntityPosition,
  ItemInstance,
  PlayerInstance,
  isCombatant,
} from "../shared/Entity";
import type { RangeBand } from "../shared/ContentTypes";
import { Logger } from "../utils/logger";

const log = Logger.scope("ENTITY");

/**
 * Entity registry: live instances, their positions, and a per-room index.
 *
 * Invariants enforced here:
 *  - An instance and its position are added and removed together.
 *  - moveEntity() is the only way an instance changes rooms.
 *  - At most one player instance per session.
 */
export class EntityManager {
  private readonly instances = new Map<string, EntityInstance>();
  private readonly positions = new Map<string, EntityPosition>();
  private readonly byRoom = new Map<string, Set<string>>();
  private readonly bySession = new Map<string, string>();

  add(instance: EntityInstance, roomId: string, rangeBand?: RangeBand): void {
    if (this.instances.has(instance.id)) {
      throw new Error(`EntityManager.add: duplicate instance id ${instance.id}`);
    }
    if (instance.kind === "player") {
      const existing = this.bySession.get(instance.sessionId);
      if (existing) {
        throw new Error(`EntityManager.add: session ${instance.sessionId} already has player ${existing}`);
      }
      this.bySession.set(instance.sessionId, instance.id);
    }

    this.instances.set(instance.id, instance);
    this.positions.set(instance.id, { entityId: instance.id, roomId, rangeBand });
    this.indexRoom(instance.id, roomId);

    log.debug("Instance added", { id: instance.id, kind: instance.kind, templateId: instance.templateId, roomId });
  }

  get(id: string): EntityInstance | undefined {
    return this.instances.get(id);
  }

  /**
   * Combatant lookup that also repairs a half-present record (an instance
   * without a position or the other way round). Such a record is purged and
   * reported as missing.
   */
  getCombatant(id: string): CombatantInstance | undefined {
    const inst = this.instances.get(id);
    const pos = this.positions.get(id);
    if (inst && pos) return isCombatant(inst) ? inst : undefined;
    if (inst || pos) {
      log.warn("Purging stale entity record", { id, hasInstance: !!inst, hasPosition: !!pos });
      this.remove(id);
    }
    return undefined;
  }

  getPosition(id: string): EntityPosition | undefined {
    return this.positions.get(id);
  }

  roomOf(id: string): string | undefined {
    return this.positions.get(id)?.roomId;
  }

  getPlayerBySession(sessionId: string): PlayerInstance | undefined {
    const id = this.bySession.get(sessionId);
    if (!id) return undefined;
    const inst = this.instances.get(id);
    return inst && inst.kind === "player" ? inst : undefined;
  }

  listInRoom(roomId: string): EntityInstance[] {
    const ids = this.byRoom.get(roomId);
    if (!ids) return [];
    const out: EntityInstance[] = [];
    for (const id of ids) {
      const inst = this.instances.get(id);
      if (inst) out.push(inst);
    }
    return out;
  }

  listCombatantsInRoom(roomId: string): CombatantInstance[] {
    return this.listInRoom(roomId).filter(isCombatant);
  }

  listPlayersInRoom(roomId: string): PlayerInstance[] {
    const out: PlayerInstance[] = [];
    for (const e of this.listInRoom(roomId)) {
      if (e.kind === "player") out.push(e);
    }
    return out;
  }

  listItemsInRoom(roomId: string): ItemInstance[] {
    const out: ItemInstance[] = [];
    for (const e of this.listInRoom(roomId)) {
      if (e.kind === "item") out.push(e);
    }
    return out;
  }

  roomsWithEntities(): string[] {
    return [...this.byRoom.keys()];
  }

  getAll(): EntityInstance[] {
    return [...this.instances.values()];
  }

  count(): number {
    return this.instances.size;
  }

  /** The one path that changes an instance's room. Engagement is reset on arrival. */
  moveEntity(id: string, toRoomId: string, rangeBand?: RangeBand): void {
    const pos = this.positions.get(id);
    if (!pos) {
      throw new Error(`EntityManager.moveEntity: no position for ${id}`);
    }
    if (pos.roomId !== toRoomId) {
      this.unindexRoom(id, pos.roomId);
      this.indexRoom(id, toRoomId);
    }
    this.positions.set(id, { entityId: id, roomId: toRoomId, rangeBand });
  }

  /** Update band and/or engaged target inside the current room. null clears a field. */
  setEngagement(id: string, patch: { rangeBand?: RangeBand | null; engagedTargetId?: string | null }): void {
    const pos = this.positions.get(id);
    if (!pos) return;
    const next: EntityPosition = { ...pos };
    if (patch.rangeBand !== undefined) next.rangeBand = patch.rangeBand ?? undefined;
    if (patch.engagedTargetId !== undefined) next.engagedTargetId = patch.engagedTargetId ?? undefined;
    this.positions.set(id, next);
  }

  /** Hands a linkdead player over to a new session. */
  rebindSession(playerId: string, sessionId: string): boolean {
    const inst = this.instances.get(playerId);
    if (!inst || inst.kind !== "player") return false;
    const holder = this.bySession.get(sessionId);
    if (holder && holder !== playerId) {
      throw new Error(`EntityManager.rebindSession: session ${sessionId} already has player ${holder}`);
    }
    if (this.bySession.get(inst.sessionId) === playerId) this.bySession.delete(inst.sessionId);
    inst.sessionId = sessionId;
    this.bySession.set(sessionId, playerId);
    return true;
  }

  /** Removes instance and position together. */
  remove(id: string): EntityInstance | undefined {
    const inst = this.instances.get(id);
    const pos = this.positions.get(id);

    this.instances.delete(id);
    this.positions.delete(id);
    if (pos) this.unindexRoom(id, pos.roomId);
    if (inst && inst.kind === "player" && this.bySession.get(inst.sessionId) === id) {
      this.bySession.delete(inst.sessionId);
    }

    if (inst) {
      log.debug("Instance removed", { id, kind: inst.kind, roomId: pos?.roomId });
    }
    return inst;
  }

  private indexRoom(id: string, roomId: string): void {
    let set = this.byRoom.get(roomId);
    if (!set) {
      set = new Set();
      this.byRoom.set(roomId, set);
    }
    set.add(id);
  }

  private unindexRoom(id: string, roomId: string): void {
    const set = this.byRoom.get(roomId);
    if (!set) return;
    set.delete(id);
    if (set.size === 0) this.byRoom.delete(roomId);
  }
}
