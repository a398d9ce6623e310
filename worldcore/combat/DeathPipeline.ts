// worldcore/combat/DeathPipeline.ts
//
// Canonical death pipeline, used by combat resolution and anything else that
// can bring hit points to zero.
//
// Goals:
//  - Single authoritative place for: registry removal, spawn-rule release,
//    encounter bookkeeping and the loot roll.
//  - Idempotent: calling it twice for the same death rolls loot once.
//  - The body leaves the registry in the same step that kills it.

import type { CombatantInstance, CreatureInstance, ItemInstance, NpcInstance, PlayerInstance } from "../shared/Entity";
import type { EventSink } from "../shared/events";
import type { EntityManager } from "../core/EntityManager";
import type { RoomStateManager } from "../core/RoomStateManager";
import { Logger } from "../utils/logger";
import { formatDeathLine } from "./CombatLog";

const log = Logger.scope("COMBAT");

export interface LootRoller {
  /** Rolls the victim's loot table once and places the drops in `roomId`. */
  rollDeathLoot(victim: CreatureInstance | NpcInstance, roomId: string, nowMs: number): ItemInstance[];
}

/** Takes over a dead player's body after it leaves the registry (respawn, save). */
export type PlayerDeathHook = (player: PlayerInstance, deathRoomId: string) => void;

export interface DeathPipelineDeps {
  entities: EntityManager;
  rooms: RoomStateManager;
  loot: LootRoller;
  events: EventSink;
  onPlayerDeath?: PlayerDeathHook;
}

export interface DeathOutcome {
  victimId: string;
  roomId: string;
  drops: ItemInstance[];
}

export class DeathPipeline {
  private readonly handled = new WeakSet<CombatantInstance>();

  constructor(private readonly deps: DeathPipelineDeps) {}

  /**
   * Returns null when there is nothing to do: the victim still has hit points,
   * is not in the registry, or was already handled.
   */
  handle(victim: CombatantInstance, nowMs: number, killerName?: string): DeathOutcome | null {
    if (victim.hp > 0 || this.handled.has(victim)) return null;

    const { entities, rooms, events } = this.deps;
    const roomId = entities.roomOf(victim.id);
    if (!roomId) return null;

    if (victim.kind !== "player") this.handled.add(victim);

    entities.remove(victim.id);
    events.toRoom(roomId, { kind: "death", text: formatDeathLine(victim.name, killerName), roomId, data: { id: victim.id } });

    if (victim.kind === "player") {
      log.info("Player died", { id: victim.id, roomId });
      this.deps.onPlayerDeath?.(victim, roomId);
      return { victimId: victim.id, roomId, drops: [] };
    }

    if (victim.kind === "creature") {
      if (victim.spawnRuleId) {
        rooms.releaseSpawn(victim.spawnRoomId ?? roomId, victim.spawnRuleId);
      }
      if (victim.encounterId) this.closeEncounterIfDone(victim, roomId);
    }

    const drops = victim.lootTableId ? this.deps.loot.rollDeathLoot(victim, roomId, nowMs) : [];
    if (drops.length) {
      const names = drops.map((d) => (d.quantity > 1 ? `${d.name} x${d.quantity}` : d.name));
      events.toRoom(roomId, { kind: "notice", text: `${victim.name} drops: ${names.join(", ")}.`, roomId });
    }

    log.debug("Combatant died", { id: victim.id, templateId: victim.templateId, roomId, drops: drops.length });
    return { victimId: victim.id, roomId, drops };
  }

  private closeEncounterIfDone(victim: CreatureInstance, roomId: string): void {
    const encounterId = victim.encounterId;
    if (!encounterId) return;
    const stillAlive = this.deps.entities
      .getAll()
      .some((e) => e.kind === "creature" && e.encounterId === encounterId);
    if (!stillAlive) {
      this.deps.rooms.removeEncounter(victim.spawnRoomId ?? roomId, encounterId);
    }
  }
}
