// worldcore/world/SpawnLootEngine.ts
// ------------------------------------------------------------
// Purpose:
// Turns room spawn/loot rules and loot tables into live instances.
// Every firing goes through RoomStateManager's atomic gate, so two
// players walking into the same room at once get one set of rats,
// not two. Instances roll their variation from the grant's seeded
// Rng, keyed by room seed, rule id and fire count.
// ------------------------------------------------------------

import type { EntityManager } from "../core/EntityManager";
import type { RoomStateManager } from "../core/RoomStateManager";
import type { LootRoller } from "../combat/DeathPipeline";
import type {
  ContentCatalog,
  CreatureTemplate,
  EncounterComposition,
  ItemTemplate,
  RoomTemplate,
} from "../shared/ContentTypes";
import type {
  ArmorPieceState,
  CombatantStats,
  CreatureInstance,
  ItemInstance,
  NpcInstance,
} from "../shared/Entity";
import { IntentResult, fail } from "../shared/IntentResult";
import { Logger } from "../utils/logger";
import { Rng } from "../utils/Rng";
import { instanceId } from "../utils/uuid";

const log = Logger.scope("SPAWN");

// ------------------------------------------------------------
// Types
// ------------------------------------------------------------

export interface SpawnLootDeps {
  entities: EntityManager;
  rooms: RoomStateManager;
  content: ContentCatalog;
  /** How long a death drop lies on the floor before it is swept. */
  dropExpirySec?: number;
}

export interface CreatureExtras {
  spawnRuleId?: string;
  spawnRoomId?: string;
  encounterId?: string;
  expiresAt?: number;
}

export interface RoomEntryReport {
  spawned: Array<CreatureInstance | NpcInstance>;
  placed: ItemInstance[];
  expired: string[];
}

export type TakeResult = { ok: true; item: ItemInstance } | { ok: false; result: IntentResult };

/** Is this combatant currently fighting? Engaged creatures are never swept. */
export type EngagedCheck = (id: string) => boolean;

const DEFAULT_DROP_EXPIRY_SEC = 600;

// ------------------------------------------------------------
// Instance builders
// ------------------------------------------------------------

export function armorFromTemplate(ownerId: string, template: CreatureTemplate): ArmorPieceState[] {
  return template.armor.map((a, i) => ({
    ...a,
    secondaryTypes: [...a.secondaryTypes],
    itemId: `${ownerId}:armor${i}`,
    name: `${a.slot} armor`,
    durability: a.maxDurability,
  }));
}

export function createCombatant(
  template: CreatureTemplate,
  roomId: string,
  nowMs: number,
  extras: CreatureExtras = {},
): CreatureInstance | NpcInstance {
  const id = instanceId(template.kind === "npc" ? "npc" : "cr");
  const stats: CombatantStats = {
    hp: template.maxHp,
    maxHp: template.maxHp,
    stamina: template.maxStamina,
    maxStamina: template.maxStamina,
    accuracy: template.accuracy,
    avoidance: template.avoidance,
    faction: template.faction,
    attack: { ...template.attack },
    armor: armorFromTemplate(id, template),
    behavior: { ...template.behavior },
    originRoomId: roomId,
  };

  if (template.kind === "npc") {
    return {
      ...stats,
      kind: "npc",
      id,
      templateId: template.id,
      name: template.name,
      createdAt: nowMs,
      lootTableId: template.lootTableId,
    };
  }

  return {
    ...stats,
    kind: "creature",
    id,
    templateId: template.id,
    name: template.name,
    createdAt: nowMs,
    expiresAt: extras.expiresAt,
    spawnRuleId: extras.spawnRuleId,
    spawnRoomId: extras.spawnRoomId,
    encounterId: extras.encounterId,
    lootTableId: template.lootTableId,
    tier: template.tier,
    role: template.role,
  };
}

export function createItem(
  template: ItemTemplate,
  nowMs: number,
  quantity: number,
  extras: { expiresAt?: number; lootRuleId?: string; lootRoomId?: string; ownerSessionId?: string } = {},
): ItemInstance {
  return {
    kind: "item",
    id: instanceId("it"),
    templateId: template.id,
    name: template.name,
    createdAt: nowMs,
    quantity: Math.max(1, Math.floor(quantity)),
    durability: template.armor?.maxDurability,
    ...extras,
  };
}

// ------------------------------------------------------------
// SpawnLootEngine
// ------------------------------------------------------------

export class SpawnLootEngine implements LootRoller {
  private readonly dropExpirySec: number;

  constructor(private readonly deps: SpawnLootDeps) {
    this.dropExpirySec = deps.dropExpirySec ?? DEFAULT_DROP_EXPIRY_SEC;
  }

  /**
   * Room access hook: sweep what has expired, then give every spawn and loot
   * rule its chance to fire. Racing callers are fine; the gate lets one win.
   */
  onRoomEntered(roomId: string, nowMs: number, isEngaged: EngagedCheck = () => false): RoomEntryReport {
    const report: RoomEntryReport = { spawned: [], placed: [], expired: [] };
    const room = this.deps.content.getRoom(roomId);
    if (!room) return report;

    report.expired = this.sweepExpired(roomId, nowMs, isEngaged);
    report.spawned = this.fireSpawnRules(room, nowMs);
    report.placed = this.fireLootRules(room, nowMs);
    return report;
  }

  fireSpawnRules(room: RoomTemplate, nowMs: number): Array<CreatureInstance | NpcInstance> {
    const out: Array<CreatureInstance | NpcInstance> = [];
    for (const rule of room.spawnRules) {
      const grant = this.deps.rooms.tryConsumeSpawn(room.id, rule, nowMs, (rng) => rng.int(rule.countMin, rule.countMax));
      if (!grant) continue;

      const template = this.deps.content.getCreature(rule.templateId);
      if (!template) {
        log.warn("Spawn rule names an unknown template", { roomId: room.id, ruleId: rule.id, templateId: rule.templateId });
        this.deps.rooms.releaseSpawn(room.id, rule.id, grant.count);
        continue;
      }

      for (let i = 0; i < grant.count; i++) {
        const inst = createCombatant(template, room.id, nowMs, { spawnRuleId: rule.id, spawnRoomId: room.id });
        this.vary(inst, grant.rng);
        this.deps.entities.add(inst, room.id);
        out.push(inst);
      }
      log.debug("Spawn rule fired", { roomId: room.id, ruleId: rule.id, count: grant.count, fire: grant.fireCount });
    }
    return out;
  }

  fireLootRules(room: RoomTemplate, nowMs: number): ItemInstance[] {
    const out: ItemInstance[] = [];
    for (const rule of room.lootRules) {
      const grant = this.deps.rooms.tryConsumeLoot(room.id, rule, nowMs, () => 1);
      if (!grant) continue;

      const template = this.deps.content.getItem(rule.itemTemplateId);
      if (!template) {
        log.warn("Loot rule names an unknown item", { roomId: room.id, ruleId: rule.id, itemTemplateId: rule.itemTemplateId });
        this.deps.rooms.releaseLoot(room.id, rule.id, grant.count);
        continue;
      }

      for (let i = 0; i < grant.count; i++) {
        const item = createItem(template, nowMs, grant.rng.int(rule.qtyMin, rule.qtyMax), {
          expiresAt: nowMs + rule.expirySec * 1000,
          lootRuleId: rule.id,
          lootRoomId: room.id,
        });
        this.deps.entities.add(item, room.id);
        out.push(item);
      }
    }
    return out;
  }

  /** Members of an encounter share one encounter id and one expiry. */
  spawnComposition(
    roomId: string,
    composition: EncounterComposition,
    encounterId: string,
    nowMs: number,
    expiresAt: number,
    rng: Rng,
  ): CreatureInstance[] {
    const out: CreatureInstance[] = [];
    for (const member of composition.members) {
      const template = this.deps.content.getCreature(member.templateId);
      if (!template || template.kind !== "creature") {
        log.warn("Encounter member is not a creature template", { key: composition.key, templateId: member.templateId });
        continue;
      }
      const n = rng.int(member.min, member.max);
      for (let i = 0; i < n; i++) {
        const inst = createCombatant(template, roomId, nowMs, { encounterId, expiresAt, spawnRoomId: roomId });
        if (inst.kind !== "creature") continue;
        this.vary(inst, rng);
        this.deps.entities.add(inst, roomId);
        out.push(inst);
      }
    }
    return out;
  }

  /** One roll of the victim's loot table. Drops land in the room where it fell. */
  rollDeathLoot(victim: CreatureInstance | NpcInstance, roomId: string, nowMs: number): ItemInstance[] {
    const tableId = victim.lootTableId;
    if (!tableId) return [];
    const table = this.deps.content.getLootTable(tableId);
    if (!table) {
      log.warn("Unknown loot table", { tableId, victim: victim.id });
      return [];
    }

    const seed = this.deps.rooms.access(roomId, nowMs).seed;
    const rng = new Rng(`${seed}:${victim.id}:loot`);
    const drops: ItemInstance[] = [];
    for (const entry of table.entries) {
      if (!rng.chance(entry.chance)) continue;
      const template = this.deps.content.getItem(entry.itemTemplateId);
      if (!template) continue;
      const item = createItem(template, nowMs, rng.int(entry.minQty, entry.maxQty), {
        expiresAt: nowMs + this.dropExpirySec * 1000,
      });
      this.deps.entities.add(item, roomId);
      drops.push(item);
    }
    return drops;
  }

  /**
   * Removes expired items and expired encounter creatures that are not in a
   * fight. Returns the removed instance ids.
   */
  sweepExpired(roomId: string, nowMs: number, isEngaged: EngagedCheck = () => false): string[] {
    const { entities, rooms } = this.deps;
    const removed: string[] = [];

    for (const e of entities.listInRoom(roomId)) {
      if (e.expiresAt === undefined || e.expiresAt > nowMs) continue;

      if (e.kind === "item") {
        entities.remove(e.id);
        if (e.lootRuleId) rooms.releaseLoot(e.lootRoomId ?? roomId, e.lootRuleId);
        removed.push(e.id);
      } else if (e.kind === "creature" && e.encounterId && !isEngaged(e.id)) {
        entities.remove(e.id);
        if (e.spawnRuleId) rooms.releaseSpawn(e.spawnRoomId ?? roomId, e.spawnRuleId);
        const encounterId = e.encounterId;
        const left = entities.getAll().some((o) => o.kind === "creature" && o.encounterId === encounterId);
        if (!left) rooms.removeEncounter(e.spawnRoomId ?? roomId, encounterId);
        removed.push(e.id);
      }
    }

    if (removed.length) log.debug("Expired instances swept", { roomId, count: removed.length });
    return removed;
  }

  /** Pick-up: the item leaves the world and its loot rule gets the slot back. */
  takeItem(roomId: string, itemId: string, sessionId?: string): TakeResult {
    const { entities, rooms } = this.deps;
    const item = entities.get(itemId);
    if (!item || item.kind !== "item" || entities.roomOf(itemId) !== roomId) {
      return { ok: false, result: fail("invalid_target", "You don't see that here.") };
    }
    if (item.ownerSessionId && item.ownerSessionId !== sessionId) {
      return { ok: false, result: fail("blocked", `${item.name} is not yours to take.`) };
    }

    entities.remove(itemId);
    if (item.lootRuleId) rooms.releaseLoot(item.lootRoomId ?? roomId, item.lootRuleId);
    return { ok: true, item };
  }

  // Small per-instance spread so a pack of rats is not five clones.
  private vary(inst: CreatureInstance | NpcInstance, rng: Rng): void {
    const spread = Math.floor(inst.maxHp / 10);
    if (spread <= 0) return;
    inst.maxHp = Math.max(1, inst.maxHp + rng.int(-spread, spread));
    inst.hp = inst.maxHp;
  }
}
