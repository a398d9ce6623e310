// worldcore/world/StaticContentCatalog.ts
//
// Immutable content loaded once at boot. The JSON is validated with zod and
// cross-checked (exits, templates, loot tables, compositions) before anything
// runs; a bad file fails fast with a ContentError listing every problem.

import { z } from "zod";

import demoWorld from "../data/demo-world.json";
import { DAMAGE_TYPES } from "../shared/ContentTypes";
import type {
  ContentCatalog,
  CreatureTemplate,
  EncounterComposition,
  ItemTemplate,
  LootTable,
  ManeuverDef,
  NpcScheduleDef,
  RoomTemplate,
  WorldContent,
  ZoneEncounterTable,
} from "../shared/ContentTypes";
import type { StoreHoursDef } from "../time/StoreHours";
import { ContentError } from "../utils/errors";
import { Logger } from "../utils/logger";

const log = Logger.scope("CONTENT");

const damageType = z.enum(DAMAGE_TYPES);
const clock = z.string().regex(/^\d{1,2}:\d{2}$/, "expected HH:MM");

const AttackProfileSchema = z.object({
  speedMultiplier: z.number().positive(),
  accuracyBonus: z.number().default(0),
  damageMin: z.number().int().nonnegative(),
  damageMax: z.number().int().nonnegative(),
  damageType,
  critChance: z.number().min(0).max(1).default(0.05),
  reach: z.enum(["melee", "ranged"]).default("melee"),
  verb: z.string().optional(),
});

const ArmorPieceSchema = z.object({
  slot: z.enum(["head", "chest", "arms", "legs", "shield"]),
  primaryType: damageType,
  secondaryTypes: z.array(damageType).default([]),
  reduction: z.number().int().nonnegative(),
  maxDurability: z.number().int().positive(),
});

const BehaviorSchema = z.object({
  pursuit: z.enum(["none", "short", "long"]).default("none"),
  leashRooms: z.number().int().nonnegative().default(0),
  leashSec: z.number().nonnegative().default(60),
  aggressive: z.boolean().default(false),
  threat: z.enum(["last_attacker", "lowest_hp", "first"]).default("last_attacker"),
});

const CreatureSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["creature", "npc"]).default("creature"),
  name: z.string().min(1),
  description: z.string().optional(),
  maxHp: z.number().int().positive(),
  maxStamina: z.number().int().nonnegative().default(10),
  accuracy: z.number(),
  avoidance: z.number(),
  faction: z.string().min(1),
  attack: AttackProfileSchema,
  armor: z.array(ArmorPieceSchema).default([]),
  behavior: BehaviorSchema.default({}),
  lootTableId: z.string().optional(),
  tier: z.string().optional(),
  role: z.string().optional(),
});

const ItemSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  stackable: z.boolean().default(false),
  weapon: AttackProfileSchema.optional(),
  armor: ArmorPieceSchema.optional(),
});

const SpawnRuleSchema = z
  .object({
    id: z.string().min(1),
    templateId: z.string().min(1),
    maxAlive: z.number().int().positive(),
    cooldownSec: z.number().nonnegative(),
    countMin: z.number().int().positive().default(1),
    countMax: z.number().int().positive().default(1),
  })
  .refine((r) => r.countMax >= r.countMin, { message: "countMax must be >= countMin" });

const LootRuleSchema = z
  .object({
    id: z.string().min(1),
    itemTemplateId: z.string().min(1),
    maxAlive: z.number().int().positive(),
    cooldownSec: z.number().nonnegative(),
    qtyMin: z.number().int().positive().default(1),
    qtyMax: z.number().int().positive().default(1),
    expirySec: z.number().positive(),
  })
  .refine((r) => r.qtyMax >= r.qtyMin, { message: "qtyMax must be >= qtyMin" });

const RoomSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  regionId: z.string().min(1),
  zone: z.string().optional(),
  exposure: z.enum(["indoor", "sheltered", "outdoor", "coastal"]).default("outdoor"),
  exits: z.record(z.string()).default({}),
  flags: z.object({ noPursuit: z.boolean().optional(), safe: z.boolean().optional() }).default({}),
  spawnRules: z.array(SpawnRuleSchema).default([]),
  lootRules: z.array(LootRuleSchema).default([]),
  storeId: z.string().optional(),
});

const ManeuverSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  kind: z.enum(["strike", "reaction", "support"]),
  staminaCost: z.number().int().nonnegative(),
  accuracyMod: z.number().default(0),
  damageMultiplier: z.number().nonnegative().default(1),
  tickerDelaySec: z.number().nonnegative().default(0),
  applies: z
    .object({
      modifier: z.enum(["exposed", "pinned", "staggered"]),
      to: z.enum(["target", "self"]),
      rounds: z.number().int().positive(),
    })
    .optional(),
  trigger: z.enum(["attacked", "disengage"]).optional(),
  heal: z.number().int().nonnegative().optional(),
});

const LootTableSchema = z.object({
  id: z.string().min(1),
  entries: z.array(
    z.object({
      itemTemplateId: z.string().min(1),
      chance: z.number().min(0).max(1),
      minQty: z.number().int().positive().default(1),
      maxQty: z.number().int().positive().default(1),
    }),
  ),
});

const EncounterTableSchema = z.object({
  zone: z.string().min(1),
  rows: z.array(
    z.object({
      min: z.number().int().min(1).max(100),
      max: z.number().int().min(1).max(100),
      type: z.enum(["combat", "flavor", "nothing"]),
      compositionKey: z.string().optional(),
      text: z.string().optional(),
    }),
  ),
});

const CompositionSchema = z.object({
  key: z.string().min(1),
  members: z.array(
    z.object({ templateId: z.string().min(1), min: z.number().int().nonnegative(), max: z.number().int().nonnegative() }),
  ),
});

const ScheduleSchema = z.object({
  npcTemplateId: z.string().min(1),
  blocks: z.array(z.object({ start: clock, end: clock, roomId: z.string().min(1) })),
});

const StoreHoursSchema = z.object({
  storeId: z.string().min(1),
  open: clock,
  close: clock,
  closedDays: z.array(z.number().int().nonnegative()).optional(),
});

const WorldContentSchema = z.object({
  rooms: z.array(RoomSchema),
  creatures: z.array(CreatureSchema).default([]),
  items: z.array(ItemSchema).default([]),
  maneuvers: z.array(ManeuverSchema).default([]),
  lootTables: z.array(LootTableSchema).default([]),
  encounterTables: z.array(EncounterTableSchema).default([]),
  compositions: z.array(CompositionSchema).default([]),
  schedules: z.array(ScheduleSchema).default([]),
  storeHours: z.array(StoreHoursSchema).default([]),
});

export function parseWorldContent(raw: unknown): WorldContent {
  const parsed = WorldContentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ContentError(`Invalid world content: ${issues.join("; ")}`);
  }
  const content: WorldContent = parsed.data;
  return content;
}

function indexById<T extends { id: string }>(list: readonly T[], what: string, problems: string[]): Map<string, T> {
  const map = new Map<string, T>();
  for (const x of list) {
    if (map.has(x.id)) problems.push(`duplicate ${what} id ${x.id}`);
    map.set(x.id, x);
  }
  return map;
}

export class StaticContentCatalog implements ContentCatalog {
  private readonly rooms: Map<string, RoomTemplate>;
  private readonly creatures: Map<string, CreatureTemplate>;
  private readonly items: Map<string, ItemTemplate>;
  private readonly maneuvers: Map<string, ManeuverDef>;
  private readonly lootTables: Map<string, LootTable>;
  private readonly encounterTables = new Map<string, ZoneEncounterTable>();
  private readonly compositions = new Map<string, EncounterComposition>();

  constructor(private readonly content: WorldContent) {
    const problems: string[] = [];
    this.rooms = indexById(content.rooms, "room", problems);
    this.creatures = indexById(content.creatures, "creature", problems);
    this.items = indexById(content.items, "item", problems);
    this.maneuvers = indexById(content.maneuvers, "maneuver", problems);
    this.lootTables = indexById(content.lootTables, "loot table", problems);
    for (const t of content.encounterTables) this.encounterTables.set(t.zone, t);
    for (const c of content.compositions) this.compositions.set(c.key, c);

    this.crossCheck(problems);
    if (problems.length) {
      throw new ContentError(`World content failed validation: ${problems.join("; ")}`);
    }
    log.debug("Content loaded", { rooms: this.rooms.size, creatures: this.creatures.size, items: this.items.size });
  }

  static fromJson(raw: unknown): StaticContentCatalog {
    return new StaticContentCatalog(parseWorldContent(raw));
  }

  /** The bundled demo harbor. */
  static demo(): StaticContentCatalog {
    return StaticContentCatalog.fromJson(demoWorld);
  }

  getRoom(id: string): RoomTemplate | undefined {
    return this.rooms.get(id);
  }

  listRooms(): RoomTemplate[] {
    return [...this.rooms.values()];
  }

  getCreature(id: string): CreatureTemplate | undefined {
    return this.creatures.get(id);
  }

  getItem(id: string): ItemTemplate | undefined {
    return this.items.get(id);
  }

  getManeuver(id: string): ManeuverDef | undefined {
    return this.maneuvers.get(id);
  }

  getLootTable(id: string): LootTable | undefined {
    return this.lootTables.get(id);
  }

  getEncounterTable(zone: string): ZoneEncounterTable | undefined {
    return this.encounterTables.get(zone);
  }

  getComposition(key: string): EncounterComposition | undefined {
    return this.compositions.get(key);
  }

  listSchedules(): NpcScheduleDef[] {
    return [...this.content.schedules];
  }

  listStoreHours(): StoreHoursDef[] {
    return [...this.content.storeHours];
  }

  private crossCheck(problems: string[]): void {
    for (const room of this.rooms.values()) {
      for (const [dir, to] of Object.entries(room.exits)) {
        if (!this.rooms.has(to)) problems.push(`room ${room.id} exit ${dir} leads to unknown room ${to}`);
      }
      for (const rule of room.spawnRules) {
        if (!this.creatures.has(rule.templateId)) problems.push(`room ${room.id} spawn rule ${rule.id}: unknown template ${rule.templateId}`);
      }
      for (const rule of room.lootRules) {
        if (!this.items.has(rule.itemTemplateId)) problems.push(`room ${room.id} loot rule ${rule.id}: unknown item ${rule.itemTemplateId}`);
      }
    }
    for (const c of this.creatures.values()) {
      if (c.lootTableId && !this.lootTables.has(c.lootTableId)) problems.push(`creature ${c.id}: unknown loot table ${c.lootTableId}`);
    }
    for (const t of this.lootTables.values()) {
      for (const e of t.entries) {
        if (!this.items.has(e.itemTemplateId)) problems.push(`loot table ${t.id}: unknown item ${e.itemTemplateId}`);
      }
    }
    for (const t of this.encounterTables.values()) {
      for (const r of t.rows) {
        if (r.type === "combat" && (!r.compositionKey || !this.compositions.has(r.compositionKey))) {
          problems.push(`encounter table ${t.zone}: unknown composition ${r.compositionKey ?? "(none)"}`);
        }
      }
    }
    for (const s of this.content.schedules) {
      if (this.creatures.get(s.npcTemplateId)?.kind !== "npc") problems.push(`schedule: ${s.npcTemplateId} is not an npc template`);
      for (const b of s.blocks) {
        if (!this.rooms.has(b.roomId)) problems.push(`schedule ${s.npcTemplateId}: unknown room ${b.roomId}`);
      }
    }
  }
}
