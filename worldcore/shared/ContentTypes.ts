// worldcore/shared/ContentTypes.ts
//
// Immutable content templates. The runtime only ever reads these; every
// mutable value lives on an instance (see Entity.ts) or on room state.

import type { ScheduleBlock } from "../time/NpcScheduler";
import type { StoreHoursDef } from "../time/StoreHours";

export const DAMAGE_TYPES = ["slashing", "piercing", "bludgeoning", "fire", "cold"] as const;
export type DamageType = (typeof DAMAGE_TYPES)[number];

export type RangeBand = "engaged" | "near" | "far";

export type AttackReach = "melee" | "ranged";
export type PursuitMode = "none" | "short" | "long";

/**
 * How a creature picks a new target when its current one is gone:
 * - "last_attacker": whoever hit it most recently
 * - "lowest_hp": the weakest hostile in reach
 * - "first": first hostile in initiative order
 */
export type ThreatProfile = "last_attacker" | "lowest_hp" | "first";

export type WeatherExposure = "indoor" | "sheltered" | "outdoor" | "coastal";
export type ArmorSlot = "head" | "chest" | "arms" | "legs" | "shield";

export interface AttackProfile {
  /** Multiplier on the base attack interval; 0.7 swings faster than 1.0. */
  speedMultiplier: number;
  accuracyBonus: number;
  damageMin: number;
  damageMax: number;
  damageType: DamageType;
  critChance: number; // 0–1
  reach: AttackReach;
  verb?: string;
}

export const UNARMED_PROFILE: AttackProfile = {
  speedMultiplier: 1,
  accuracyBonus: 0,
  damageMin: 1,
  damageMax: 1,
  damageType: "bludgeoning",
  critChance: 0.01,
  reach: "melee",
  verb: "punch",
};

export interface ArmorPieceTemplate {
  slot: ArmorSlot;
  primaryType: DamageType;
  secondaryTypes: DamageType[];
  /** Damage reduction against the primary type. Secondary types get a configured fraction. */
  reduction: number;
  maxDurability: number;
}

export interface BehaviorProfile {
  pursuit: PursuitMode;
  leashRooms: number;
  leashSec: number;
  aggressive: boolean;
  threat: ThreatProfile;
}

export interface CreatureTemplate {
  id: string;
  kind: "creature" | "npc";
  name: string;
  description?: string;
  maxHp: number;
  maxStamina: number;
  accuracy: number;
  avoidance: number;
  faction: string;
  attack: AttackProfile;
  armor: ArmorPieceTemplate[];
  behavior: BehaviorProfile;
  lootTableId?: string;
  tier?: string;
  role?: string;
}

export interface ItemTemplate {
  id: string;
  name: string;
  description?: string;
  stackable: boolean;
  weapon?: AttackProfile;
  armor?: ArmorPieceTemplate;
}

export interface SpawnRule {
  id: string;
  templateId: string;
  maxAlive: number;
  cooldownSec: number;
  countMin: number;
  countMax: number;
}

export interface LootRule {
  id: string;
  itemTemplateId: string;
  maxAlive: number;
  cooldownSec: number;
  qtyMin: number;
  qtyMax: number;
  expirySec: number;
}

export interface RoomFlags {
  /** Creatures never follow anyone into or out of this room. */
  noPursuit?: boolean;
  /** No hostile actions may start here. */
  safe?: boolean;
}

export interface RoomTemplate {
  id: string;
  name: string;
  description: string;
  regionId: string;
  zone?: string;
  exposure: WeatherExposure;
  exits: Record<string, string>;
  flags: RoomFlags;
  spawnRules: SpawnRule[];
  lootRules: LootRule[];
  storeId?: string;
}

export interface LootTableEntry {
  itemTemplateId: string;
  chance: number; // 0–1
  minQty: number;
  maxQty: number;
}

export interface LootTable {
  id: string;
  entries: LootTableEntry[];
}

export type CombatModifier = "exposed" | "pinned" | "staggered";
export type ManeuverKind = "strike" | "reaction" | "support";
export type ReactionTrigger = "attacked" | "disengage";

export interface ManeuverDef {
  id: string;
  name: string;
  kind: ManeuverKind;
  staminaCost: number;
  accuracyMod: number;
  damageMultiplier: number;
  /** Pushes the user's next autoattack back by this many world seconds. */
  tickerDelaySec: number;
  applies?: { modifier: CombatModifier; to: "target" | "self"; rounds: number };
  /** Reaction maneuvers only: what sets them off. */
  trigger?: ReactionTrigger;
  /** Support maneuvers only: hit points restored to the target. */
  heal?: number;
}

export interface EncounterRow {
  min: number; // d100, inclusive
  max: number;
  type: "combat" | "flavor" | "nothing";
  compositionKey?: string;
  text?: string;
}

export interface EncounterComposition {
  key: string;
  members: { templateId: string; min: number; max: number }[];
}

export interface ZoneEncounterTable {
  zone: string;
  rows: EncounterRow[];
}

export interface NpcScheduleDef {
  npcTemplateId: string;
  blocks: ScheduleBlock[];
}

export interface WorldContent {
  rooms: RoomTemplate[];
  creatures: CreatureTemplate[];
  items: ItemTemplate[];
  maneuvers: ManeuverDef[];
  lootTables: LootTable[];
  encounterTables: ZoneEncounterTable[];
  compositions: EncounterComposition[];
  schedules: NpcScheduleDef[];
  storeHours: StoreHoursDef[];
}

/** Read-only view of loaded content. */
export interface ContentCatalog {
  getRoom(id: string): RoomTemplate | undefined;
  listRooms(): RoomTemplate[];
  getCreature(id: string): CreatureTemplate | undefined;
  getItem(id: string): ItemTemplate | undefined;
  getManeuver(id: string): ManeuverDef | undefined;
  getLootTable(id: string): LootTable | undefined;
  getEncounterTable(zone: string): ZoneEncounterTable | undefined;
  getComposition(key: string): EncounterComposition | undefined;
  listSchedules(): NpcScheduleDef[];
  listStoreHours(): StoreHoursDef[];
}
