// worldcore/characters/CharacterTypes.ts

import { z } from "zod";

// -----------------------------
// Sheet (what persists between sessions)
// -----------------------------

export interface InventoryEntry {
  templateId: string;
  name: string;
  quantity: number;
}

export interface CharacterSheet {
  id: string;
  name: string;
  /** Room to put the character back in on the next login. */
  roomId: string;

  hp: number;
  maxHp: number;
  stamina: number;
  maxStamina: number;
  accuracy: number;
  avoidance: number;

  weaponTemplateId: string | null;
  armorTemplateIds: string[];
  /** armor template id -> durability left */
  armorDurability: Record<string, number>;
  inventory: InventoryEntry[];

  stateVersion: number;
  updatedAt: Date;
}

// -----------------------------
// DB row (snake_case as stored)
// -----------------------------

export interface CharacterRow {
  id: string;
  name: string;
  room_id: string;
  hp: number;
  max_hp: number;
  stamina: number;
  max_stamina: number;
  accuracy: number;
  avoidance: number;
  weapon_template_id: string | null;
  armor_template_ids: unknown;
  armor_durability: unknown;
  inventory: unknown;
  state_version: number | null;
  updated_at: Date;
}

const InventorySchema = z.array(
  z.object({
    templateId: z.string(),
    name: z.string(),
    quantity: z.number().int().positive(),
  }),
);

export function defaultSheet(id: string, name: string, roomId: string): CharacterSheet {
  return {
    id,
    name,
    roomId,
    hp: 30,
    maxHp: 30,
    stamina: 12,
    maxStamina: 12,
    accuracy: 55,
    avoidance: 45,
    weaponTemplateId: "rusty_cutlass",
    armorTemplateIds: ["oilskin_coat"],
    armorDurability: {},
    inventory: [],
    stateVersion: 1,
    updatedAt: new Date(0),
  };
}

// JSONB columns come back as whatever was stored; anything malformed falls
// back to empty rather than poisoning the login.
export function rowToCharacterSheet(row: CharacterRow): CharacterSheet {
  const armorIds = z.array(z.string()).safeParse(row.armor_template_ids);
  const durability = z.record(z.number()).safeParse(row.armor_durability);
  const inventory = InventorySchema.safeParse(row.inventory);

  return {
    id: row.id,
    name: row.name,
    roomId: row.room_id,

    hp: row.hp,
    maxHp: row.max_hp,
    stamina: row.stamina,
    maxStamina: row.max_stamina,
    accuracy: row.accuracy,
    avoidance: row.avoidance,

    weaponTemplateId: row.weapon_template_id,
    armorTemplateIds: armorIds.success ? armorIds.data : [],
    armorDurability: durability.success ? durability.data : {},
    inventory: inventory.success ? inventory.data : [],

    stateVersion: row.state_version ?? 1,
    updatedAt: row.updated_at,
  };
}

/** Adds to an existing stack of the same template, or starts a new one. */
export function addToInventory(sheet: CharacterSheet, entry: InventoryEntry): void {
  const stack = sheet.inventory.find((e) => e.templateId === entry.templateId);
  if (stack) {
    stack.quantity += entry.quantity;
    return;
  }
  sheet.inventory.push({ ...entry });
}
