// worldcore/characters/PostgresCharacterStore.ts

import { Logger } from "../utils/logger";
import { PersistenceError, errorMessage } from "../utils/errors";
import type { CharacterStore } from "./CharacterStore";
import { CharacterRow, CharacterSheet, rowToCharacterSheet } from "./CharacterTypes";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS mud_characters (
    id                 TEXT PRIMARY KEY,
    name               TEXT NOT NULL,
    room_id            TEXT NOT NULL,
    hp                 INTEGER NOT NULL,
    max_hp             INTEGER NOT NULL,
    stamina            INTEGER NOT NULL,
    max_stamina        INTEGER NOT NULL,
    accuracy           INTEGER NOT NULL,
    avoidance          INTEGER NOT NULL,
    weapon_template_id TEXT,
    armor_template_ids JSONB NOT NULL DEFAULT '[]'::jsonb,
    armor_durability   JSONB NOT NULL DEFAULT '{}'::jsonb,
    inventory          JSONB NOT NULL DEFAULT '[]'::jsonb,
    state_version      INTEGER NOT NULL DEFAULT 1,
    updated_at         TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

// The pool module is loaded on first use, never at import time.
async function pool() {
  const { db } = await import("../db/Database");
  return db;
}

export class PostgresCharacterStore implements CharacterStore {
  private log = Logger.scope("PERSIST");

  async ensureSchema(): Promise<void> {
    const db = await pool();
    await db.query(SCHEMA_SQL);
  }

  async loadCharacter(id: string): Promise<CharacterSheet | null> {
    try {
      const db = await pool();
      const result = await db.query<CharacterRow>(`SELECT * FROM mud_characters WHERE id = $1`, [id]);
      if (result.rowCount === 0) return null;
      return rowToCharacterSheet(result.rows[0]);
    } catch (err) {
      this.log.error("Character load failed", { id, err });
      throw new PersistenceError(`Failed to load character ${id}: ${errorMessage(err)}`, err);
    }
  }

  async saveCharacter(sheet: CharacterSheet): Promise<void> {
    try {
      const db = await pool();
      await db.query(
        `
        INSERT INTO mud_characters (
          id, name, room_id,
          hp, max_hp, stamina, max_stamina, accuracy, avoidance,
          weapon_template_id, armor_template_ids, armor_durability, inventory,
          state_version, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
        ON CONFLICT (id) DO UPDATE SET
          name = EXCLUDED.name,
          room_id = EXCLUDED.room_id,
          hp = EXCLUDED.hp,
          max_hp = EXCLUDED.max_hp,
          stamina = EXCLUDED.stamina,
          max_stamina = EXCLUDED.max_stamina,
          accuracy = EXCLUDED.accuracy,
          avoidance = EXCLUDED.avoidance,
          weapon_template_id = EXCLUDED.weapon_template_id,
          armor_template_ids = EXCLUDED.armor_template_ids,
          armor_durability = EXCLUDED.armor_durability,
          inventory = EXCLUDED.inventory,
          state_version = EXCLUDED.state_version,
          updated_at = EXCLUDED.updated_at
        WHERE mud_characters.state_version <= EXCLUDED.state_version
      `,
        [
          sheet.id,
          sheet.name,
          sheet.roomId,
          sheet.hp,
          sheet.maxHp,
          sheet.stamina,
          sheet.maxStamina,
          sheet.accuracy,
          sheet.avoidance,
          sheet.weaponTemplateId,
          JSON.stringify(sheet.armorTemplateIds),
          JSON.stringify(sheet.armorDurability),
          JSON.stringify(sheet.inventory),
          sheet.stateVersion,
          sheet.updatedAt,
        ],
      );
    } catch (err) {
      throw new PersistenceError(`Failed to save character ${sheet.id}: ${errorMessage(err)}`, err);
    }
  }
}
