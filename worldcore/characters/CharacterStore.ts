// worldcore/characters/CharacterStore.ts

import type { CharacterSheet } from "./CharacterTypes";

export interface CharacterStore {
  loadCharacter(id: string): Promise<CharacterSheet | null>;
  saveCharacter(sheet: CharacterSheet): Promise<void>;
}

function cloneSheet(sheet: CharacterSheet): CharacterSheet {
  return {
    ...sheet,
    armorTemplateIds: [...sheet.armorTemplateIds],
    armorDurability: { ...sheet.armorDurability },
    inventory: sheet.inventory.map((e) => ({ ...e })),
  };
}

/** Process-local store for dev shards and tests. Hands out copies. */
export class InMemoryCharacterStore implements CharacterStore {
  private readonly sheets = new Map<string, CharacterSheet>();
  saves = 0;

  async loadCharacter(id: string): Promise<CharacterSheet | null> {
    const sheet = this.sheets.get(id);
    return sheet ? cloneSheet(sheet) : null;
  }

  async saveCharacter(sheet: CharacterSheet): Promise<void> {
    this.saves++;
    this.sheets.set(sheet.id, cloneSheet(sheet));
  }

  peek(id: string): CharacterSheet | undefined {
    return this.sheets.get(id);
  }
}
