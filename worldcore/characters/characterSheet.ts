// worldcore/characters/characterSheet.ts

import { UNARMED_PROFILE } from "../shared/ContentTypes";
import type { BehaviorProfile, ContentCatalog } from "../shared/ContentTypes";
import type { ArmorPieceState, PlayerInstance } from "../shared/Entity";
import { instanceId } from "../utils/uuid";
import type { CharacterSheet } from "./CharacterTypes";

export const PLAYER_FACTION = "adventurers";

const PLAYER_BEHAVIOR: BehaviorProfile = {
  pursuit: "none",
  leashRooms: 0,
  leashSec: 0,
  aggressive: false,
  threat: "last_attacker",
};

export function playerFromSheet(
  sheet: CharacterSheet,
  content: ContentCatalog,
  sessionId: string,
  roomId: string,
  nowMs: number,
): PlayerInstance {
  const weapon = sheet.weaponTemplateId ? content.getItem(sheet.weaponTemplateId)?.weapon : undefined;

  const armor: ArmorPieceState[] = [];
  for (const templateId of sheet.armorTemplateIds) {
    const item = content.getItem(templateId);
    if (!item?.armor) continue;
    armor.push({
      ...item.armor,
      secondaryTypes: [...item.armor.secondaryTypes],
      itemId: `${sheet.id}:${templateId}`,
      name: item.name,
      durability: sheet.armorDurability[templateId] ?? item.armor.maxDurability,
    });
  }

  return {
    kind: "player",
    id: instanceId("pl"),
    templateId: "player",
    name: sheet.name,
    createdAt: nowMs,
    sessionId,
    characterId: sheet.id,
    hp: Math.max(1, Math.min(sheet.hp, sheet.maxHp)),
    maxHp: sheet.maxHp,
    stamina: Math.max(0, Math.min(sheet.stamina, sheet.maxStamina)),
    maxStamina: sheet.maxStamina,
    accuracy: sheet.accuracy,
    avoidance: sheet.avoidance,
    faction: PLAYER_FACTION,
    attack: { ...(weapon ?? UNARMED_PROFILE) },
    armor,
    behavior: { ...PLAYER_BEHAVIOR },
    originRoomId: roomId,
  };
}

/** Folds live state back into the sheet for saving. */
export function sheetFromPlayer(base: CharacterSheet, player: PlayerInstance, roomId: string, now: Date): CharacterSheet {
  const armorDurability: Record<string, number> = { ...base.armorDurability };
  for (const piece of player.armor) {
    const templateId = piece.itemId.slice(`${base.id}:`.length);
    armorDurability[templateId] = piece.durability;
  }

  return {
    ...base,
    roomId,
    hp: player.hp,
    maxHp: player.maxHp,
    stamina: player.stamina,
    maxStamina: player.maxStamina,
    armorDurability,
    inventory: base.inventory.map((e) => ({ ...e })),
    stateVersion: base.stateVersion + 1,
    updatedAt: now,
  };
}
