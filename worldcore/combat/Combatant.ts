// worldcore/combat/Combatant.ts
//
// One capability surface over the three combatant variants. The engine asks
// these questions and never switches on kind itself.

import type { AttackProfile, CombatModifier, RangeBand } from "../shared/ContentTypes";
import type { ArmorPieceState, CombatantInstance } from "../shared/Entity";

export type CombatStateTag = "Observing" | "Engaged" | "Supporting" | "Disengaging";

export type HealthLabel = "healthy" | "injured" | "wounded" | "critical";

export const EXPOSED_AVOIDANCE_PENALTY = 15;
export const STAGGERED_ACCURACY_PENALTY = 15;
export const FAR_RANGED_ACCURACY_PENALTY = 10;

export interface Combatant {
  readonly id: string;
  readonly name: string;
  readonly instance: CombatantInstance;
  isAlive(): boolean;
  /** Is `other` a legitimate target for this combatant right now? */
  canAttack(other: CombatantInstance): boolean;
  attackProfile(): AttackProfile;
  armor(): ArmorPieceState[];
  effectiveAccuracy(mods: ReadonlySet<CombatModifier>, extra?: number): number;
  effectiveAvoidance(mods: ReadonlySet<CombatModifier>): number;
  initiativeBonus(): number;
  /** Applies already-mitigated damage. Returns hp after. */
  takeDamage(amount: number): number;
  heal(amount: number): number;
  spendStamina(cost: number): boolean;
  health(): HealthLabel;
}

function clampHp(c: CombatantInstance, hp: number): number {
  c.hp = Math.max(0, Math.min(c.maxHp, Math.floor(hp)));
  return c.hp;
}

export function healthLabel(hp: number, maxHp: number): HealthLabel {
  const pct = maxHp > 0 ? hp / maxHp : 0;
  if (pct < 0.25) return "critical";
  if (pct < 0.5) return "wounded";
  if (pct < 0.75) return "injured";
  return "healthy";
}

/**
 * Hostility rules:
 * - players never fight players
 * - creatures and NPCs never fight each other
 * - a creature fights anything of another faction
 * - an NPC only fights a player that provoked it
 */
function hostile(self: CombatantInstance, other: CombatantInstance): boolean {
  if (self.id === other.id || other.hp <= 0) return false;
  switch (self.kind) {
    case "player":
      return other.kind !== "player" && other.faction !== self.faction;
    case "creature":
      return other.kind === "player" && other.faction !== self.faction;
    case "npc":
      return other.kind === "player" && self.lastAttackerId === other.id;
  }
}

export function asCombatant(instance: CombatantInstance): Combatant {
  return {
    id: instance.id,
    name: instance.name,
    instance,
    isAlive: () => instance.hp > 0,
    canAttack: (other) => hostile(instance, other),
    attackProfile: () => instance.attack,
    armor: () => instance.armor,
    effectiveAccuracy: (mods, extra = 0) =>
      instance.accuracy +
      instance.attack.accuracyBonus +
      extra -
      (mods.has("staggered") ? STAGGERED_ACCURACY_PENALTY : 0),
    effectiveAvoidance: (mods) => instance.avoidance - (mods.has("exposed") ? EXPOSED_AVOIDANCE_PENALTY : 0),
    initiativeBonus: () => Math.floor(instance.accuracy / 10),
    takeDamage: (amount) => clampHp(instance, instance.hp - Math.max(0, amount)),
    heal: (amount) => clampHp(instance, instance.hp + Math.max(0, amount)),
    spendStamina: (cost) => {
      if (instance.stamina < cost) return false;
      instance.stamina -= cost;
      return true;
    },
    health: () => healthLabel(instance.hp, instance.maxHp),
  };
}

/**
 * Melee needs the attacker in the thick of it and the target no further than
 * near. Ranged reaches every band.
 */
export function inReach(profile: AttackProfile, attackerBand: RangeBand, targetBand: RangeBand): boolean {
  if (profile.reach === "ranged") return true;
  return attackerBand === "engaged" && targetBand !== "far";
}

export function stepBand(band: RangeBand, dir: "in" | "out"): RangeBand {
  if (dir === "in") return band === "far" ? "near" : "engaged";
  return band === "engaged" ? "near" : "far";
}
