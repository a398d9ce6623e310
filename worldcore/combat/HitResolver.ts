// worldcore/combat/HitResolver.ts
//
// Opposed d100 contest. The attacker must roll at or under its effective
// accuracy, and then either beat the defender's roll or watch the defender
// fail its own avoidance check.
//
// RNG draw order (tests script it): attack roll, defense roll, then on a hit
// the crit roll and the damage roll.

import type { AttackProfile } from "../shared/ContentTypes";
import { RandomFn, rollInt } from "../utils/Rng";

export type HitOutcome = "miss" | "hit" | "glance" | "crit";

export interface HitInput {
  accuracy: number; // effective, modifiers applied
  avoidance: number; // effective, modifiers applied
  profile: AttackProfile;
  damageMultiplier?: number;
  critMultiplier: number;
  glanceMultiplier: number;
  rng: RandomFn;
}

export interface HitResult {
  outcome: HitOutcome;
  attackRoll: number;
  defenseRoll: number;
  /** Damage before armor. 0 on a miss. */
  raw: number;
}

// Nothing is ever a sure thing in either direction.
export const SKILL_FLOOR = 5;
export const SKILL_CEILING = 95;

export function clampSkill(n: number): number {
  return Math.max(SKILL_FLOOR, Math.min(SKILL_CEILING, Math.round(n)));
}

export function rollD100(rng: RandomFn): number {
  return rollInt(rng, 1, 100);
}

export function rollD20(rng: RandomFn): number {
  return rollInt(rng, 1, 20);
}

export function resolveHit(input: HitInput): HitResult {
  const acc = clampSkill(input.accuracy);
  const avo = clampSkill(input.avoidance);

  const attackRoll = rollD100(input.rng);
  const defenseRoll = rollD100(input.rng);

  const attackOk = attackRoll <= acc;
  const defenseOk = defenseRoll <= avo;
  const hit = attackOk && (attackRoll < defenseRoll || !defenseOk);

  if (!hit) {
    return { outcome: "miss", attackRoll, defenseRoll, raw: 0 };
  }

  const critRoll = input.rng();
  const crit = attackRoll <= Math.floor(acc / 10) || critRoll < input.profile.critChance;
  // A defender whose roll was good but not good enough turns the blow aside.
  const glance = !crit && defenseOk && defenseRoll >= avo * 0.8;

  const min = Math.max(0, Math.floor(input.profile.damageMin));
  const max = Math.max(min, Math.floor(input.profile.damageMax));
  const base = rollInt(input.rng, min, max) * (input.damageMultiplier ?? 1);

  let raw: number;
  let outcome: HitOutcome;
  if (crit) {
    raw = Math.floor(base * input.critMultiplier);
    outcome = "crit";
  } else if (glance) {
    raw = Math.max(base > 0 ? 1 : 0, Math.floor(base * input.glanceMultiplier));
    outcome = "glance";
  } else {
    raw = Math.floor(base);
    outcome = "hit";
  }

  return { outcome, attackRoll, defenseRoll, raw: Math.max(0, raw) };
}
