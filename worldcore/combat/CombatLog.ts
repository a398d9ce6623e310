// worldcore/combat/CombatLog.ts
//
// Centralized combat log line formatters.
// Keep these boring and deterministic: contract tests depend on exact shapes.

import type { CombatModifier } from "../shared/ContentTypes";
import type { HitOutcome } from "./HitResolver";

export function clampInt(n: number, min: number, max: number): number {
  const x = Math.floor(n);
  if (!Number.isFinite(x)) return min;
  return Math.min(max, Math.max(min, x));
}

export function formatHpPart(hpAfter?: number, maxHp?: number): string {
  if (typeof hpAfter !== "number" || typeof maxHp !== "number") return "";
  if (!Number.isFinite(hpAfter) || !Number.isFinite(maxHp)) return "";
  const hp = Math.max(0, Math.floor(hpAfter));
  const max = Math.max(1, Math.floor(maxHp));
  return ` (${hp}/${max} HP)`;
}

export function formatAbsorbedPart(absorbed: number): string {
  const a = clampInt(absorbed, 0, 9_999_999);
  return a > 0 ? ` (${a} absorbed)` : "";
}

const OUTCOME_WORD: Record<Exclude<HitOutcome, "miss">, string> = {
  hit: "",
  glance: "glancing ",
  crit: "critical ",
};

export function formatHitLine(opts: {
  attackerName: string;
  targetName: string;
  label: string;
  outcome: Exclude<HitOutcome, "miss">;
  damage: number;
  absorbed: number;
  hpAfter?: number;
  maxHp?: number;
}): string {
  const dmg = clampInt(opts.damage, 0, 9_999_999);
  const extras = formatAbsorbedPart(opts.absorbed);
  const hpPart = formatHpPart(opts.hpAfter, opts.maxHp);
  return `[combat] ${opts.attackerName}'s ${OUTCOME_WORD[opts.outcome]}${opts.label} hits ${opts.targetName} for ${dmg} damage${extras}.${hpPart}`;
}

export function formatMissLine(opts: { attackerName: string; targetName: string; label: string }): string {
  return `[combat] ${opts.attackerName}'s ${opts.label} misses ${opts.targetName}.`;
}

export function formatDeathLine(name: string, killerName?: string): string {
  return killerName ? `[combat] ${name} is slain by ${killerName}.` : `[combat] ${name} dies.`;
}

export function formatModifierLine(name: string, mod: CombatModifier): string {
  return `${name} is ${mod}.`;
}

export function formatHealLine(opts: { healerName: string; targetName: string; label: string; amount: number; hpAfter: number; maxHp: number }): string {
  const amount = clampInt(opts.amount, 0, 9_999_999);
  return `[combat] ${opts.healerName}'s ${opts.label} restores ${amount} health to ${opts.targetName}.${formatHpPart(opts.hpAfter, opts.maxHp)}`;
}

/**
 * One digest per round:
 *   [round 3] 2 hostiles remain. Rat is slain by Ada. Ada is exposed.
 */
export function formatRoundSummary(opts: { round: number; hostiles: number; notable: readonly string[] }): string {
  const n = Math.max(0, Math.floor(opts.hostiles));
  const head = `[round ${opts.round}] ${n === 0 ? "No hostiles remain." : `${n} ${n === 1 ? "hostile remains" : "hostiles remain"}.`}`;
  return opts.notable.length ? `${head} ${opts.notable.join(" ")}` : head;
}

