// worldcore/combat/Mitigation.ts
//
// Armor as flat damage reduction (DR), summed across worn pieces.
// - Pure helpers; the only mutation is in applyArmorMitigation (durability).
// - Ordering:
//   1) raw damage is rolled (crit/glance already folded in)
//   2) each piece reduces by its DR against the damage type
//   3) the absorbed amount is charged to the pieces as durability loss
//
// Notes:
// - Primary type reduces at full value, secondary types at a fraction (floored).
// - A piece never reduces more than its remaining durability, so it can always
//   pay for what it absorbed. At zero durability it stays worn but does nothing.
// - Final damage is never negative and never above raw.

import type { DamageType } from "../shared/ContentTypes";
import type { ArmorPieceState } from "../shared/Entity";

export interface PieceAbsorption {
  itemId: string;
  slot: string;
  absorbed: number;
  durabilityAfter: number;
}

export interface MitigationResult {
  raw: number;
  final: number;
  absorbed: number;
  pieces: PieceAbsorption[];
}

export function pieceReduction(piece: ArmorPieceState, type: DamageType, secondaryRate: number): number {
  if (piece.durability <= 0) return 0;

  let dr = 0;
  if (piece.primaryType === type) {
    dr = piece.reduction;
  } else if (piece.secondaryTypes.includes(type)) {
    dr = Math.floor(piece.reduction * secondaryRate);
  }

  return Math.max(0, Math.min(Math.floor(dr), Math.floor(piece.durability)));
}

/**
 * Splits `absorbed` across pieces in proportion to their contribution using
 * largest remainders. Each share is an integer no larger than that piece's
 * contribution, and the shares sum to `absorbed` exactly.
 */
export function splitAbsorbed(contributions: readonly number[], absorbed: number): number[] {
  const total = contributions.reduce((a, b) => a + b, 0);
  if (absorbed <= 0 || total <= 0) return contributions.map(() => 0);
  if (absorbed >= total) return [...contributions];

  const exact = contributions.map((c) => (absorbed * c) / total);
  const shares = exact.map((x) => Math.floor(x));
  let left = absorbed - shares.reduce((a, b) => a + b, 0);

  const order = exact
    .map((x, i) => ({ i, frac: x - Math.floor(x) }))
    .sort((a, b) => b.frac - a.frac || a.i - b.i);

  for (const { i } of order) {
    if (left <= 0) break;
    if (shares[i] < contributions[i]) {
      shares[i]++;
      left--;
    }
  }
  return shares;
}

/** What armor would do to a hit, without touching durability. */
export function previewArmorMitigation(
  raw: number,
  type: DamageType,
  armor: readonly ArmorPieceState[],
  secondaryRate: number,
): { final: number; absorbed: number; shares: number[] } {
  const dmg = Math.max(0, Math.floor(Number.isFinite(raw) ? raw : 0));
  const contributions = armor.map((p) => pieceReduction(p, type, secondaryRate));
  const totalDr = contributions.reduce((a, b) => a + b, 0);
  const final = Math.max(0, dmg - totalDr);
  const absorbed = dmg - final;
  return { final, absorbed, shares: splitAbsorbed(contributions, absorbed) };
}

/** Applies armor to a raw hit and wears each piece by exactly what it absorbed. */
export function applyArmorMitigation(
  raw: number,
  type: DamageType,
  armor: ArmorPieceState[],
  secondaryRate: number,
): MitigationResult {
  const preview = previewArmorMitigation(raw, type, armor, secondaryRate);
  const pieces: PieceAbsorption[] = [];

  armor.forEach((piece, i) => {
    const share = preview.shares[i];
    if (share <= 0) return;
    piece.durability = Math.max(0, piece.durability - share);
    pieces.push({ itemId: piece.itemId, slot: piece.slot, absorbed: share, durabilityAfter: piece.durability });
  });

  return {
    raw: preview.final + preview.absorbed,
    final: preview.final,
    absorbed: preview.absorbed,
    pieces,
  };
}
