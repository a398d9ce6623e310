// worldcore/combat/Maneuvers.ts
//
// Maneuver lookup and payment checks. Maneuvers are content; this file only
// answers "may this combatant use this one right now" and never spends.

import type { ContentCatalog, ManeuverDef } from "../shared/ContentTypes";
import type { CombatantInstance } from "../shared/Entity";
import { IntentResult, fail } from "../shared/IntentResult";

export type ManeuverLookup =
  | { ok: true; maneuver: ManeuverDef }
  | { ok: false; result: IntentResult };

export function findManeuver(content: ContentCatalog, maneuverId: string): ManeuverLookup {
  const id = maneuverId.trim().toLowerCase();
  const maneuver = content.getManeuver(id);
  if (!maneuver) {
    return { ok: false, result: fail("invalid_action", `You don't know a maneuver called '${maneuverId}'.`) };
  }
  return { ok: true, maneuver };
}

export function canAfford(instance: CombatantInstance, maneuver: ManeuverDef): boolean {
  return instance.stamina >= Math.max(0, maneuver.staminaCost);
}

export function staminaShortfall(instance: CombatantInstance, maneuver: ManeuverDef): IntentResult {
  return fail(
    "resource",
    `You are too winded for ${maneuver.name} (${maneuver.staminaCost} stamina, you have ${instance.stamina}).`,
  );
}

export function tickerDelayMs(maneuver: ManeuverDef): number {
  return Math.max(0, Math.round(maneuver.tickerDelaySec * 1000));
}
