// worldcore/world/EncounterService.ts
//
// Zone random encounters. A player walking into a zoned room has a chance to
// stir something up; at most one roll per room per cooldown. Combat rows
// spawn a composition whose members share one encounter id and expire
// together if nobody fights them.

import type { RuntimeConfig } from "../config/RuntimeConfig";
import type { RoomStateManager } from "../core/RoomStateManager";
import type { ContentCatalog, EncounterRow } from "../shared/ContentTypes";
import type { CreatureInstance } from "../shared/Entity";
import type { EventSink } from "../shared/events";
import { Logger } from "../utils/logger";
import { RandomFn, Rng, rollInt } from "../utils/Rng";
import { instanceId } from "../utils/uuid";
import type { SpawnLootEngine } from "./SpawnLootEngine";

const log = Logger.scope("ENCOUNTER");

export interface EncounterServiceDeps {
  content: ContentCatalog;
  rooms: RoomStateManager;
  spawner: SpawnLootEngine;
  config: RuntimeConfig;
  events: EventSink;
  rng: RandomFn;
}

export type EncounterOutcome =
  | { type: "combat"; encounterId: string; roll: number; spawned: CreatureInstance[] }
  | { type: "flavor"; roll: number; text: string }
  | { type: "nothing"; roll: number };

export function pickEncounterRow(rows: readonly EncounterRow[], roll: number): EncounterRow | undefined {
  return rows.find((r) => roll >= r.min && roll <= r.max);
}

export class EncounterService {
  constructor(private readonly deps: EncounterServiceDeps) {}

  /** null when no roll happened at all (no zone, chance missed, or cooling down). */
  onRoomEntered(roomId: string, nowMs: number): EncounterOutcome | null {
    const { content, rooms, config, rng } = this.deps;
    const room = content.getRoom(roomId);
    if (!room?.zone) return null;
    const table = content.getEncounterTable(room.zone);
    if (!table) return null;

    if (rng() >= config.encounterChance) return null;
    if (!rooms.tryConsumeEncounterRoll(roomId, nowMs, config.encounterCooldownSec)) return null;

    const roll = rollInt(rng, 1, 100);
    const row = pickEncounterRow(table.rows, roll);
    if (!row || row.type === "nothing") return { type: "nothing", roll };

    if (row.type === "flavor") {
      const text = row.text ?? "You hear something in the distance.";
      this.deps.events.toRoom(roomId, { kind: "notice", text, roomId });
      return { type: "flavor", roll, text };
    }

    const composition = row.compositionKey ? content.getComposition(row.compositionKey) : undefined;
    if (!composition) {
      log.warn("Encounter row names an unknown composition", { zone: room.zone, key: row.compositionKey });
      return { type: "nothing", roll };
    }

    const encounterId = instanceId("enc");
    const seed = rooms.access(roomId, nowMs).seed;
    const spawned = this.deps.spawner.spawnComposition(
      roomId,
      composition,
      encounterId,
      nowMs,
      nowMs + config.encounterExpirySec * 1000,
      new Rng(`${seed}:${encounterId}`),
    );
    if (!spawned.length) return { type: "nothing", roll };

    rooms.addEncounter(roomId, encounterId, nowMs);
    const names = spawned.map((c) => c.name);
    this.deps.events.toRoom(roomId, {
      kind: "presence",
      text: row.text ?? `Something stirs: ${names.join(", ")}.`,
      roomId,
      data: { encounterId },
    });
    log.info("Encounter", { roomId, zone: room.zone, roll, encounterId, members: spawned.length });
    return { type: "combat", encounterId, roll, spawned };
  }
}
