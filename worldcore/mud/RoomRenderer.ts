// worldcore/mud/RoomRenderer.ts
//
// Plain-text room description. Pure: MudRuntime gathers the view under the
// room lock and hands it here.

import type { CombatStateTag, HealthLabel } from "../combat/Combatant";
import type { RoomTemplate } from "../shared/ContentTypes";

export interface OccupantView {
  id: string;
  name: string;
  kind: "player" | "creature" | "npc";
  state: CombatStateTag;
  health: HealthLabel;
  /** Whoever this occupant is swinging at, if anyone. */
  targetId?: string;
  targetName?: string;
}

export interface GroundItemView {
  name: string;
  quantity: number;
}

export interface RoomView {
  room: RoomTemplate;
  viewerId?: string;
  /** Weather overlay line; null indoors or in clear weather. */
  weather: string | null;
  timeLine: string;
  /** "Open" / "Closed (opens at 10:00)" for rooms with a shop. */
  storeStatus: string | null;
  occupants: OccupantView[];
  items: GroundItemView[];
}

function describeOccupant(o: OccupantView, viewerId?: string): string {
  const tags: string[] = [];
  if (o.kind === "player") tags.push("adventurer");
  if (o.health !== "healthy") tags.push(o.health);
  if (o.state === "Disengaging") tags.push("backing away");
  else if (o.targetName) tags.push(o.targetId === viewerId ? "fighting you" : `fighting ${o.targetName}`);
  else if (o.state === "Supporting") tags.push("lending a hand");
  return tags.length ? `${o.name} (${tags.join(", ")})` : o.name;
}

export function formatItemName(item: GroundItemView): string {
  return item.quantity > 1 ? `${item.name} (x${item.quantity})` : item.name;
}

export function renderRoom(view: RoomView): string {
  const { room } = view;
  const lines: string[] = [room.name, room.description];

  if (view.weather) lines.push(view.weather);
  lines.push(view.timeLine);
  if (view.storeStatus) lines.push(`The shop here is ${view.storeStatus}.`);

  const others = view.occupants.filter((o) => o.id !== view.viewerId);
  if (others.length) {
    lines.push(`Also here: ${others.map((o) => describeOccupant(o, view.viewerId)).join(", ")}.`);
  }
  if (view.items.length) {
    lines.push(`On the ground: ${view.items.map(formatItemName).join(", ")}.`);
  }

  const exits = Object.keys(room.exits).sort();
  lines.push(exits.length ? `Exits: ${exits.join(", ")}.` : "There are no obvious exits.");
  return lines.join("\n");
}
