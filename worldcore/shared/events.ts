// worldcore/shared/events.ts

export type MudEventKind =
  | "round_summary"
  | "hit"
  | "miss"
  | "crit"
  | "notice"
  | "state"
  | "death"
  | "presence"
  | "weather"
  | "room";

/** One line (or block) of text pushed to a player, plus optional structured data for clients. */
export interface MudEvent {
  kind: MudEventKind;
  text: string;
  roomId?: string;
  data?: Record<string, unknown>;
}

/**
 * Where runtime events go. Entity ids that are not players are dropped
 * silently; creatures have no one to read their mail.
 */
export interface EventSink {
  toEntity(entityId: string, event: MudEvent): void;
  toRoom(roomId: string, event: MudEvent, exceptEntityIds?: readonly string[]): void;
  /** For a player who is not in the registry right now (dead, between rooms). */
  toSession(sessionId: string, event: MudEvent): void;
}
