//worldcore/core/SessionManager.ts

import type { EventSink, MudEvent } from "../shared/events";
import type { MudEventPayload, ServerMessage, ServerOpcode } from "../shared/messages";
import type { Session, SessionSocket } from "../shared/Session";
import { Logger } from "../utils/logger";
import type { EntityManager } from "./EntityManager";

const log = Logger.scope("SESSIONS");

let SESSION_COUNTER = 0;

/**
 * Live connections, plus the runtime's event sink: events addressed to a
 * player entity or a room are turned into `mud_event` messages for the
 * sessions behind them.
 */
export class SessionManager implements EventSink {
  private sessions = new Map<string, Session>();

  constructor(private readonly entities: EntityManager) {}

  // ---------------------------------------------------------------------------
  // Creation / lookup
  // ---------------------------------------------------------------------------

  /** displayName is a label until hello attaches a character. */
  createSession(socket: SessionSocket, displayName: string): Session {
    const session: Session = {
      id: this.nextId(),
      displayName,
      socket,
      lastSeen: Date.now(),
      characterId: null,
    };
    this.sessions.set(session.id, session);
    log.info("Session created", { sessionId: session.id, displayName });
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /** The session currently holding `characterId`, if any. */
  findByCharacter(characterId: string): Session | undefined {
    for (const s of this.sessions.values()) {
      if (s.characterId === characterId) return s;
    }
    return undefined;
  }

  getAllSessions(): Iterable<Session> {
    return this.sessions.values();
  }

  count(): number {
    return this.sessions.size;
  }

  touch(sessionId: string): void {
    const s = this.sessions.get(sessionId);
    if (!s) return;
    s.lastSeen = Date.now();
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  send<P>(session: Session, op: ServerOpcode, payload?: P): void {
    const msg: ServerMessage<P> = { op, payload };
    try {
      session.socket.send(JSON.stringify(msg));
    } catch (err) {
      log.warn("Failed to send message to session", { sessionId: session.id, op, err });
    }
  }

  // ---------------------------------------------------------------------------
  // EventSink
  // ---------------------------------------------------------------------------

  toEntity(entityId: string, event: MudEvent): void {
    const inst = this.entities.get(entityId);
    if (!inst || inst.kind !== "player") return;
    this.toSession(inst.sessionId, event);
  }

  toRoom(roomId: string, event: MudEvent, exceptEntityIds: readonly string[] = []): void {
    for (const p of this.entities.listPlayersInRoom(roomId)) {
      if (exceptEntityIds.includes(p.id)) continue;
      this.toSession(p.sessionId, event);
    }
  }

  toSession(sessionId: string, event: MudEvent): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    const payload: MudEventPayload = { kind: event.kind, text: event.text, roomId: event.roomId, data: event.data };
    this.send(session, "mud_event", payload);
  }

  // ---------------------------------------------------------------------------
  // Removal
  // ---------------------------------------------------------------------------

  /** Forget the session and close its socket. The runtime is told separately. */
  removeSession(id: string, reason = "session_removed"): void {
    const session = this.sessions.get(id);
    if (!session) return;

    try {
      session.socket.close(1000, reason);
    } catch (err) {
      log.warn("Error closing socket for session", { sessionId: id, err });
    }
    this.sessions.delete(id);
    log.info("Session removed", { sessionId: id, reason });
  }

  private nextId(): string {
    SESSION_COUNTER++;
    return `S${Date.now().toString(36)}${SESSION_COUNTER.toString(36)}`;
  }
}
