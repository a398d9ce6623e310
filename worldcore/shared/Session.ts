// worldcore/shared/Session.ts

/** The slice of a ws WebSocket the runtime uses. */
export interface SessionSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Session {
  id: string;
  displayName: string;
  socket: SessionSocket;
  lastSeen: number; // real ms
  /** Set once hello attaches a character. */
  characterId: string | null;
}
