// worldcore/core/Heartbeat.ts

import { Logger } from "../utils/logger";
import type { SessionManager } from "./SessionManager";

export interface HeartbeatConfig {
  intervalMs: number;    // how often to sweep sessions
  idleTimeoutMs: number; // how long before we drop an idle session
}

/** Told about every session the heartbeat drops, so the character goes linkdead. */
export type SessionDropHook = (sessionId: string) => Promise<void>;

const log = Logger.scope("HEARTBEAT");

/**
 * Heartbeat
 *
 * Responsibilities:
 *  - Periodically sweep all sessions
 *  - Drop any that have been idle longer than idleTimeoutMs
 *  - Hand the dropped session to the runtime before removal
 *
 * It does NOT:
 *  - Run gameplay ticks (that's TickEngine's job)
 *  - Remove characters (the runtime's linkdead grace does that)
 */
export function sweepIdleSessions(
  sessions: SessionManager,
  idleTimeoutMs: number,
  onDrop: SessionDropHook,
  now = Date.now(),
): string[] {
  const dropped: string[] = [];

  // Collect first; removeSession mutates the map we are walking.
  for (const session of sessions.getAllSessions()) {
    const delta = now - session.lastSeen;
    if (delta > idleTimeoutMs) dropped.push(session.id);
  }

  for (const sessionId of dropped) {
    log.info("Removing idle session", { sessionId });
    onDrop(sessionId).catch((err: unknown) => {
      log.warn("Error handing idle session to runtime", { sessionId, err });
    });
    sessions.removeSession(sessionId, "idle_timeout");
  }

  return dropped;
}

export function startHeartbeat(
  sessions: SessionManager,
  onDrop: SessionDropHook,
  cfg: HeartbeatConfig
): NodeJS.Timeout {
  // Don't allow silly sub-second sweeps; this is a coarse-grained cleanup loop.
  const intervalMs = Math.max(cfg.intervalMs, 1000);
  const idleTimeoutMs = Math.max(cfg.idleTimeoutMs, intervalMs * 2);

  log.info("Starting heartbeat", {
    intervalMs,
    idleTimeoutMs,
  });

  let sweepCount = 0;

  const handle = setInterval(() => {
    sweepCount++;
    const timedOut = sweepIdleSessions(sessions, idleTimeoutMs, onDrop);

    // Only log summaries occasionally or when we actually did work
    if (timedOut.length > 0 || sweepCount % 30 === 0) {
      log.debug("Heartbeat sweep complete", {
        sweep: sweepCount,
        activeSessions: sessions.count(),
        timedOut: timedOut.length,
      });
    }
  }, intervalMs);

  handle.unref?.();

  return handle;
}
