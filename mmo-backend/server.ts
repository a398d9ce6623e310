// mmo-backend/server.ts

import http from "http";
import { WebSocketServer, WebSocket } from "ws";

import { Logger } from "../worldcore/utils/logger";
import { loadRuntimeConfig } from "../worldcore/config/RuntimeConfig";
import { SessionManager } from "../worldcore/core/SessionManager";
import { EntityManager } from "../worldcore/core/EntityManager";
import { MessageRouter } from "../worldcore/core/MessageRouter";
import { startHeartbeat } from "../worldcore/core/Heartbeat";
import { TickEngine } from "../worldcore/core/TickEngine";
import type { CharacterStore } from "../worldcore/characters/CharacterStore";
import { InMemoryCharacterStore } from "../worldcore/characters/CharacterStore";
import { PostgresCharacterStore } from "../worldcore/characters/PostgresCharacterStore";
import { DeferredWriteQueue } from "../worldcore/characters/DeferredWriteQueue";
import { MudRuntime } from "../worldcore/mud/MudRuntime";
import { StaticContentCatalog } from "../worldcore/world/StaticContentCatalog";
import { netConfig } from "./config";
import { installFileLogTap } from "./FileLogTap";

installFileLogTap();

const log = Logger.scope("SERVER");

function describeSocket(req: http.IncomingMessage): string {
  const r = req.socket;
  return `${r.remoteAddress || "?"}:${r.remotePort || "?"}`;
}

async function openCharacterStore(): Promise<CharacterStore> {
  if (netConfig.characterStore === "memory") {
    log.warn("Using the in-memory character store; characters vanish on restart");
    return new InMemoryCharacterStore();
  }

  const { testDbConnection } = await import("../worldcore/db/Database");
  const ok = await testDbConnection();
  if (!ok) throw new Error("Postgres is unreachable; set MUD_CHARACTER_STORE=memory to run without it");
  const store = new PostgresCharacterStore();
  await store.ensureSchema();
  return store;
}

async function main(): Promise<void> {
  log.info("Starting MUD shard server...", {
    host: netConfig.host,
    port: netConfig.port,
    path: netConfig.path,
  });

  const config = loadRuntimeConfig();
  const content = StaticContentCatalog.demo();

  // Persistence: the runtime only ever enqueues; the queue writes in the background.
  const characters = await openCharacterStore();
  const writes = new DeferredWriteQueue(characters);
  writes.start(netConfig.writeDrainIntervalMs);

  // Core managers. Sessions and the runtime share one entity registry.
  const entities = new EntityManager();
  const sessions = new SessionManager(entities);
  const runtime = new MudRuntime({ content, config, events: sessions, writes, entities });
  const router = new MessageRouter(sessions, runtime, characters);

  const ticks = new TickEngine(runtime, {
    intervalMs: netConfig.tickIntervalMs,
    sweepEveryTicks: netConfig.sweepEveryTicks,
  });
  ticks.start();

  const heartbeat = startHeartbeat(sessions, (sessionId) => runtime.disconnect(sessionId), {
    intervalMs: netConfig.heartbeatIntervalMs,
    idleTimeoutMs: netConfig.idleTimeoutMs,
  });

  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ ok: true, sessions: sessions.count(), online: runtime.onlineCount() }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  const wss = new WebSocketServer({ server, path: netConfig.path });

  wss.on("connection", (socket: WebSocket, req) => {
    const session = sessions.createSession(socket, "stranger");
    log.info("Socket connected", { sessionId: session.id, remote: describeSocket(req) });

    sessions.send(session, "welcome", {
      sessionId: session.id,
      time: runtime.clock.describe(),
    });

    socket.on("message", (data) => {
      router.handleRawMessage(session, data).catch((err: unknown) => {
        log.error("Message handling failed", { sessionId: session.id, err });
      });
    });

    socket.on("close", () => {
      runtime
        .disconnect(session.id)
        .catch((err: unknown) => log.error("Disconnect handling failed", { sessionId: session.id, err }))
        .finally(() => sessions.removeSession(session.id, "socket_closed"));
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down", { signal });

    clearInterval(heartbeat);
    await ticks.stop();
    for (const s of [...sessions.getAllSessions()]) sessions.removeSession(s.id, "server_shutdown");
    wss.close();
    server.close();

    runtime.saveAll();
    writes.stop();
    await writes.flush();
    log.success("Shutdown complete", { droppedWrites: writes.droppedCount() });
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error("Shutdown failed", { err });
          process.exit(1);
        });
    });
  }

  server.listen(netConfig.port, netConfig.host, () => {
    log.success("MUD shard listening", {
      host: netConfig.host,
      port: netConfig.port,
      store: netConfig.characterStore,
    });
  });
}

// Entry point
main().catch((err: unknown) => {
  log.error("Fatal error in MUD server", { err });
  process.exit(1);
});
