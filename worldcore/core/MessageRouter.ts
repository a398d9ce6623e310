//worldcore/core/MessageRouter.ts

import type { RawData } from "ws";

import type { CharacterStore } from "../characters/CharacterStore";
import { CharacterSheet, defaultSheet } from "../characters/CharacterTypes";
import { handleMudCommand } from "../mud/MudCommandHandler";
import type { MudRuntime } from "../mud/MudRuntime";
import type { IntentResult } from "../shared/IntentResult";
import {
  ClientMessage,
  ClientMessageSchema,
  CommandPayloadSchema,
  HelloPayloadSchema,
  MudResultPayload,
} from "../shared/messages";
import type { Session } from "../shared/Session";
import { errorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";
import type { SessionManager } from "./SessionManager";

const log = Logger.scope("ROUTER");

export interface ErrorPayload {
  code: string;
  message: string;
}

function rawToString(data: RawData | string): string {
  if (typeof data === "string") return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export function toMudResult(result: IntentResult): MudResultPayload {
  return { ok: result.ok, code: result.code, text: result.message };
}

/**
 * Socket messages in, runtime calls out.
 *
 * - hello: attach a character (load it, or start a fresh sheet) and enter the world
 * - command: one line of MUD input; the answer goes back as mud_result
 * - ping: pong
 */
export class MessageRouter {
  constructor(
    private readonly sessions: SessionManager,
    private readonly runtime: MudRuntime,
    private readonly characters: CharacterStore,
  ) {}

  async handleRawMessage(session: Session, data: RawData | string): Promise<void> {
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(rawToString(data));
    } catch (err) {
      log.debug("Unparseable message", { sessionId: session.id, err: errorMessage(err) });
      this.error(session, "bad_message", "Messages must be JSON.");
      return;
    }

    const msg = ClientMessageSchema.safeParse(parsedJson);
    if (!msg.success) {
      this.error(session, "bad_message", "Unknown message shape.");
      return;
    }
    await this.handleMessage(session, msg.data);
  }

  async handleMessage(session: Session, msg: ClientMessage): Promise<void> {
    this.sessions.touch(session.id);

    switch (msg.op) {
      case "ping":
        this.sessions.send(session, "pong", { t: Date.now() });
        return;
      case "hello":
        await this.handleHello(session, msg.payload);
        return;
      case "command":
        await this.handleCommand(session, msg.payload);
        return;
    }
  }

  private async handleHello(session: Session, payload: unknown): Promise<void> {
    const hello = HelloPayloadSchema.safeParse(payload);
    if (!hello.success) {
      this.error(session, "bad_hello", "hello needs a name and a characterId.");
      return;
    }
    if (session.characterId) {
      this.error(session, "already_attached", "This connection already has a character.");
      return;
    }

    const { name, characterId } = hello.data;
    let sheet: CharacterSheet | null;
    try {
      sheet = await this.characters.loadCharacter(characterId);
    } catch (err) {
      log.error("Character load failed on hello", { sessionId: session.id, characterId, err });
      this.error(session, "load_failed", "Your character could not be loaded. Try again shortly.");
      return;
    }
    if (!sheet) {
      sheet = defaultSheet(characterId, name, this.runtime.config.respawnRoomId);
      log.info("New character", { characterId, name });
    }

    const previous = this.sessions.findByCharacter(characterId);
    const result = await this.runtime.enterWorld(session, sheet);
    if (!result.ok) {
      this.sessions.send(session, "mud_result", toMudResult(result));
      return;
    }

    // The runtime has moved the character over; the old socket just goes away.
    if (previous && previous.id !== session.id) {
      previous.characterId = null;
      this.sessions.removeSession(previous.id, "replaced");
    }

    session.characterId = characterId;
    session.displayName = sheet.name;
    this.sessions.send(session, "hello_ack", { characterId, name: sheet.name });
    this.sessions.send(session, "mud_result", toMudResult(result));
  }

  private async handleCommand(session: Session, payload: unknown): Promise<void> {
    const cmd = CommandPayloadSchema.safeParse(payload);
    if (!cmd.success) {
      this.error(session, "bad_command", "command needs text.");
      return;
    }
    if (!session.characterId) {
      this.error(session, "not_attached", "Say hello with a character first.");
      return;
    }

    const result = await handleMudCommand({ runtime: this.runtime, session }, cmd.data.text);
    if (!result) return;
    this.sessions.send(session, "mud_result", toMudResult(result));
  }

  private error(session: Session, code: string, message: string): void {
    const payload: ErrorPayload = { code, message };
    this.sessions.send(session, "error", payload);
  }
}
