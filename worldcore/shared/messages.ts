// worldcore/shared/messages.ts

import { z } from "zod";

import type { IntentCode } from "./IntentResult";
import type { MudEventKind } from "./events";

// -------------------------
// Opcodes
// -------------------------

export type ClientOpcode = "hello" | "command" | "ping";

export type ServerOpcode = "welcome" | "hello_ack" | "mud_result" | "mud_event" | "error" | "pong";

// -------------------------
// Envelopes
// -------------------------

export interface ClientMessage {
  op: ClientOpcode;
  payload?: unknown;
}

export interface ServerMessage<P = unknown> {
  op: ServerOpcode;
  payload?: P;
}

export const ClientMessageSchema = z.object({
  op: z.enum(["hello", "command", "ping"]),
  payload: z.unknown().optional(),
});

export const HelloPayloadSchema = z.object({
  name: z.string().trim().min(1).max(32),
  characterId: z.string().trim().min(1).max(64),
});
export type HelloPayload = z.infer<typeof HelloPayloadSchema>;

export const CommandPayloadSchema = z.object({
  text: z.string().max(512),
});
export type CommandPayload = z.infer<typeof CommandPayloadSchema>;

// -------------------------
// Server payloads
// -------------------------

export interface MudResultPayload {
  ok: boolean;
  code: IntentCode;
  text: string;
}

export interface MudEventPayload {
  kind: MudEventKind;
  text: string;
  roomId?: string;
  data?: Record<string, unknown>;
}
