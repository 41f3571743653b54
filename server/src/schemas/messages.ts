/**
 * Wire schema for the voice chat WebSocket protocol.
 *
 * Every frame is a JSON text record with a `type` discriminator and a
 * `session_id`. Client frames are validated with zod; server frames are
 * plain typed records.
 */

import { z } from "zod";

// ── Client -> Server ────────────────────────────────────────────────────

const sessionIdField = z.string({
  required_error: "session_id is required",
  invalid_type_error: "session_id must be a string",
});

export const StartSessionSchema = z.object({
  type: z.literal("start_session"),
  session_id: sessionIdField,
});

export const AudioChunkSchema = z.object({
  type: z.literal("audio_chunk"),
  session_id: sessionIdField,
  audio_data: z
    .string({
      required_error: "audio_data is required",
      invalid_type_error: "audio_data must be a string",
    })
    .min(1, "audio_data must not be empty")
    .base64("audio_data must be base64-encoded"),
  format: z
    .string({ invalid_type_error: "format must be a string" })
    .trim()
    .toLowerCase()
    .default("wav"),
});

export const AudioEndSchema = z.object({
  type: z.literal("audio_end"),
  session_id: sessionIdField,
});

export const EndSessionSchema = z.object({
  type: z.literal("end_session"),
  session_id: sessionIdField,
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  StartSessionSchema,
  AudioChunkSchema,
  AudioEndSchema,
  EndSessionSchema,
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage["type"];

export const CLIENT_MESSAGE_TYPES: readonly ClientMessageType[] = [
  "start_session",
  "audio_chunk",
  "audio_end",
  "end_session",
];

export function isClientMessageType(type: string): type is ClientMessageType {
  return CLIENT_MESSAGE_TYPES.some((known) => known === type);
}

// ── Server -> Client ────────────────────────────────────────────────────

export type ErrorCode =
  | "session_start_error"
  | "audio_chunk_error"
  | "audio_processing_error"
  | "session_end_error"
  | "unknown_message_type"
  | "invalid_first_message"
  | "invalid_message";

export type ServerMessage =
  | { type: "session_started"; session_id: string }
  | { type: "transcription"; session_id: string; text: string }
  | { type: "response_text"; session_id: string; text: string }
  | { type: "audio_stream_start"; session_id: string }
  | { type: "audio_stream_chunk"; session_id: string; audio_data: string }
  | { type: "audio_stream_end"; session_id: string }
  | { type: "session_ended"; session_id: string }
  | {
      type: "error";
      session_id: string | null;
      error: string;
      code: ErrorCode;
    };

export type ServerMessageType = ServerMessage["type"];

export const SERVER_MESSAGE_TYPES: readonly ServerMessageType[] = [
  "session_started",
  "transcription",
  "response_text",
  "audio_stream_start",
  "audio_stream_chunk",
  "audio_stream_end",
  "session_ended",
  "error",
];

export function errorMessage(
  code: ErrorCode,
  error: string,
  sessionId: string | null,
): ServerMessage {
  return { type: "error", session_id: sessionId, error, code };
}

/**
 * Error code reported when a message of the given type is rejected
 */
export function errorCodeFor(type: ClientMessageType): ErrorCode {
  switch (type) {
    case "start_session":
      return "session_start_error";
    case "audio_chunk":
      return "audio_chunk_error";
    case "audio_end":
      return "audio_processing_error";
    case "end_session":
      return "session_end_error";
  }
}

// ── Inbound parsing ─────────────────────────────────────────────────────

/**
 * Result of decoding one inbound text frame
 */
export type InboundFrame =
  | { kind: "message"; message: ClientMessage }
  | {
      kind: "invalid_fields";
      type: ClientMessageType;
      sessionId: string | null;
      error: string;
    }
  | { kind: "unknown_type"; type: string; sessionId: string | null }
  | { kind: "malformed"; error: string };

const EnvelopeSchema = z
  .object({
    type: z.string(),
    session_id: z.unknown().optional(),
  })
  .passthrough();

export function parseClientMessage(raw: string): InboundFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { kind: "malformed", error: `Message is not valid JSON: ${reason}` };
  }

  const envelope = EnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return {
      kind: "malformed",
      error: 'Message must be a JSON object with a string "type"',
    };
  }

  const { type, session_id } = envelope.data;
  const sessionId = typeof session_id === "string" ? session_id : null;

  if (!isClientMessageType(type)) {
    return { kind: "unknown_type", type, sessionId };
  }

  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    return {
      kind: "invalid_fields",
      type,
      sessionId,
      error: parsed.error.issues.map((issue) => issue.message).join("; "),
    };
  }

  return { kind: "message", message: parsed.data };
}
