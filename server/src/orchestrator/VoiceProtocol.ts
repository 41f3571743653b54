/**
 * Voice chat protocol state machine
 *
 * transition(state, input, view) is pure: it decides the next connection
 * state and the effects the transport must carry out, in order. It never
 * touches the socket, the registry or the pipeline itself.
 *
 *   uninitialized --start_session--> active --end_session/disconnect--> closed
 */

import {
  ClientMessage,
  ErrorCode,
  InboundFrame,
  ServerMessage,
  errorCodeFor,
  errorMessage,
} from "../schemas/messages.js";
import { SessionEndReason } from "../schemas/events.js";

export type ProtocolState =
  | { phase: "uninitialized" }
  | { phase: "active"; sessionId: string }
  | { phase: "closed"; sessionId: string | null };

export type ProtocolInput = InboundFrame | { kind: "disconnected" };

export type ProtocolEffect =
  | { type: "register_session"; sessionId: string }
  | { type: "append_audio"; sessionId: string; data: Buffer; format: string }
  | { type: "run_pipeline"; sessionId: string }
  | { type: "release_session"; sessionId: string; reason: SessionEndReason }
  | { type: "send"; message: ServerMessage }
  | { type: "close_transport"; code: number; reason: string };

// WebSocket close codes
export const CLOSE_NORMAL = 1000;
export const CLOSE_POLICY_VIOLATION = 1008;

export interface TransitionResult {
  state: ProtocolState;
  effects: ProtocolEffect[];
}

/**
 * Read-only view of the session registry
 */
export interface RegistryView {
  isSessionIdTaken(sessionId: string): boolean;
}

export const INITIAL_STATE: ProtocolState = { phase: "uninitialized" };

export function transition(
  state: ProtocolState,
  input: ProtocolInput,
  view: RegistryView,
): TransitionResult {
  if (input.kind === "disconnected") {
    return onDisconnect(state);
  }

  switch (state.phase) {
    case "uninitialized":
      return onUninitialized(state, input, view);
    case "active":
      return onActive(state, input);
    case "closed":
      return onClosed(state, input);
  }
}

function onDisconnect(state: ProtocolState): TransitionResult {
  if (state.phase === "active") {
    return {
      state: { phase: "closed", sessionId: state.sessionId },
      effects: [
        {
          type: "release_session",
          sessionId: state.sessionId,
          reason: "connection_closed",
        },
      ],
    };
  }
  if (state.phase === "closed") {
    return { state, effects: [] };
  }
  return { state: { phase: "closed", sessionId: null }, effects: [] };
}

function onUninitialized(
  state: ProtocolState,
  input: InboundFrame,
  view: RegistryView,
): TransitionResult {
  if (input.kind === "message" && input.message.type === "start_session") {
    const sessionId = input.message.session_id;

    if (sessionId.trim().length === 0) {
      return reject(
        state,
        "session_start_error",
        "session_id must be a non-empty string",
        sessionId,
      );
    }

    if (view.isSessionIdTaken(sessionId)) {
      return reject(
        state,
        "session_start_error",
        `Session ${sessionId} is already in use`,
        sessionId,
      );
    }

    return {
      state: { phase: "active", sessionId },
      effects: [
        { type: "register_session", sessionId },
        { type: "send", message: { type: "session_started", session_id: sessionId } },
      ],
    };
  }

  if (input.kind === "invalid_fields" && input.type === "start_session") {
    return reject(state, "session_start_error", input.error, input.sessionId);
  }

  return {
    state: { phase: "closed", sessionId: null },
    effects: [
      {
        type: "send",
        message: errorMessage(
          "invalid_first_message",
          `First message must be start_session, got ${describeFrame(input)}`,
          frameSessionId(input),
        ),
      },
      {
        type: "close_transport",
        code: CLOSE_POLICY_VIOLATION,
        reason: "invalid_first_message",
      },
    ],
  };
}

function onActive(
  state: Extract<ProtocolState, { phase: "active" }>,
  input: InboundFrame,
): TransitionResult {
  const activeId = state.sessionId;

  switch (input.kind) {
    case "malformed":
      return reject(state, "invalid_message", input.error, activeId);

    case "unknown_type":
      return reject(
        state,
        "unknown_message_type",
        `Unknown message type: ${input.type}`,
        input.sessionId ?? activeId,
      );

    case "invalid_fields":
      return reject(
        state,
        errorCodeFor(input.type),
        input.error,
        input.sessionId ?? activeId,
      );

    case "message":
      return onActiveMessage(state, input.message);
  }
}

function onActiveMessage(
  state: Extract<ProtocolState, { phase: "active" }>,
  message: ClientMessage,
): TransitionResult {
  const activeId = state.sessionId;
  const matches = message.session_id === activeId;

  switch (message.type) {
    case "start_session":
      if (matches) {
        return {
          state,
          effects: [
            { type: "send", message: { type: "session_started", session_id: activeId } },
          ],
        };
      }
      return reject(
        state,
        "session_start_error",
        `Session ${activeId} is already active on this connection`,
        message.session_id,
      );

    case "audio_chunk":
      if (!matches) {
        return reject(
          state,
          "audio_chunk_error",
          noSession(message.session_id),
          message.session_id,
        );
      }
      return {
        state,
        effects: [
          {
            type: "append_audio",
            sessionId: activeId,
            data: Buffer.from(message.audio_data, "base64"),
            format: message.format,
          },
        ],
      };

    case "audio_end":
      if (!matches) {
        return reject(
          state,
          "audio_processing_error",
          noSession(message.session_id),
          message.session_id,
        );
      }
      return { state, effects: [{ type: "run_pipeline", sessionId: activeId }] };

    case "end_session":
      if (!matches) {
        return reject(
          state,
          "session_end_error",
          noSession(message.session_id),
          message.session_id,
        );
      }
      return {
        state: { phase: "closed", sessionId: activeId },
        effects: [
          { type: "release_session", sessionId: activeId, reason: "user_ended" },
          { type: "send", message: { type: "session_ended", session_id: activeId } },
          { type: "close_transport", code: CLOSE_NORMAL, reason: "session_ended" },
        ],
      };
  }
}

function onClosed(
  state: Extract<ProtocolState, { phase: "closed" }>,
  input: InboundFrame,
): TransitionResult {
  switch (input.kind) {
    case "malformed":
      return reject(state, "invalid_message", input.error, state.sessionId);
    case "unknown_type":
      return reject(
        state,
        "unknown_message_type",
        `Unknown message type: ${input.type}`,
        input.sessionId ?? state.sessionId,
      );
    case "invalid_fields":
      return reject(state, errorCodeFor(input.type), input.error, input.sessionId);
    case "message":
      return reject(
        state,
        errorCodeFor(input.message.type),
        noSession(input.message.session_id),
        input.message.session_id,
      );
  }
}

function reject(
  state: ProtocolState,
  code: ErrorCode,
  error: string,
  sessionId: string | null,
): TransitionResult {
  return {
    state,
    effects: [{ type: "send", message: errorMessage(code, error, sessionId) }],
  };
}

function noSession(sessionId: string): string {
  return `No active session: ${sessionId}`;
}

function frameSessionId(frame: InboundFrame): string | null {
  switch (frame.kind) {
    case "message":
      return frame.message.session_id;
    case "invalid_fields":
    case "unknown_type":
      return frame.sessionId;
    case "malformed":
      return null;
  }
}

function describeFrame(frame: InboundFrame): string {
  switch (frame.kind) {
    case "message":
      return frame.message.type;
    case "invalid_fields":
    case "unknown_type":
      return frame.type;
    case "malformed":
      return "a malformed message";
  }
}
