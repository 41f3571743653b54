/**
 * Client Message Parsing Unit Tests
 *
 * Covers parseClientMessage: valid frames of every type, field validation
 * errors, unknown types and frames that are not JSON objects at all. Also
 * covers the error code mapping used for rejected messages.
 */

import {
  errorCodeFor,
  errorMessage,
  isClientMessageType,
  parseClientMessage,
} from "../../schemas/messages.js";

describe("parseClientMessage", () => {
  // ── Valid messages ──────────────────────────────────────────────────

  describe("valid messages", () => {
    it("parses start_session", () => {
      expect(
        parseClientMessage('{"type":"start_session","session_id":"s1"}'),
      ).toEqual({
        kind: "message",
        message: { type: "start_session", session_id: "s1" },
      });
    });

    it("parses audio_chunk and normalizes the format", () => {
      const frame = parseClientMessage(
        JSON.stringify({
          type: "audio_chunk",
          session_id: "s1",
          audio_data: "AQI=",
          format: " PCM ",
        }),
      );

      expect(frame).toEqual({
        kind: "message",
        message: {
          type: "audio_chunk",
          session_id: "s1",
          audio_data: "AQI=",
          format: "pcm",
        },
      });
    });

    it("defaults the audio_chunk format to wav", () => {
      const frame = parseClientMessage(
        JSON.stringify({ type: "audio_chunk", session_id: "s1", audio_data: "AQI=" }),
      );

      expect(frame.kind === "message" && frame.message).toEqual({
        type: "audio_chunk",
        session_id: "s1",
        audio_data: "AQI=",
        format: "wav",
      });
    });

    it("parses audio_end and end_session", () => {
      expect(
        parseClientMessage('{"type":"audio_end","session_id":"s1"}'),
      ).toEqual({ kind: "message", message: { type: "audio_end", session_id: "s1" } });
      expect(
        parseClientMessage('{"type":"end_session","session_id":"s1"}'),
      ).toEqual({ kind: "message", message: { type: "end_session", session_id: "s1" } });
    });

    it("drops unrecognized extra fields", () => {
      const frame = parseClientMessage(
        JSON.stringify({ type: "start_session", session_id: "s1", voice: "onyx" }),
      );

      expect(frame).toEqual({
        kind: "message",
        message: { type: "start_session", session_id: "s1" },
      });
    });
  });

  // ── Field errors ────────────────────────────────────────────────────

  describe("invalid fields", () => {
    it("reports a missing session_id", () => {
      expect(parseClientMessage('{"type":"audio_end"}')).toEqual({
        kind: "invalid_fields",
        type: "audio_end",
        sessionId: null,
        error: "session_id is required",
      });
    });

    it("reports a non-string session_id", () => {
      expect(parseClientMessage('{"type":"start_session","session_id":42}')).toEqual({
        kind: "invalid_fields",
        type: "start_session",
        sessionId: null,
        error: "session_id must be a string",
      });
    });

    it("reports audio_data that is not base64", () => {
      expect(
        parseClientMessage(
          JSON.stringify({ type: "audio_chunk", session_id: "s1", audio_data: "not base64!" }),
        ),
      ).toEqual({
        kind: "invalid_fields",
        type: "audio_chunk",
        sessionId: "s1",
        error: "audio_data must be base64-encoded",
      });
    });

    it("reports empty audio_data", () => {
      const frame = parseClientMessage(
        JSON.stringify({ type: "audio_chunk", session_id: "s1", audio_data: "" }),
      );

      expect(frame.kind === "invalid_fields" && frame.error).toBe(
        "audio_data must not be empty",
      );
    });

    it("joins several problems into one error", () => {
      const frame = parseClientMessage('{"type":"audio_chunk"}');

      expect(frame.kind === "invalid_fields" && frame.error).toBe(
        "session_id is required; audio_data is required",
      );
    });
  });

  // ── Unknown and malformed frames ────────────────────────────────────

  describe("unknown and malformed frames", () => {
    it("reports an unknown type with its session id when present", () => {
      expect(parseClientMessage('{"type":"ping"}')).toEqual({
        kind: "unknown_type",
        type: "ping",
        sessionId: null,
      });
      expect(parseClientMessage('{"type":"ping","session_id":"s1"}')).toEqual({
        kind: "unknown_type",
        type: "ping",
        sessionId: "s1",
      });
    });

    it("reports text that is not JSON", () => {
      const frame = parseClientMessage("hello");

      expect(frame.kind).toBe("malformed");
      expect(frame.kind === "malformed" && frame.error).toMatch(
        /^Message is not valid JSON: /,
      );
    });

    it.each([
      ["an array", "[1,2]"],
      ["a string", '"start_session"'],
      ["null", "null"],
      ["an object without type", '{"session_id":"s1"}'],
      ["a non-string type", '{"type":7}'],
    ])("reports %s as malformed", (_label, raw) => {
      expect(parseClientMessage(raw)).toEqual({
        kind: "malformed",
        error: 'Message must be a JSON object with a string "type"',
      });
    });
  });
});

describe("message helpers", () => {
  it("maps each client message type to its error code", () => {
    expect(errorCodeFor("start_session")).toBe("session_start_error");
    expect(errorCodeFor("audio_chunk")).toBe("audio_chunk_error");
    expect(errorCodeFor("audio_end")).toBe("audio_processing_error");
    expect(errorCodeFor("end_session")).toBe("session_end_error");
  });

  it("recognizes client message types", () => {
    expect(isClientMessageType("audio_end")).toBe(true);
    expect(isClientMessageType("session_started")).toBe(false);
  });

  it("builds error records", () => {
    expect(errorMessage("invalid_message", "bad frame", null)).toEqual({
      type: "error",
      session_id: null,
      error: "bad frame",
      code: "invalid_message",
    });
  });
});
