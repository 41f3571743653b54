import { ErrorCode } from "../schemas/messages.js";

/**
 * Rejection raised by the session core, carrying the wire error code the
 * transport reports to the client.
 */
export class VoiceChatError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "VoiceChatError";
    this.code = code;
  }
}

export function isVoiceChatError(error: unknown): error is VoiceChatError {
  return error instanceof VoiceChatError;
}
