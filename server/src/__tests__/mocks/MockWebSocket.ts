/**
 * Mock WebSocket for Testing
 * Stands in for the server side of a client connection, without network calls
 */

import { EventEmitter } from "events";
import { ServerMessage, ServerMessageType } from "../../schemas/messages.js";

export type SentMessage<T extends ServerMessageType> = Extract<
  ServerMessage,
  { type: T }
>;

export class MockWebSocket extends EventEmitter {
  // WebSocket ready states
  static readonly CONNECTING = 0;
  static readonly OPEN = 1;
  static readonly CLOSING = 2;
  static readonly CLOSED = 3;

  public sentMessages: ServerMessage[] = [];
  public readyState: number = MockWebSocket.OPEN;
  public closeCode: number | null = null;
  public closeReason: string | null = null;

  /**
   * Send message (server -> client). The write completes on the next tick.
   */
  send(data: string, callback?: (error?: Error) => void): void {
    if (this.readyState !== MockWebSocket.OPEN) {
      throw new Error("WebSocket is not open");
    }

    const message: ServerMessage = JSON.parse(data);
    this.sentMessages.push(message);
    process.nextTick(() => callback?.());
  }

  /**
   * Close connection
   */
  close(code: number = 1000, reason: string = "Normal closure"): void {
    if (
      this.readyState === MockWebSocket.CLOSING ||
      this.readyState === MockWebSocket.CLOSED
    ) {
      return;
    }

    this.readyState = MockWebSocket.CLOSING;
    this.closeCode = code;
    this.closeReason = reason;

    // Emit close event on next tick
    process.nextTick(() => this.simulateClose(code, reason));
  }

  /**
   * Simulate the peer going away
   */
  simulateClose(code: number = 1006, reason: string = ""): void {
    if (this.readyState === MockWebSocket.CLOSED) {
      return;
    }
    this.readyState = MockWebSocket.CLOSED;
    this.emit("close", code, Buffer.from(reason));
  }

  /**
   * Simulate receiving a JSON message from the client
   */
  receiveMessage(message: object): void {
    this.receiveRaw(JSON.stringify(message));
  }

  /**
   * Simulate receiving a raw text frame from the client
   */
  receiveRaw(data: string): void {
    if (this.readyState !== MockWebSocket.OPEN) {
      throw new Error("Cannot receive message: WebSocket is not open");
    }
    this.emit("message", Buffer.from(data), false);
  }

  /**
   * Simulate receiving a binary frame from the client
   */
  receiveBinary(data: Buffer): void {
    this.emit("message", data, true);
  }

  /**
   * Simulate error
   */
  simulateError(error: Error): void {
    this.emit("error", error);
  }

  /**
   * Get last sent message
   */
  getLastMessage(): ServerMessage | null {
    return this.sentMessages.length > 0
      ? this.sentMessages[this.sentMessages.length - 1]
      : null;
  }

  /**
   * Get all messages of specific type
   */
  getMessagesByType<T extends ServerMessageType>(type: T): SentMessage<T>[] {
    return this.sentMessages.filter(
      (msg): msg is SentMessage<T> => msg.type === type,
    );
  }

  /**
   * Sent message types, in order
   */
  getSentTypes(): ServerMessageType[] {
    return this.sentMessages.map((msg) => msg.type);
  }

  /**
   * Clear sent message history
   */
  clearMessages(): void {
    this.sentMessages = [];
  }

  /**
   * Count messages of specific type
   */
  countMessagesByType(type: ServerMessageType): number {
    return this.sentMessages.filter((msg) => msg.type === type).length;
  }
}
