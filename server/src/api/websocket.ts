/**
 * WebSocket server for real-time voice chat
 *
 * Each connection runs the protocol state machine over its inbound frames,
 * one at a time, and carries out the effects it returns against the
 * session registry, the voice pipeline and the socket.
 */

import { WebSocketServer, WebSocket, RawData } from "ws";
import type { Server } from "http";
import { v4 as uuidv4 } from "uuid";
import { EventBus, eventBus } from "../orchestrator/EventBus.js";
import { SessionRegistry, VoiceSession } from "../orchestrator/SessionRegistry.js";
import {
  VoicePipeline,
  PipelineSink,
  describeOutcome,
} from "../orchestrator/VoicePipeline.js";
import { isVoiceChatError } from "../orchestrator/VoiceChatError.js";
import {
  INITIAL_STATE,
  ProtocolEffect,
  ProtocolInput,
  ProtocolState,
  transition,
} from "../orchestrator/VoiceProtocol.js";
import { VoiceProviders } from "../providers/ProviderAdapter.js";
import { VoiceChatConfig } from "../config/voiceChat.js";
import {
  ErrorCode,
  InboundFrame,
  ServerMessage,
  errorCodeFor,
  errorMessage,
  parseClientMessage,
} from "../schemas/messages.js";

export interface VoiceServerOptions {
  path: string;
  maxPayloadBytes: number;
  voiceChat: VoiceChatConfig;
  providers: VoiceProviders;
  bus?: EventBus;
}

interface ClientConnection {
  id: string;
  ws: WebSocket;
  state: ProtocolState;
  session: VoiceSession | null;
  abort: AbortController;
  inbox: Promise<void>;
}

const CLOSE_GOING_AWAY = 1001;

export class VoiceWebSocketServer {
  private wss: WebSocketServer;
  private connections: Map<WebSocket, ClientConnection>;
  private registry: SessionRegistry;
  private pipeline: VoicePipeline;
  private bus: EventBus;
  private voiceChat: VoiceChatConfig;

  constructor(server: Server, options: VoiceServerOptions) {
    this.bus = options.bus ?? eventBus;
    this.voiceChat = options.voiceChat;
    this.connections = new Map();
    this.registry = new SessionRegistry(this.bus, {
      maxBytes: options.voiceChat.maxAudioBytes,
      supportedFormats: options.voiceChat.inputFormats,
    });
    this.pipeline = new VoicePipeline(
      options.providers,
      { streamChunkBytes: options.voiceChat.streamChunkBytes },
      this.bus,
    );

    this.wss = new WebSocketServer({
      server,
      path: options.path,
      maxPayload: options.maxPayloadBytes,
    });
    this.wss.on("connection", this.handleConnection.bind(this));
    console.log(`[WebSocket] Server initialized on ${options.path}`);
  }

  private handleConnection(ws: WebSocket): void {
    const connection: ClientConnection = {
      id: uuidv4(),
      ws,
      state: INITIAL_STATE,
      session: null,
      abort: new AbortController(),
      inbox: Promise.resolve(),
    };
    this.connections.set(ws, connection);
    console.log(`[WebSocket] New client connected: ${connection.id}`);

    ws.on("message", (data, isBinary) => this.enqueue(connection, data, isBinary));
    ws.on("close", () => this.handleClose(connection));
    ws.on("error", (error) => this.handleError(connection, error));
  }

  /**
   * Frames are handled strictly in arrival order; a pipeline run finishes
   * before the next frame of the same connection is looked at.
   */
  private enqueue(
    connection: ClientConnection,
    data: RawData,
    isBinary: boolean,
  ): void {
    connection.inbox = connection.inbox
      .then(() => this.handleMessage(connection, data, isBinary))
      .catch((error) => {
        console.error(
          `[WebSocket] Unhandled error on connection ${connection.id}:`,
          error,
        );
      });
  }

  private async handleMessage(
    connection: ClientConnection,
    data: RawData,
    isBinary: boolean,
  ): Promise<void> {
    const frame: InboundFrame = isBinary
      ? { kind: "malformed", error: "Binary frames are not supported" }
      : parseClientMessage(rawDataToString(data));

    if (frame.kind !== "message") {
      console.warn(`[WebSocket] Rejected frame on ${connection.id}: ${describeRejection(frame)}`);
    }

    try {
      await this.dispatch(connection, frame);
    } catch (error) {
      const sessionId = connection.session?.id ?? null;
      if (isVoiceChatError(error)) {
        console.warn(`[WebSocket] ${error.code}: ${error.message}`);
        await this.sendToClient(
          connection.ws,
          errorMessage(error.code, error.message, sessionId),
        );
        return;
      }

      console.error(`[WebSocket] Error handling message:`, error);
      await this.sendToClient(
        connection.ws,
        errorMessage(
          fallbackErrorCode(frame),
          error instanceof Error ? error.message : "Unknown error",
          sessionId,
        ),
      );
    }
  }

  private async dispatch(
    connection: ClientConnection,
    input: ProtocolInput,
  ): Promise<void> {
    const { state, effects } = transition(connection.state, input, {
      isSessionIdTaken: (sessionId) => this.registry.has(sessionId),
    });
    connection.state = state;

    for (const effect of effects) {
      await this.applyEffect(connection, effect);
    }
  }

  private async applyEffect(
    connection: ClientConnection,
    effect: ProtocolEffect,
  ): Promise<void> {
    const { ws } = connection;

    switch (effect.type) {
      case "register_session":
        try {
          connection.session = this.registry.create(effect.sessionId, {
            systemPrompt: this.voiceChat.systemPrompt,
          });
        } catch (error) {
          connection.state = INITIAL_STATE;
          throw error;
        }
        return;

      case "append_audio": {
        const session = this.sessionFor(connection, effect.sessionId);
        session.audio.append({ data: effect.data, format: effect.format });
        this.registry.touch(session.id);
        return;
      }

      case "run_pipeline": {
        const session = this.sessionFor(connection, effect.sessionId);
        this.registry.touch(session.id);
        const sink: PipelineSink = {
          send: (message) => this.sendToClient(ws, message),
        };
        const outcome = await this.pipeline.run(
          session,
          sink,
          connection.abort.signal,
        );
        console.log(
          `[WebSocket] Turn for ${session.id} on ${connection.id} ${describeOutcome(outcome)}`,
        );
        return;
      }

      case "release_session":
        connection.abort.abort();
        connection.session = null;
        this.registry.remove(effect.sessionId, effect.reason);
        return;

      case "send":
        await this.sendToClient(ws, effect.message);
        return;

      case "close_transport":
        ws.close(effect.code, effect.reason);
        return;
    }
  }

  private sessionFor(connection: ClientConnection, sessionId: string): VoiceSession {
    const session = connection.session;
    if (!session || session.id !== sessionId) {
      throw new Error(`No active session: ${sessionId}`);
    }
    return session;
  }

  private handleClose(connection: ClientConnection): void {
    console.log(`[WebSocket] Client disconnected: ${connection.id}`);
    this.connections.delete(connection.ws);

    // Not queued behind the inbox: a run in flight must see the abort now
    connection.abort.abort();
    this.dispatch(connection, { kind: "disconnected" }).catch((error) => {
      console.error(`[WebSocket] Error releasing connection ${connection.id}:`, error);
    });
  }

  private handleError(connection: ClientConnection, error: Error): void {
    console.error(`[WebSocket] Error on connection ${connection.id}:`, error);

    const session = connection.session;
    if (session) {
      this.bus.emit({
        event_id: uuidv4(),
        session_id: session.id,
        t_ms: Date.now(),
        source: "orchestrator",
        type: "session.error",
        payload: { error: error.message },
      });
    }
  }

  /**
   * Resolves once the frame has been written, or immediately when the
   * socket is no longer open
   */
  private sendToClient(ws: WebSocket, message: ServerMessage): Promise<void> {
    if (ws.readyState !== WebSocket.OPEN) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      ws.send(JSON.stringify(message), (error) => {
        if (error) {
          console.error(`[WebSocket] Failed to send ${message.type}:`, error);
        }
        resolve();
      });
    });
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getRegistry(): SessionRegistry {
    return this.registry;
  }

  /**
   * Drop every session and connection, then stop accepting new ones
   */
  close(): Promise<void> {
    for (const connection of this.connections.values()) {
      connection.abort.abort();
      connection.ws.close(CLOSE_GOING_AWAY, "server_shutdown");
    }
    this.registry.clear("server_shutdown");

    return new Promise((resolve, reject) => {
      this.wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log("[WebSocket] Server closed");
        resolve();
      });
    });
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function fallbackErrorCode(frame: InboundFrame): ErrorCode {
  switch (frame.kind) {
    case "message":
      return errorCodeFor(frame.message.type);
    case "invalid_fields":
      return errorCodeFor(frame.type);
    case "unknown_type":
      return "unknown_message_type";
    case "malformed":
      return "invalid_message";
  }
}

function describeRejection(frame: Exclude<InboundFrame, { kind: "message" }>): string {
  switch (frame.kind) {
    case "invalid_fields":
      return `${frame.type}: ${frame.error}`;
    case "unknown_type":
      return `unknown type ${frame.type}`;
    case "malformed":
      return frame.error;
  }
}
