/**
 * Session Registry - maps session ids to live voice sessions
 *
 * One registry is owned by each VoiceWebSocketServer. Entries are created
 * when a connection starts a session and removed when it ends or the
 * connection drops.
 */

import { v4 as uuidv4 } from "uuid";
import { EventBus } from "./EventBus.js";
import { AudioBuffer, AudioBufferOptions } from "./AudioBuffer.js";
import { VoiceChatError } from "./VoiceChatError.js";
import { ConversationHistory } from "../storage/ConversationHistory.js";
import { SessionEndReason } from "../schemas/events.js";

export interface VoiceSession {
  id: string;
  createdAt: number;
  lastActivityAt: number;
  state: "active" | "closed";
  history: ConversationHistory;
  audio: AudioBuffer;
  turns: number;
}

export interface CreateSessionOptions {
  systemPrompt: string;
}

export class SessionRegistry {
  private sessions: Map<string, VoiceSession>;
  private readonly bus: EventBus;
  private readonly audioOptions: AudioBufferOptions;

  constructor(bus: EventBus, audioOptions: AudioBufferOptions) {
    this.sessions = new Map();
    this.bus = bus;
    this.audioOptions = audioOptions;
  }

  /**
   * Register a session, or return the existing one for a known id
   */
  create(sessionId: string, options: CreateSessionOptions): VoiceSession {
    if (sessionId.trim().length === 0) {
      throw new VoiceChatError(
        "session_start_error",
        "session_id must be a non-empty string",
      );
    }

    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const now = Date.now();
    const session: VoiceSession = {
      id: sessionId,
      createdAt: now,
      lastActivityAt: now,
      state: "active",
      history: new ConversationHistory(options.systemPrompt),
      audio: new AudioBuffer(this.audioOptions),
      turns: 0,
    };

    this.sessions.set(sessionId, session);
    console.log(`[Session] Created voice chat session: ${sessionId}`);

    this.bus.emit({
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: now,
      source: "orchestrator",
      type: "session.start",
      payload: {},
    });

    return session;
  }

  get(sessionId: string): VoiceSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Touch session to update last activity
   */
  touch(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastActivityAt = Date.now();
    }
  }

  /**
   * Release a session and everything it holds.
   * Returns false when the id was not registered.
   */
  remove(sessionId: string, reason: SessionEndReason = "user_ended"): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    const turns = session.turns;
    session.state = "closed";
    session.history.clear();
    session.audio.clear();
    this.sessions.delete(sessionId);

    console.log(`[Session] Cleared voice chat session: ${sessionId} (${reason})`);

    this.bus.emit({
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "orchestrator",
      type: "session.end",
      payload: {
        reason,
        duration_ms: Date.now() - session.createdAt,
        turns,
      },
    });

    return true;
  }

  /**
   * Release every session
   */
  clear(reason: SessionEndReason = "server_shutdown"): void {
    for (const session of this.getActiveSessions()) {
      this.remove(session.id, reason);
    }
  }

  getActiveSessions(): VoiceSession[] {
    return Array.from(this.sessions.values());
  }

  getSessionCount(): number {
    return this.sessions.size;
  }
}
