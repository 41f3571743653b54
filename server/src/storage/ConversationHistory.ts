/**
 * Conversation History - per-session, in-memory ordered message list
 *
 * Insertion order is conversational order. Nothing is persisted; history
 * is lost when the session ends or the process restarts.
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export class ConversationHistory {
  private messages: ChatMessage[] = [];

  constructor(systemPrompt?: string) {
    if (systemPrompt) {
      this.messages.push({ role: "system", content: systemPrompt });
    }
  }

  append(role: ChatRole, content: string): void {
    this.messages.push({ role, content });
  }

  /**
   * Snapshot of the history; later appends do not affect it
   */
  getMessages(): ChatMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  /**
   * Number of user turns recorded
   */
  getTurnCount(): number {
    return this.messages.filter((message) => message.role === "user").length;
  }

  get length(): number {
    return this.messages.length;
  }

  /**
   * Drop every message, system prompt included
   */
  clear(): void {
    this.messages = [];
  }
}
